import { z } from 'zod';

const StringListSchema = z.array(z.string()).default([]);

// Per-site record as written to disk; field names are the external contract
export const SiteRecordJsonSchema = z.object({
  url: z.string().min(1),
  analyzed_at: z.string().min(1),
  technologies: z.record(StringListSchema),
  meta: z.object({
    title: z.string().default(''),
    description: z.string().default(''),
    responsive: z.boolean().default(false),
    http_version: z.string().default(''),
    ssl_enabled: z.boolean().default(false),
  }),
  missing: z.object({
    security: StringListSchema,
    files: StringListSchema,
    meta_tags: StringListSchema,
  }),
});

export type SiteRecordJson = z.infer<typeof SiteRecordJsonSchema>;
