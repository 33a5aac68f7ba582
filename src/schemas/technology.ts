import { z } from 'zod';
import type { Category } from '../types/technology.js';

// Canonical category order; record and summary JSON follow it
export const CategorySchema = z.enum([
  'cms',
  'web_frameworks',
  'programming_languages',
  'javascript_frameworks',
  'javascript_libraries',
  'ui_frameworks',
  'analytics',
  'tag_managers',
  'cdn',
  'caching',
  'reverse_proxies',
  'font_scripts',
  'security',
  'cookie_compliance',
  'rum',
  'performance',
  'hosting',
  'miscellaneous',
]) satisfies z.ZodType<Category>;

export const CATEGORIES: readonly Category[] = CategorySchema.options;

export const SignatureSourceSchema = z.enum(['headers', 'body', 'any']);

const PatternSchema = z.string().min(1).refine(
  (pattern) => {
    try {
      new RegExp(pattern, 'i');
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' },
);

export const SignatureMatcherFileSchema = z.object({
  source: SignatureSourceSchema,
  patterns: z.array(PatternSchema).min(1),
});

export const TechnologyRefSchema = z.object({
  category: CategorySchema,
  name: z.string().min(1),
});

export const SignatureFileEntrySchema = z.object({
  category: CategorySchema,
  name: z.string().min(1),
  match: SignatureMatcherFileSchema,
  and: SignatureMatcherFileSchema.optional(),
});

export const SignatureOverrideFileEntrySchema = z.object({
  suppress: TechnologyRefSchema,
  when: SignatureMatcherFileSchema,
  redirect: TechnologyRefSchema.optional(),
});

export const SignatureFileSchema = z.object({
  signatures: z.array(SignatureFileEntrySchema),
  overrides: z.array(SignatureOverrideFileEntrySchema).default([]),
});

export type SignatureMatcherFileEntry = z.infer<typeof SignatureMatcherFileSchema>;
export type SignatureFileEntry = z.infer<typeof SignatureFileEntrySchema>;
export type SignatureOverrideFileEntry = z.infer<typeof SignatureOverrideFileEntrySchema>;
export type SignatureFile = z.infer<typeof SignatureFileSchema>;
