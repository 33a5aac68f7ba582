import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);

export const FetcherConfigSchema = z.object({
  timeout: z.coerce.number().int().positive().default(15000),
  userAgent: z
    .string()
    .min(1)
    .default('Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko)'),
  retryAttempts: z.coerce.number().int().min(1).max(10).default(2),
  retryDelay: z.coerce.number().int().min(0).default(1000),
  maxContentSize: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  proxyUrl: z
    .string()
    .regex(/^socks(4a?|5h?)?:\/\//i, 'Proxy URL must use a socks:// scheme')
    .optional(),
  http2: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

export const BatchConfigSchema = z.object({
  jobs: z.coerce.number().int().min(1).max(10).default(3),
  outputDir: z.string().min(1).default('.'),
});

export const AppConfigSchema = z.object({
  fetcher: FetcherConfigSchema,
  batch: BatchConfigSchema,
  logLevel: LogLevelSchema.default('info'),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type FetcherConfig = z.infer<typeof FetcherConfigSchema>;
export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
