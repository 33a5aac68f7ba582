import { AppConfigSchema, type AppConfig } from './schemas/config.js';
import { ConfigError } from './errors.js';

type Env = Record<string, string | undefined>;

// Unset and blank variables fall through to schema defaults
function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = AppConfigSchema.safeParse({
    fetcher: {
      timeout: read(env, 'STACKLENS_TIMEOUT'),
      userAgent: read(env, 'STACKLENS_USER_AGENT'),
      retryAttempts: read(env, 'STACKLENS_RETRY_ATTEMPTS'),
      retryDelay: read(env, 'STACKLENS_RETRY_DELAY'),
      maxContentSize: read(env, 'STACKLENS_MAX_CONTENT_SIZE'),
      proxyUrl: read(env, 'STACKLENS_PROXY_URL'),
      http2: read(env, 'STACKLENS_HTTP2'),
    },
    batch: {
      jobs: read(env, 'STACKLENS_JOBS'),
      outputDir: read(env, 'STACKLENS_OUTPUT_DIR'),
    },
    logLevel: read(env, 'STACKLENS_LOG_LEVEL'),
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(details.join('; '));
  }

  return parsed.data;
}
