// Technology schemas
export {
  CategorySchema,
  CATEGORIES,
  SignatureSourceSchema,
  SignatureMatcherFileSchema,
  TechnologyRefSchema,
  SignatureFileEntrySchema,
  SignatureOverrideFileEntrySchema,
  SignatureFileSchema,
  type SignatureMatcherFileEntry,
  type SignatureFileEntry,
  type SignatureOverrideFileEntry,
  type SignatureFile,
} from './technology.js';

// Record schemas
export { SiteRecordJsonSchema, type SiteRecordJson } from './record.js';

// Config schemas
export {
  LogLevelSchema,
  FetcherConfigSchema,
  BatchConfigSchema,
  AppConfigSchema,
  type LogLevel,
  type FetcherConfig,
  type BatchConfig,
  type AppConfig,
} from './config.js';
