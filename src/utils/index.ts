export { delay } from './delay.js';
export { createLogger, createJobLogger, type LoggerOptions } from './logger.js';
export { normalizeTargetUrl, originOf, urlToFileStem, parseUrlList } from './url.js';
export { toIsoSeconds, formatBatchId } from './time.js';
export { mapCategories } from './categories.js';
