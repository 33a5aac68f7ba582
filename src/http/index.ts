export { HttpFetcher, formatHeaderText, protocolLabel, readLimited } from './fetcher.js';
export { RequestConfig, DEFAULT_USER_AGENT } from './request-config.js';
