export { PageMetaExtractor, extractPageMeta, extractHttpVersion, isSecureUrl, metaContent } from './page-meta.js';
