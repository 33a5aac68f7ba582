export { SiteRecordBuilder, buildSiteRecord } from './site-record.js';
export {
  toRecordJson,
  fromRecordJson,
  serializeRecord,
  parseRecordJson,
  deserializeRecord,
} from './serializer.js';
