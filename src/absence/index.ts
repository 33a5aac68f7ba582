export {
  checkMissing,
  hasHeader,
  findMissingSecurityHeaders,
  findMissingFiles,
  findMissingMetaTags,
  allProbesFailed,
} from './absence-checker.js';
export { SECURITY_HEADER_CHECKLIST, FILE_PROBES, META_TAG_CHECKLIST, type MetaTagCheck } from './checklists.js';
