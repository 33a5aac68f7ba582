import { load } from 'cheerio';
import { metaContent } from '../extraction/page-meta.js';
import { FILE_PROBES, META_TAG_CHECKLIST, SECURITY_HEADER_CHECKLIST, type MetaTagCheck } from './checklists.js';
import type { MissingReport } from '../types/index.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** True if some header line carries `name`, compared case-insensitively. */
export function hasHeader(headers: string, name: string): boolean {
  return new RegExp(`^\\s*${escapeRegExp(name)}\\s*:`, 'im').test(headers);
}

export function findMissingSecurityHeaders(headers: string): string[] {
  return SECURITY_HEADER_CHECKLIST.filter((name) => !hasHeader(headers, name));
}

export function findMissingFiles(fileProbes: ReadonlyMap<string, boolean>): string[] {
  const missing: string[] = [];
  for (const [name, exists] of fileProbes) {
    if (!exists) {
      missing.push(name);
    }
  }
  return missing;
}

export function findMissingMetaTags(body: string): string[] {
  const $ = load(body);
  const present = (item: MetaTagCheck): boolean =>
    'metaName' in item ? metaContent($, item.metaName) !== null : item.pattern.test(body);

  return META_TAG_CHECKLIST.filter((item) => !present(item)).map((item) => item.name);
}

export function checkMissing(
  headers: string,
  body: string,
  fileProbes: ReadonlyMap<string, boolean>
): MissingReport {
  return Object.freeze({
    security: Object.freeze(findMissingSecurityHeaders(headers)),
    files: Object.freeze(findMissingFiles(fileProbes)),
    metaTags: Object.freeze(findMissingMetaTags(body)),
  });
}

/** Probe results for a page whose origin could not be reached. */
export function allProbesFailed(): Map<string, boolean> {
  return new Map(FILE_PROBES.map((probe): [string, boolean] => [probe.name, false]));
}
