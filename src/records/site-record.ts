import { TechDetector } from '../detector/tech-detector.js';
import { checkMissing } from '../absence/absence-checker.js';
import { extractPageMeta } from '../extraction/page-meta.js';
import { toIsoSeconds } from '../utils/time.js';
import type { SiteRecord, SiteRecordInput } from '../types/index.js';

export class SiteRecordBuilder {
  private readonly detector: TechDetector;

  constructor(detector?: TechDetector) {
    this.detector = detector ?? new TechDetector();
  }

  build(input: SiteRecordInput): SiteRecord {
    const { url, analyzedAt, headers, body, fileProbes } = input;

    return Object.freeze({
      url,
      analyzedAt: toIsoSeconds(analyzedAt),
      technologies: this.detector.detect(headers, body),
      meta: extractPageMeta(url, headers, body),
      missing: checkMissing(headers, body, fileProbes),
    });
  }
}

let defaultBuilder: SiteRecordBuilder | null = null;

export function buildSiteRecord(input: SiteRecordInput): SiteRecord {
  if (!defaultBuilder) {
    defaultBuilder = new SiteRecordBuilder();
  }
  return defaultBuilder.build(input);
}
