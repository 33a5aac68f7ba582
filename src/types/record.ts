import type { TechProfile } from './technology.js';

export interface MissingReport {
  readonly security: readonly string[];
  readonly files: readonly string[];
  readonly metaTags: readonly string[];
}

export interface PageMeta {
  readonly title: string;
  readonly description: string;
  readonly responsive: boolean;
  readonly httpVersion: string;
  readonly sslEnabled: boolean;
}

export interface SiteRecord {
  readonly url: string;
  /** ISO-8601 UTC timestamp */
  readonly analyzedAt: string;
  readonly technologies: TechProfile;
  readonly meta: PageMeta;
  readonly missing: MissingReport;
}

export interface SiteRecordInput {
  url: string;
  analyzedAt: Date;
  headers: string;
  body: string;
  fileProbes: ReadonlyMap<string, boolean>;
}
