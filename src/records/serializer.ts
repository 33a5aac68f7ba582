import { SiteRecordJsonSchema, type SiteRecordJson } from '../schemas/record.js';
import { InvalidRecordError } from '../errors.js';
import { mapCategories } from '../utils/categories.js';
import type { SiteRecord } from '../types/index.js';

export function toRecordJson(record: SiteRecord): SiteRecordJson {
  return {
    url: record.url,
    analyzed_at: record.analyzedAt,
    technologies: mapCategories((category) => [...record.technologies[category]]),
    meta: {
      title: record.meta.title,
      description: record.meta.description,
      responsive: record.meta.responsive,
      http_version: record.meta.httpVersion,
      ssl_enabled: record.meta.sslEnabled,
    },
    missing: {
      security: [...record.missing.security],
      files: [...record.missing.files],
      meta_tags: [...record.missing.metaTags],
    },
  };
}

// JSON.stringify escapes quotes and control characters in page-derived text
export function serializeRecord(record: SiteRecord): string {
  return `${JSON.stringify(toRecordJson(record), null, 2)}\n`;
}

export function fromRecordJson(json: SiteRecordJson): SiteRecord {
  // Unknown categories are dropped; absent ones read as empty. Duplicates collapse.
  const technologies = mapCategories((category) => Object.freeze([...new Set(json.technologies[category] ?? [])]));

  return Object.freeze({
    url: json.url,
    analyzedAt: json.analyzed_at,
    technologies: Object.freeze(technologies),
    meta: Object.freeze({
      title: json.meta.title,
      description: json.meta.description,
      responsive: json.meta.responsive,
      httpVersion: json.meta.http_version,
      sslEnabled: json.meta.ssl_enabled,
    }),
    missing: Object.freeze({
      security: Object.freeze([...json.missing.security]),
      files: Object.freeze([...json.missing.files]),
      metaTags: Object.freeze([...json.missing.meta_tags]),
    }),
  });
}

export function parseRecordJson(raw: unknown, source = 'input'): SiteRecord {
  const parsed = SiteRecordJsonSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidRecordError(source, issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'schema mismatch');
  }
  return fromRecordJson(parsed.data);
}

export function deserializeRecord(text: string, source = 'input'): SiteRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new InvalidRecordError(source, errorMessage);
  }
  return parseRecordJson(raw, source);
}
