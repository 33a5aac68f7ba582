import { mapCategories } from '../../src/utils/categories.js';
import type { Category, MissingReport, PageMeta, SiteRecord } from '../../src/types/index.js';

export interface RecordOverrides {
  url?: string;
  technologies?: Partial<Record<Category, string[]>>;
  meta?: Partial<PageMeta>;
  missing?: Partial<MissingReport>;
}

export function makeRecord(overrides: RecordOverrides = {}): SiteRecord {
  const technologies = overrides.technologies ?? {};

  return {
    url: overrides.url ?? 'https://example.test',
    analyzedAt: '2024-05-01T09:30:00Z',
    technologies: mapCategories((category) => technologies[category] ?? []),
    meta: {
      title: '',
      description: '',
      responsive: false,
      httpVersion: 'HTTP/1.1',
      sslEnabled: true,
      ...overrides.meta,
    },
    missing: {
      security: [],
      files: [],
      metaTags: [],
      ...overrides.missing,
    },
  };
}
