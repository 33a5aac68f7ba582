import type { FileProbe } from '../types/index.js';

export const SECURITY_HEADER_CHECKLIST: readonly string[] = Object.freeze([
  'Strict-Transport-Security',
  'Content-Security-Policy',
  'X-Content-Type-Options',
  'X-Frame-Options',
  'Referrer-Policy',
  'Permissions-Policy',
]);

// Probed against the page origin; a file exists when it answers 200
export const FILE_PROBES: readonly FileProbe[] = Object.freeze([
  { name: 'robots.txt', path: '/robots.txt' },
  { name: 'sitemap.xml', path: '/sitemap.xml' },
  { name: 'favicon.ico', path: '/favicon.ico' },
  { name: 'humans.txt', path: '/humans.txt' },
  { name: 'security.txt', path: '/.well-known/security.txt' },
]);

// Named meta tags are looked up the way page metadata reads them; the rest are markup patterns
export type MetaTagCheck = { name: string; metaName: string } | { name: string; pattern: RegExp };

export const META_TAG_CHECKLIST: readonly MetaTagCheck[] = Object.freeze([
  { name: 'viewport', metaName: 'viewport' },
  { name: 'description', metaName: 'description' },
  { name: 'canonical', pattern: /rel=["']canonical["']/i },
  { name: 'Open Graph tags', pattern: /property=["']og:/i },
  { name: 'Twitter Card tags', pattern: /name=["']twitter:/i },
  { name: 'theme-color', pattern: /name=["']theme-color["']/i },
]);
