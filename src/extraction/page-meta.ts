import { load, type CheerioAPI } from 'cheerio';
import type { PageMeta } from '../types/index.js';

const STATUS_LINE_VERSION = /\bHTTP\/\d+(?:\.\d+)?/;

export function extractHttpVersion(headers: string): string {
  const statusLine = headers.trimStart().split(/\r?\n/, 1)[0] ?? '';
  const match = statusLine.match(STATUS_LINE_VERSION);
  return match ? match[0] : '';
}

export function isSecureUrl(url: string): boolean {
  return /^https:\/\//i.test(url.trim());
}

/** Content of the first `<meta name=...>` whose name matches case-insensitively, or null if there is none. */
export function metaContent($: CheerioAPI, name: string): string | null {
  const tag = $('meta[name]')
    .filter((_, element) => ($(element).attr('name') ?? '').trim().toLowerCase() === name)
    .first();
  if (tag.length === 0) return null;
  return tag.attr('content') ?? '';
}

export class PageMetaExtractor {
  extract(url: string, headers: string, body: string): PageMeta {
    const $ = load(body);

    const title = $('title').first().text().trim();
    const description = (metaContent($, 'description') ?? '').trim();
    const viewport = metaContent($, 'viewport');

    return Object.freeze({
      title,
      description,
      responsive: viewport !== null && /width\s*=\s*device-width/i.test(viewport),
      httpVersion: extractHttpVersion(headers),
      sslEnabled: isSecureUrl(url),
    });
  }
}

const extractor = new PageMetaExtractor();

export function extractPageMeta(url: string, headers: string, body: string): PageMeta {
  return extractor.extract(url, headers, body);
}
