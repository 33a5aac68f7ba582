import { describe, it, expect } from 'vitest';
import { SiteAnalyzer } from '../../src/batch/site-analyzer.js';
import { createLogger } from '../../src/utils/logger.js';
import { FakeFetcher } from '../helpers/fake-fetcher.js';

const logger = createLogger({ name: 'test', silent: true });
const now = () => new Date('2024-05-01T09:30:00Z');

const SHOP_PAGE = {
  headers: 'HTTP/1.1 200 OK\r\nServer: nginx\r\nStrict-Transport-Security: max-age=31536000',
  body:
    '<html><head><title>Shop</title><meta name="viewport" content="width=device-width"></head>' +
    '<body><link href="/wp-content/themes/shop/style.css"></body></html>',
};

describe('SiteAnalyzer', () => {
  it('builds a record from the page and file probes', async () => {
    const fetcher = new FakeFetcher(
      { 'https://shop.test/catalog': SHOP_PAGE },
      new Set(['https://shop.test/robots.txt', 'https://shop.test/.well-known/security.txt'])
    );
    const analyzer = new SiteAnalyzer(fetcher, { logger, now });

    const { record, degraded, error } = await analyzer.analyze('https://shop.test/catalog');

    expect(degraded).toBe(false);
    expect(error).toBeNull();
    expect(record.analyzedAt).toBe('2024-05-01T09:30:00Z');
    expect(record.technologies.cms).toEqual(['WordPress']);
    expect(record.meta).toEqual({
      title: 'Shop',
      description: '',
      responsive: true,
      httpVersion: 'HTTP/1.1',
      sslEnabled: true,
    });
    expect(record.missing).toEqual({
      security: [
        'Content-Security-Policy',
        'X-Content-Type-Options',
        'X-Frame-Options',
        'Referrer-Policy',
        'Permissions-Policy',
      ],
      files: ['sitemap.xml', 'favicon.ico', 'humans.txt'],
      metaTags: ['description', 'canonical', 'Open Graph tags', 'Twitter Card tags', 'theme-color'],
    });
    expect([...fetcher.probed].sort()).toEqual([
      'https://shop.test/.well-known/security.txt',
      'https://shop.test/favicon.ico',
      'https://shop.test/humans.txt',
      'https://shop.test/robots.txt',
      'https://shop.test/sitemap.xml',
    ]);
  });

  it('records a degraded result when the fetch fails', async () => {
    const fetcher = new FakeFetcher();
    const analyzer = new SiteAnalyzer(fetcher, { logger, now });

    const { record, degraded, error } = await analyzer.analyze('https://down.test');

    expect(degraded).toBe(true);
    expect(error).toBe('connect ECONNREFUSED');
    expect(Object.values(record.technologies).every((names) => names.length === 0)).toBe(true);
    expect(record.meta).toEqual({
      title: '',
      description: '',
      responsive: false,
      httpVersion: '',
      sslEnabled: true,
    });
    expect(record.missing.security).toHaveLength(6);
    expect(record.missing.files).toEqual(['robots.txt', 'sitemap.xml', 'favicon.ico', 'humans.txt', 'security.txt']);
    expect(record.missing.metaTags).toHaveLength(6);
    expect(fetcher.probed).toEqual([]);
  });

  it('treats a thrown fetch error as a failed fetch', async () => {
    const fetcher = new FakeFetcher({ 'https://broken.test': new Error('socket hang up') });
    const analyzer = new SiteAnalyzer(fetcher, { logger, now });

    const { degraded, error } = await analyzer.analyze('https://broken.test');

    expect(degraded).toBe(true);
    expect(error).toBe('socket hang up');
  });
});
