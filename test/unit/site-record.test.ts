import { describe, it, expect } from 'vitest';
import { SiteRecordBuilder, buildSiteRecord } from '../../src/records/site-record.js';
import { deserializeRecord, parseRecordJson, serializeRecord, toRecordJson } from '../../src/records/serializer.js';
import { CATEGORIES } from '../../src/schemas/technology.js';
import { InvalidRecordError } from '../../src/errors.js';

const input = {
  url: 'https://acme.test',
  analyzedAt: new Date('2024-05-01T09:30:00.123Z'),
  headers: 'HTTP/1.1 200 OK\r\nServer: nginx\r\nX-Frame-Options: DENY',
  body: '<title>Acme "Rockets"</title><script src="/wp-includes/js/wp-emoji.js"></script>',
  fileProbes: new Map([
    ['robots.txt', true],
    ['sitemap.xml', false],
  ]),
};

describe('site record', () => {
  it('combines detection, meta and absence results', () => {
    const record = buildSiteRecord(input);

    expect(record.url).toBe('https://acme.test');
    expect(record.analyzedAt).toBe('2024-05-01T09:30:00Z');
    expect(record.technologies.cms).toEqual(['WordPress']);
    expect(record.technologies.reverse_proxies).toEqual(['Nginx']);
    expect(record.meta.title).toBe('Acme "Rockets"');
    expect(record.meta.httpVersion).toBe('HTTP/1.1');
    expect(record.missing.files).toEqual(['sitemap.xml']);
    expect(record.missing.security).not.toContain('X-Frame-Options');
  });

  it('agrees with itself on the description and viewport tags', () => {
    const record = buildSiteRecord({
      ...input,
      body: '<meta content="About us" name="description"><meta content="width=device-width" name="viewport">',
    });

    expect(record.meta.description).toBe('About us');
    expect(record.meta.responsive).toBe(true);
    expect(record.missing.metaTags).not.toContain('description');
    expect(record.missing.metaTags).not.toContain('viewport');
  });

  it('is frozen', () => {
    const record = new SiteRecordBuilder().build(input);

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.technologies.cms)).toBe(true);
  });
});

describe('record serializer', () => {
  it('writes snake_case fields with categories in canonical order', () => {
    const json = toRecordJson(buildSiteRecord(input));

    expect(Object.keys(json)).toEqual(['url', 'analyzed_at', 'technologies', 'meta', 'missing']);
    expect(Object.keys(json.technologies)).toEqual([...CATEGORIES]);
    expect(Object.keys(json.missing)).toEqual(['security', 'files', 'meta_tags']);
  });

  it('escapes quotes from page text', () => {
    const text = serializeRecord(buildSiteRecord(input));

    expect(text).toContain('"title": "Acme \\"Rockets\\""');
    expect(text.endsWith('}\n')).toBe(true);
  });

  it('reads back what it writes', () => {
    const record = buildSiteRecord(input);

    expect(deserializeRecord(serializeRecord(record))).toEqual(record);
  });

  it('fills absent categories and drops unknown ones', () => {
    const record = parseRecordJson({
      url: 'https://a.test',
      analyzed_at: '2024-05-01T09:30:00Z',
      technologies: { cms: ['Wix', 'Wix'], blockchain: ['Ledger'] },
      meta: {},
      missing: { security: [], files: [], meta_tags: ['viewport'] },
    });

    expect(record.technologies.cms).toEqual(['Wix']);
    expect(record.technologies.hosting).toEqual([]);
    expect(Object.keys(record.technologies)).toEqual([...CATEGORIES]);
    expect(record.meta.responsive).toBe(false);
    expect(record.missing.metaTags).toEqual(['viewport']);
  });

  it('rejects malformed JSON', () => {
    expect(() => deserializeRecord('{not json', 'broken.json')).toThrow(InvalidRecordError);
  });

  it('rejects records without a url', () => {
    expect(() => deserializeRecord('{"url": ""}', 'empty.json')).toThrow(/Invalid site record in empty\.json: url/);
  });
});
