import { Readable } from 'stream';
import { describe, it, expect, afterEach } from 'vitest';
import { HttpFetcher, readLimited } from '../../src/http/fetcher.js';
import { createLogger } from '../../src/utils/logger.js';
import { refusedUrl, startRawServer, startServer, type TestServer } from '../helpers/http-server.js';
import type { FetchResult, FetchSuccessResult } from '../../src/types/index.js';

const logger = createLogger({ name: 'test', silent: true });

function expectPage(result: FetchResult): FetchSuccessResult {
  if (!result.ok) throw new Error(`Expected a page, got: ${result.error}`);
  return result;
}

function statusLine(page: FetchSuccessResult): string {
  return page.headers.split('\r\n')[0] ?? '';
}

describe('HttpFetcher', () => {
  let server: TestServer | null = null;

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  describe('fetchPage', () => {
    it('returns the status line, headers and body', async () => {
      server = await startServer((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'text/html', 'X-Test': 'yes' });
        res.end('<title>Hi</title>');
      });
      const fetcher = new HttpFetcher({ retryAttempts: 1 }, logger);

      const page = expectPage(await fetcher.fetchPage(`${server.url}/`));

      expect(page.status).toBe(200);
      expect(statusLine(page)).toBe('HTTP/1.1 200 OK');
      expect(page.headers.split('\r\n')).toContain('x-test: yes');
      expect(page.body).toBe('<title>Hi</title>');
      expect(page.truncated).toBe(false);
    });

    it('writes the protocol version the server answered with', async () => {
      server = await startRawServer('HTTP/1.0 200 OK\r\nContent-Type: text/html\r\nContent-Length: 2\r\n\r\nok');
      const fetcher = new HttpFetcher({ retryAttempts: 1 }, logger);

      const page = expectPage(await fetcher.fetchPage(`${server.url}/`));

      expect(statusLine(page)).toBe('HTTP/1.0 200 OK');
      expect(page.body).toBe('ok');
    });

    it('keeps error pages', async () => {
      server = await startServer((_req, res) => {
        res.writeHead(404);
        res.end('gone');
      });
      const fetcher = new HttpFetcher({ retryAttempts: 1 }, logger);

      const page = expectPage(await fetcher.fetchPage(`${server.url}/`));

      expect(statusLine(page)).toBe('HTTP/1.1 404 Not Found');
      expect(page.body).toBe('gone');
    });

    it('follows redirects and reports the final URL', async () => {
      server = await startServer((req, res) => {
        if (req.url === '/old') {
          res.writeHead(301, { Location: '/new' });
          res.end();
          return;
        }
        res.writeHead(200);
        res.end('moved here');
      });
      const fetcher = new HttpFetcher({ retryAttempts: 1 }, logger);

      const page = expectPage(await fetcher.fetchPage(`${server.url}/old`));

      expect(page.status).toBe(200);
      expect(page.body).toBe('moved here');
      expect(page.finalUrl).toBe(`${server.url}/new`);
    });

    it('cuts the body at maxContentSize', async () => {
      server = await startServer((_req, res) => {
        res.writeHead(200);
        res.end('a'.repeat(1000));
      });
      const fetcher = new HttpFetcher({ retryAttempts: 1, maxContentSize: 100 }, logger);

      const page = expectPage(await fetcher.fetchPage(`${server.url}/`));

      expect(page.body).toBe('a'.repeat(100));
      expect(page.truncated).toBe(true);
    });

    it('retries after a dropped connection', async () => {
      let calls = 0;
      server = await startServer((req, res) => {
        calls++;
        if (calls === 1) {
          req.socket.destroy();
          return;
        }
        res.end('ok');
      });
      const fetcher = new HttpFetcher({ retryAttempts: 2, retryDelay: 0 }, logger);

      const page = expectPage(await fetcher.fetchPage(`${server.url}/`));

      expect(page.body).toBe('ok');
      expect(server.requests).toEqual(['/', '/']);
    });

    it('reports a failure once the attempts run out', async () => {
      server = await startServer((req) => {
        req.socket.destroy();
      });
      const fetcher = new HttpFetcher({ retryAttempts: 3, retryDelay: 0 }, logger);

      const result = await fetcher.fetchPage(`${server.url}/`);

      expect(result.ok).toBe(false);
      expect(server.requests).toHaveLength(3);
    });

    it('reports a refused connection', async () => {
      const url = await refusedUrl();
      const fetcher = new HttpFetcher({ retryAttempts: 1 }, logger);

      const result = await fetcher.fetchPage(url);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatch(/ECONNREFUSED/);
      expect(result.status).toBeNull();
    });
  });

  describe('probeExists', () => {
    it('is true only for a direct 200', async () => {
      server = await startServer((req, res) => {
        if (req.url === '/robots.txt') {
          res.writeHead(200);
          res.end('User-agent: *');
        } else if (req.url === '/old.txt') {
          res.writeHead(301, { Location: '/robots.txt' });
          res.end();
        } else {
          res.writeHead(404);
          res.end();
        }
      });
      const fetcher = new HttpFetcher({}, logger);

      expect(await fetcher.probeExists(`${server.url}/robots.txt`)).toBe(true);
      expect(await fetcher.probeExists(`${server.url}/old.txt`)).toBe(false);
      expect(await fetcher.probeExists(`${server.url}/humans.txt`)).toBe(false);
    });

    it('is false when the host refuses the connection', async () => {
      const fetcher = new HttpFetcher({}, logger);

      expect(await fetcher.probeExists(`${await refusedUrl()}/robots.txt`)).toBe(false);
    });
  });
});

describe('readLimited', () => {
  const chunks = () => Readable.from([Buffer.from('abc'), Buffer.from('def')]);

  it('reads a body that fits', async () => {
    expect(await readLimited(chunks(), 6)).toEqual({ data: 'abcdef', truncated: false });
  });

  it('stops inside the chunk that crosses the limit', async () => {
    expect(await readLimited(chunks(), 4)).toEqual({ data: 'abcd', truncated: true });
  });
});
