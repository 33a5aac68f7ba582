import axios, { type AxiosRequestConfig, type AxiosResponse } from 'axios';
import type { Readable } from 'stream';
import type { Logger } from 'winston';
import { RequestConfig } from './request-config.js';
import { delay } from '../utils/delay.js';
import { createLogger } from '../utils/logger.js';
import { originOf } from '../utils/url.js';
import type { FetcherOptions, FetchResult, FetchErrorResult, FetchSuccessResult, PageFetcher } from '../types/index.js';

type HeaderBag = Record<string, unknown>;
type ProtocolVersion = 1 | 2;

interface LimitedBody {
  data: string;
  truncated: boolean;
}

/** `HTTP/2`, `HTTP/1.0` or `HTTP/1.1` for a wire version such as `2.0` or `1.1`. */
export function protocolLabel(version: string | null): string {
  if (version !== null && /^2(\.0)?$/.test(version)) return 'HTTP/2';
  if (version === '1.0') return 'HTTP/1.0';
  return 'HTTP/1.1';
}

/**
 * Renders response headers as a raw header block: a status line followed
 * by one `Name: value` line per header value. Pseudo-headers are left out.
 */
export function formatHeaderText(protocol: string, status: number, statusText: string, headers: HeaderBag): string {
  const lines = [`${protocol} ${status}${statusText ? ` ${statusText}` : ''}`];

  for (const [name, value] of Object.entries(headers)) {
    if (name.startsWith(':')) continue;
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      if (typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean') {
        lines.push(`${name}: ${String(item)}`);
      }
    }
  }

  return lines.join('\r\n');
}

/** Collects at most `maxBytes` of a body; a stream cut short by the server is an error, one cut here is not. */
export function readLimited(stream: Readable, maxBytes: number): Promise<LimitedBody> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let truncated = false;
    let ended = false;
    let settled = false;

    const settle = (error?: Error): void => {
      if (settled) return;
      settled = true;
      if (error) {
        reject(error);
      } else {
        resolve({ data: Buffer.concat(chunks).toString('utf8'), truncated });
      }
    };

    stream.on('data', (chunk: Buffer) => {
      const room = maxBytes - size;
      if (chunk.length > room) {
        chunks.push(chunk.subarray(0, room));
        size = maxBytes;
        truncated = true;
        stream.destroy();
        return;
      }
      chunks.push(chunk);
      size += chunk.length;
    });

    stream.on('end', () => {
      ended = true;
      settle();
    });
    stream.on('close', () => {
      settle(ended || truncated ? undefined : new Error('Response closed before the body ended'));
    });
    stream.on('error', (err) => {
      settle(truncated ? undefined : err);
    });
  });
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

function isTimeout(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
}

export class HttpFetcher implements PageFetcher {
  private readonly requestConfig: RequestConfig;
  private readonly retryAttempts: number;
  private readonly retryDelay: number;
  private readonly maxContentSize: number;
  private readonly http2: boolean;
  private readonly logger: Logger;
  // Origins that would not open an HTTP/2 session; they are asked over HTTP/1.1 from then on
  private readonly http1Origins = new Set<string>();

  constructor(options: FetcherOptions = {}, logger?: Logger) {
    this.requestConfig = new RequestConfig(options);
    this.retryAttempts = options.retryAttempts ?? 2;
    this.retryDelay = options.retryDelay ?? 1000;
    this.maxContentSize = options.maxContentSize ?? 5 * 1024 * 1024;
    this.http2 = options.http2 ?? true;
    this.logger = logger ?? createLogger({ name: 'fetcher' });
  }

  async fetchPage(url: string): Promise<FetchResult> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        this.logger.debug(`Fetching ${url} (attempt ${attempt}/${this.retryAttempts})`);
        const { response, version } = await this.negotiate(url, { method: 'GET' });
        const { data, truncated } = await readLimited(response.data, this.maxContentSize);

        if (truncated) {
          this.logger.warn(`Content truncated at ${this.maxContentSize} bytes`, { url });
        }

        const protocol = version === 2 ? 'HTTP/2' : protocolLabel(this.wireVersionOf(response));
        const result: FetchSuccessResult = {
          ok: true,
          status: response.status,
          headers: formatHeaderText(protocol, response.status, response.statusText, response.headers),
          body: data,
          url,
          finalUrl: this.finalUrlOf(response) ?? url,
          timestamp: new Date().toISOString(),
          truncated,
        };

        return result;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        this.logger.debug(`Request failed (attempt ${attempt}): ${lastError.message}`, { url });

        if (attempt < this.retryAttempts) {
          await delay(this.retryDelay * attempt);
        }
      }
    }

    const result: FetchErrorResult = {
      ok: false,
      error: lastError?.message ?? 'Unknown error',
      status: axios.isAxiosError(lastError) ? (lastError.response?.status ?? null) : null,
      url,
      timestamp: new Date().toISOString(),
    };

    return result;
  }

  /** True only for a direct 200 answer; redirects count as absent. */
  async probeExists(url: string): Promise<boolean> {
    try {
      const { response } = await this.negotiate(url, { method: 'GET', maxRedirects: 0 });
      response.data.destroy();
      return response.status === 200;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.debug(`Probe failed: ${errorMessage}`, { url });
      return false;
    }
  }

  private async request(
    url: string,
    options: AxiosRequestConfig,
    version: ProtocolVersion
  ): Promise<AxiosResponse<Readable>> {
    return axios<Readable>({
      ...this.requestConfig.getRequestConfig(),
      ...options,
      ...(version === 2 ? { httpVersion: version } : {}),
      url,
      responseType: 'stream',
      // 4xx/5xx pages are still pages; only network failures throw
      validateStatus: () => true,
    });
  }

  private prefersHttp2(origin: string): boolean {
    return this.http2 && !this.requestConfig.usesProxy && origin.startsWith('https:') && !this.http1Origins.has(origin);
  }

  // HTTPS origins are asked over HTTP/2 first. A refused session, or a redirect the
  // HTTP/2 request did not follow, falls back to HTTP/1.1.
  private async negotiate(
    url: string,
    options: AxiosRequestConfig
  ): Promise<{ response: AxiosResponse<Readable>; version: ProtocolVersion }> {
    const origin = originOf(url);

    if (origin !== null && this.prefersHttp2(origin)) {
      try {
        const response = await this.request(url, options, 2);
        if (!isRedirect(response.status) || options.maxRedirects === 0) {
          return { response, version: 2 };
        }
        response.data.destroy();
      } catch (error) {
        if (isTimeout(error)) throw error;
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        this.logger.debug(`HTTP/2 unavailable, using HTTP/1.1: ${errorMessage}`, { url });
        this.http1Origins.add(origin);
      }
    }

    return { response: await this.request(url, options, 1), version: 1 };
  }

  // The IncomingMessage behind an HTTP/1.x response
  private incomingOf(response: AxiosResponse<Readable>): object | null {
    const request: unknown = response.request;
    if (typeof request === 'object' && request !== null && 'res' in request) {
      const res: unknown = request.res;
      if (typeof res === 'object' && res !== null) return res;
    }
    return null;
  }

  private wireVersionOf(response: AxiosResponse<Readable>): string | null {
    const res = this.incomingOf(response);
    return res !== null && 'httpVersion' in res && typeof res.httpVersion === 'string' ? res.httpVersion : null;
  }

  private finalUrlOf(response: AxiosResponse<Readable>): string | null {
    const res = this.incomingOf(response);
    return res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string' ? res.responseUrl : null;
  }
}
