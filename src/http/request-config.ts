import { SocksProxyAgent } from 'socks-proxy-agent';
import type { AxiosRequestConfig } from 'axios';
import type { FetcherOptions } from '../types/index.js';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko)';

export class RequestConfig {
  private readonly timeout: number;
  private readonly userAgent: string;
  private readonly proxyUrl: string | null;

  constructor(options: FetcherOptions = {}) {
    this.timeout = options.timeout ?? 15000;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.proxyUrl = options.proxyUrl ?? null;
  }

  get usesProxy(): boolean {
    return this.proxyUrl !== null;
  }

  createProxyAgent(): SocksProxyAgent | null {
    return this.proxyUrl ? new SocksProxyAgent(this.proxyUrl) : null;
  }

  getRequestConfig(): AxiosRequestConfig {
    const agent = this.createProxyAgent();

    return {
      ...(agent ? { httpAgent: agent, httpsAgent: agent } : {}),
      timeout: this.timeout,
      maxRedirects: 5,
      responseEncoding: 'utf8',
      headers: {
        'User-Agent': this.userAgent,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
        'Accept-Encoding': 'gzip, deflate',
      },
    };
  }
}
