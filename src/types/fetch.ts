export interface FetcherOptions {
  timeout?: number | undefined;
  userAgent?: string | undefined;
  retryAttempts?: number | undefined;
  retryDelay?: number | undefined;
  maxContentSize?: number | undefined;
  proxyUrl?: string | undefined;
  /** Ask HTTPS origins for HTTP/2 before HTTP/1.1; ignored behind a proxy */
  http2?: boolean | undefined;
}

export type FetchResult = FetchSuccessResult | FetchErrorResult;

export interface FetchSuccessResult {
  ok: true;
  status: number;
  /** Status line followed by one `Name: value` line per header */
  headers: string;
  body: string;
  url: string;
  finalUrl: string;
  timestamp: string;
  /** True if the body was cut off at maxContentSize */
  truncated: boolean;
}

export interface FetchErrorResult {
  ok: false;
  error: string;
  status: number | null;
  url: string;
  timestamp: string;
}

/** What the analyzer needs from the network. */
export interface PageFetcher {
  fetchPage(url: string): Promise<FetchResult>;
  probeExists(url: string): Promise<boolean>;
}

export interface FileProbe {
  name: string;
  path: string;
}
