import * as http from 'http';
import * as https from 'https';
import fetch from 'node-fetch';
import { BROWSER_USER_AGENT, PAGE_TIMEOUT_MS } from '../config/pipelineConfig';

export interface HttpResponse {
  /** Final URL after redirects. */
  url: string;
  status: number;
  contentType: string;
}

export interface TextResponse extends HttpResponse {
  body: string;
}

export interface BinaryResponse extends HttpResponse {
  data: Buffer;
}

export interface RequestOptions {
  timeoutMs?: number;
}

export interface HttpClient {
  getText(url: string, options?: RequestOptions): Promise<TextResponse>;
  getBuffer(url: string, options?: RequestOptions): Promise<BinaryResponse>;
  close(): void;
}

export interface NodeFetchHttpClientOptions {
  timeoutMs?: number;
  userAgent?: string;
  maxRedirects?: number;
}

/**
 * Keep-alive GET client shared by the crawler, the extraction engine and the
 * downloader of one pipeline. `close()` destroys the pooled sockets.
 */
export class NodeFetchHttpClient implements HttpClient {
  private readonly httpAgent = new http.Agent({ keepAlive: true, maxSockets: 8 });
  private readonly httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 8 });
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly maxRedirects: number;
  private closed = false;

  constructor(options: NodeFetchHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? PAGE_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? BROWSER_USER_AGENT;
    this.maxRedirects = options.maxRedirects ?? 10;
  }

  private async get(url: string, options?: RequestOptions) {
    if (this.closed) {
      throw new Error('HTTP client has been closed');
    }
    return fetch(url, {
      method: 'GET',
      redirect: 'follow',
      follow: this.maxRedirects,
      timeout: options?.timeoutMs ?? this.timeoutMs,
      headers: {
        'User-Agent': this.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/pdf;q=0.9,*/*;q=0.8',
      },
      agent: (parsed: URL) => (parsed.protocol === 'http:' ? this.httpAgent : this.httpsAgent),
    });
  }

  async getText(url: string, options?: RequestOptions): Promise<TextResponse> {
    const res = await this.get(url, options);
    return {
      url: res.url || url,
      status: res.status,
      contentType: res.headers.get('content-type') || '',
      body: await res.text(),
    };
  }

  async getBuffer(url: string, options?: RequestOptions): Promise<BinaryResponse> {
    const res = await this.get(url, options);
    return {
      url: res.url || url,
      status: res.status,
      contentType: res.headers.get('content-type') || '',
      data: Buffer.from(await res.arrayBuffer()),
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
