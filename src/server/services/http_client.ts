import fetch from 'node-fetch';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';

export interface HttpRequestOptions {
  headers: Record<string, string>;
  timeoutMs: number;
  /** Stop reading after this many characters; 0 reads everything */
  maxChars: number;
}

export interface HttpTextResponse {
  status: number;
  body: string;
}

/**
 * Minimal GET-text client. Implementations throw on network failure and
 * timeouts; HTTP error statuses are returned, not thrown.
 */
export interface HttpClient {
  getText(url: string, options: HttpRequestOptions): Promise<HttpTextResponse>;
  close(): void;
}

export class FetchHttpClient implements HttpClient {
  private readonly httpsAgent = new HttpsAgent({ keepAlive: true, maxSockets: 10 });
  private readonly httpAgent = new HttpAgent({ keepAlive: true, maxSockets: 10 });

  async getText(url: string, options: HttpRequestOptions): Promise<HttpTextResponse> {
    const response = await fetch(url, {
      headers: options.headers,
      timeout: options.timeoutMs,
      agent: (parsed: URL) => (parsed.protocol === 'http:' ? this.httpAgent : this.httpsAgent),
      redirect: 'follow'
    });

    if (response.status !== 200 || options.maxChars <= 0) {
      return { status: response.status, body: await response.text() };
    }

    let body = '';
    for await (const chunk of response.body) {
      body += chunk.toString();
      if (body.length >= options.maxChars) break;
    }
    return { status: response.status, body: body.slice(0, options.maxChars) };
  }

  close(): void {
    this.httpsAgent.destroy();
    this.httpAgent.destroy();
  }
}
