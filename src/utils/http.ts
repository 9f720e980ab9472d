/**
 * HTTP utilities with connection pooling
 */

import { request, Agent } from 'undici';

export type HttpHeaders = Record<string, string | string[] | undefined>;

export interface HttpResponse {
  statusCode: number;
  headers: HttpHeaders;
  body: string;
}

const MAX_BODY_CHARS = 512 * 1024;

/**
 * Create a persistent HTTP agent. Recon targets often present self-signed certificates.
 */
export function createHttpAgent() {
  return new Agent({
    connections: 100,
    keepAliveTimeout: 10000,
    keepAliveMaxTimeout: 60000,
    connect: { rejectUnauthorized: false },
  });
}

/**
 * HTTP client with timeout
 */
export class HttpClient {
  private agent: Agent;
  private timeout: number;
  private userAgent: string;

  constructor(timeout = 10000, userAgent = 'reconpipe/1.0') {
    this.agent = createHttpAgent();
    this.timeout = timeout;
    this.userAgent = userAgent;
  }

  async get(url: string, options: { signal?: AbortSignal; maxRedirections?: number } = {}): Promise<HttpResponse> {
    try {
      const response = await request(url, {
        method: 'GET',
        headers: { 'user-agent': this.userAgent },
        maxRedirections: options.maxRedirections ?? 5,
        headersTimeout: this.timeout,
        bodyTimeout: this.timeout,
        dispatcher: this.agent,
        throwOnError: false,
        signal: options.signal,
      });

      const body = await response.body.text();

      return {
        statusCode: response.statusCode,
        headers: response.headers,
        body: body.slice(0, MAX_BODY_CHARS),
      };
    } catch (error) {
      throw new Error(`HTTP GET ${url} failed: ${error instanceof Error ? error.message : 'Unknown error'}`, {
        cause: error,
      });
    }
  }

  async close() {
    await this.agent.close();
  }
}

/**
 * All values of a header as a list
 */
export function headerValues(headers: HttpHeaders, name: string): string[] {
  const value = headers[name.toLowerCase()];
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}
