/**
 * Web technology fingerprinting
 */

import { headerValues, type HttpResponse } from '../utils/http.js';
import { logger } from '../utils/logger.js';
import { parseWhatWebOutput, type WhatWebRunner } from '../whatweb/runner.js';
import { errorMessage } from './errors.js';
import type { SignatureCatalog } from './catalog.js';
import type { DetectedTechnology } from './types.js';

export interface HttpFetcher {
  get(url: string, options?: { signal?: AbortSignal; maxRedirections?: number }): Promise<HttpResponse>;
  close?(): Promise<void>;
}

export interface Fingerprint {
  statusCode: number;
  technologies: DetectedTechnology[];
}

export interface Fingerprinter {
  fingerprint(url: string, signal: AbortSignal): Promise<Fingerprint>;
}

/**
 * Fetches a URL and matches headers, body and cookies against the signature catalog.
 * WhatWeb, when given, adds to the result; its failure alone does not fail the endpoint.
 */
export class HttpFingerprinter implements Fingerprinter {
  private http: HttpFetcher;
  private signatures: SignatureCatalog;
  private whatweb?: WhatWebRunner;

  constructor(http: HttpFetcher, signatures: SignatureCatalog, whatweb?: WhatWebRunner) {
    this.http = http;
    this.signatures = signatures;
    this.whatweb = whatweb;
  }

  async fingerprint(url: string, signal: AbortSignal): Promise<Fingerprint> {
    const response = await this.http.get(url, { signal });
    let technologies = analyzeResponse(response, this.signatures);

    if (this.whatweb) {
      try {
        const output = await this.whatweb.fingerprint(url, signal);
        technologies = mergeTechnologies(technologies, parseWhatWebOutput(output, this.signatures.whatweb));
      } catch (error) {
        logger.debug(`whatweb failed for ${url}: ${errorMessage(error)}`);
      }
    }

    return { statusCode: response.statusCode, technologies };
  }
}

/**
 * Match one response against header, content and cookie signatures
 */
export function analyzeResponse(response: HttpResponse, signatures: SignatureCatalog): DetectedTechnology[] {
  const found: DetectedTechnology[] = [];

  for (const signature of signatures.headers) {
    const values = headerValues(response.headers, signature.header);
    if (values.some((value) => signature.pattern.test(value))) {
      found.push({ name: signature.name, category: signature.category, source: 'headers' });
    }
  }

  for (const signature of signatures.content) {
    if (signature.pattern.test(response.body)) {
      found.push({ name: signature.name, category: signature.category, source: 'content' });
    }
  }

  const cookies = cookieNames(headerValues(response.headers, 'set-cookie'));
  for (const signature of signatures.cookies) {
    if (cookies.some((name) => signature.pattern.test(name))) {
      found.push({ name: signature.name, category: signature.category, source: 'cookies' });
    }
  }

  return mergeTechnologies(found, []);
}

/**
 * Concatenate, keeping the first occurrence of each category and name
 */
export function mergeTechnologies(
  primary: DetectedTechnology[],
  secondary: DetectedTechnology[]
): DetectedTechnology[] {
  const seen = new Set<string>();
  return [...primary, ...secondary].filter((technology) => {
    const key = `${technology.category}:${technology.name.toLowerCase()}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

function cookieNames(setCookie: string[]): string[] {
  return setCookie
    .map((cookie) => cookie.split(';', 1)[0]?.split('=', 1)[0]?.trim() ?? '')
    .filter((name) => name.length > 0);
}
