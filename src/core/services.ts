/**
 * Service identification from banners and well-known ports
 */

import type { BannerSignature, PortCatalog } from './catalog.js';

const HTTP_PORTS = new Set([80, 8000, 8080, 8888]);
// speak first, or need a TLS handshake before anything readable
const SILENT_PORTS = new Set([21, 22, 443]);

export class ServiceDetector {
  private services: Map<number, string>;
  private signatures: BannerSignature[];

  constructor(catalog: Pick<PortCatalog, 'services'>, signatures: BannerSignature[] = []) {
    this.services = catalog.services;
    this.signatures = signatures;
  }

  /**
   * Banner signature first, then the port's registered service
   */
  identify(port: number, banner?: string): string {
    if (banner) {
      const match = this.signatures.find((signature) => signature.pattern.test(banner));
      if (match) {
        return match.service;
      }
    }
    return this.services.get(port) ?? 'unknown';
  }
}

/**
 * Bytes to send after connecting so the service answers with something identifying
 */
export function probePayload(host: string, port: number): string | undefined {
  if (HTTP_PORTS.has(port)) {
    return `GET / HTTP/1.1\r\nHost: ${host}\r\nConnection: close\r\n\r\n`;
  }
  if (SILENT_PORTS.has(port)) {
    return undefined;
  }
  return '\r\n';
}

/**
 * Printable single-line banner, at most `maxLength` characters
 */
export function cleanBanner(raw: string, maxLength = 200): string | undefined {
  const cleaned = raw
    .replace(/\r?\n/g, ' ')
    .replace(/[\x00-\x1f\x7f]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, maxLength)
    .trim();
  return cleaned.length > 0 ? cleaned : undefined;
}
