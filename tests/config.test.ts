/**
 * Tests for configuration resolution
 */

import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../src/core/config.js';
import { ConfigurationError } from '../src/core/errors.js';

describe('resolveConfig', () => {
  it('should fill in defaults', () => {
    const config = resolveConfig({ domain: 'Example.COM' });

    expect(config).toMatchObject({
      target: 'example.com',
      workers: 10,
      timeoutMs: 3000,
      bannerTimeoutMs: 1500,
      enrichmentTimeoutMs: 15000,
      screenshotTimeoutMs: 30000,
      retries: 1,
      portProfile: 'common',
      outputDir: 'output',
      format: 'text',
      wildcardPolicy: 'keep',
      phases: { subdomains: true, ports: true, technologies: true, screenshots: true, report: true },
    });
    expect(config.maxRunTimeMs).toBeUndefined();
    expect(config.ports).toBeUndefined();
  });

  it('should normalize a URL-shaped target', () => {
    expect(resolveConfig({ domain: 'https://www.Example.com:8443/login' }).target).toBe('www.example.com');
  });

  it('should keep the banner timeout at 250ms or more', () => {
    expect(resolveConfig({ domain: 'example.com', timeout: 100 }).bannerTimeoutMs).toBe(250);
  });

  it('should sort and deduplicate explicit ports', () => {
    expect(resolveConfig({ domain: 'example.com', ports: [443, 80, 443] }).ports).toEqual([80, 443]);
  });

  it('should merge partial phase flags over the defaults', () => {
    const config = resolveConfig({ domain: 'example.com', phases: { screenshots: false } });

    expect(config.phases).toEqual({ subdomains: true, ports: true, technologies: true, screenshots: false, report: true });
  });

  it('should reject an invalid domain', () => {
    expect(() => resolveConfig({ domain: 'not a domain' })).toThrow(new ConfigurationError('Invalid domain: not a domain'));
  });

  it('should reject a worker count below 1', () => {
    expect(() => resolveConfig({ domain: 'example.com', workers: 0 })).toThrow(
      'Workers must be an integer between 1 and 1000, got 0'
    );
  });

  it('should reject a non-positive timeout', () => {
    expect(() => resolveConfig({ domain: 'example.com', timeout: 0 })).toThrow(
      'Timeout must be a positive number of milliseconds, got 0'
    );
  });

  it('should reject out-of-range and empty port lists', () => {
    expect(() => resolveConfig({ domain: 'example.com', ports: [80, 70000] })).toThrow('Invalid ports: 70000');
    expect(() => resolveConfig({ domain: 'example.com', ports: [] })).toThrow('Port list is empty');
  });

  it('should reject a non-positive maximum run time', () => {
    expect(() => resolveConfig({ domain: 'example.com', maxRunTime: -5 })).toThrow(ConfigurationError);
  });
});
