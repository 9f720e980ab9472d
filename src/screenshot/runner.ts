/**
 * Headless Chrome screenshots
 */

import { access, mkdir } from 'fs/promises';
import { join } from 'path';
import { headerValues } from '../utils/http.js';
import { isCommandAvailable, runCommand } from '../utils/process.js';
import { logger } from '../utils/logger.js';
import type { HttpFetcher } from '../core/fingerprint.js';
import type { PageInfo } from '../core/types.js';

const BROWSER_CANDIDATES = ['chromium', 'chromium-browser', 'google-chrome', 'google-chrome-stable'];
const MAX_REDIRECTS = 5;
const MAX_TITLE_CHARS = 200;

export interface ScreenshotOptions {
  outputDir: string;
  timeoutMs?: number;
  chromePath?: string;
}

export class ScreenshotRunner {
  private outputDir: string;
  private timeoutMs: number;
  private chromePath?: string;
  private browser?: Promise<string | null>;

  constructor(options: ScreenshotOptions) {
    this.outputDir = options.outputDir;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.chromePath = options.chromePath;
  }

  /**
   * Configured browser, or the first candidate on PATH
   */
  findBrowser(): Promise<string | null> {
    this.browser ??= this.locate();
    return this.browser;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.findBrowser()) !== null;
  }

  /**
   * Capture one page. Resolves to the image path.
   */
  async capture(url: string, signal?: AbortSignal): Promise<string> {
    const browser = await this.findBrowser();
    if (!browser) {
      throw new Error('No Chrome or Chromium binary found');
    }

    await mkdir(this.outputDir, { recursive: true });
    const file = join(this.outputDir, screenshotFileName(url));

    const result = await runCommand(
      browser,
      [
        '--headless=new',
        '--disable-gpu',
        '--no-sandbox',
        '--hide-scrollbars',
        '--ignore-certificate-errors',
        '--window-size=1920,1080',
        `--screenshot=${file}`,
        url,
      ],
      { timeoutMs: this.timeoutMs, signal }
    );

    if (result.timedOut) {
      throw new Error(`Screenshot timed out after ${this.timeoutMs}ms`);
    }
    if (result.code !== 0) {
      throw new Error(`Browser exited with code ${result.code}`);
    }

    try {
      await access(file);
    } catch {
      throw new Error('Browser did not write a screenshot');
    }
    return file;
  }

  private async locate(): Promise<string | null> {
    const candidates = this.chromePath ? [this.chromePath] : BROWSER_CANDIDATES;
    for (const candidate of candidates) {
      if (await isCommandAvailable(candidate, ['--version'])) {
        logger.debug(`Using browser ${candidate}`);
        return candidate;
      }
    }
    return null;
  }
}

/**
 * `https://www.example.com:8443/` -> `www_example_com_8443_https.png`
 */
export function screenshotFileName(url: string): string {
  const parsed = new URL(url);
  const protocol = parsed.protocol.replace(':', '');
  const name = parsed.host.replace(/[^a-zA-Z0-9-]/g, '_').slice(0, 100);
  return `${name}_${protocol}.png`;
}

/**
 * Title, final URL and status of a page, following redirects by hand so the final URL is known
 */
export async function inspectPage(http: HttpFetcher, url: string, signal?: AbortSignal): Promise<PageInfo> {
  let current = url;
  for (let hops = 0; ; hops++) {
    const response = await http.get(current, { signal, maxRedirections: 0 });
    const location = headerValues(response.headers, 'location')[0];
    const redirected = response.statusCode >= 300 && response.statusCode < 400 && location !== undefined;

    if (redirected && hops < MAX_REDIRECTS) {
      current = new URL(location, current).toString();
      continue;
    }

    return {
      title: extractTitle(response.body),
      finalUrl: current,
      statusCode: response.statusCode,
      sourceLength: response.body.length,
      capturedAt: new Date().toISOString(),
    };
  }
}

export function extractTitle(html: string): string | null {
  const match = /<title[^>]*>([^<]*)<\/title>/i.exec(html);
  const title = match?.[1]?.replace(/\s+/g, ' ').trim();
  return title ? title.slice(0, MAX_TITLE_CHARS) : null;
}
