/**
 * Locations of bundled data files
 */

import { fileURLToPath } from 'url';
import { join } from 'path';

const TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

export function templatePath(...segments: string[]): string {
  return join(TEMPLATES_DIR, ...segments);
}
