import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

import { logger } from './logger.js';
import { isRecord } from './yaml.js';

/**
 * Version of this CLI, read from the package.json next to src/ or dist/.
 */
export function getVersion(): string {
  const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (isRecord(parsed) && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug('Could not read package.json', { path: packageJsonPath, error: String(error) });
  }
  return '0.0.0';
}
