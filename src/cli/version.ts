/**
 * CLI verze - načtená z package.json.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { isObject } from '../validation/types.js';

function loadVersion(): string {
  // src/cli i dist/cli leží dvě úrovně pod kořenem balíčku
  const packagePath = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    const version = isObject(packageJson) ? packageJson['version'] : undefined;
    return typeof version === 'string' ? version : '0.0.0';
  } catch (error) {
    console.warn(`[cli] Cannot read version from ${packagePath}:`, error instanceof Error ? error.message : error);
    return '0.0.0';
  }
}

export const version = loadVersion();
