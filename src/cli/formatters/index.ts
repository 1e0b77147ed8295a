/**
 * Výběr formátteru podle `--format`.
 */

import type { FormattableData, OutputFormat } from '../types.js';
import { JsonFormatter } from './json-formatter.js';
import { PrettyFormatter } from './pretty-formatter.js';

/** Převádí výstup příkazu na text pro terminál */
export interface OutputFormatter {
  format(data: FormattableData): string;
}

/**
 * JSON výstup je vždy odsazený (čte ho člověk i `jq`); barvy se týkají jen
 * pretty výstupu.
 */
export function createFormatter(format: OutputFormat, useColors = true): OutputFormatter {
  return format === 'json' ? new JsonFormatter(true) : new PrettyFormatter(useColors);
}

export { JsonFormatter } from './json-formatter.js';
export { PrettyFormatter } from './pretty-formatter.js';
