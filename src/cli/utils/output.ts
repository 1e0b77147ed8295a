/**
 * Výstupní utility pro CLI.
 */

import type { OutputFormat, FormattableData } from '../types.js';
import { createFormatter } from '../formatters/index.js';

export interface OutputOptions {
  quiet: boolean;
  noColor: boolean;
  format: OutputFormat;
}

/** Globální nastavení výstupu */
let outputOptions: OutputOptions = {
  quiet: false,
  noColor: false,
  format: 'pretty'
};

/** Nastaví globální options */
export function setOutputOptions(options: Partial<OutputOptions>): void {
  outputOptions = { ...outputOptions, ...options };
}

/** Získá aktuální options */
export function getOutputOptions(): OutputOptions {
  return { ...outputOptions };
}

/** Detekce podpory barev */
export function supportsColor(): boolean {
  if (outputOptions.noColor) {
    return false;
  }

  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }

  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }

  if (!process.stdout.isTTY) {
    return false;
  }

  return true;
}

/** Vypíše na stdout */
export function print(message: string): void {
  if (!outputOptions.quiet) {
    console.log(message);
  }
}

/** Vypíše na stderr */
export function printError(message: string): void {
  console.error(message);
}

/** Vypíše formátovaná data */
export function printData(data: FormattableData): void {
  if (outputOptions.quiet && data.type !== 'error') {
    return;
  }

  const formatter = createFormatter(outputOptions.format, supportsColor());
  const output = formatter.format(data);

  if (data.type === 'error') {
    printError(output);
  } else {
    print(output);
  }
}
