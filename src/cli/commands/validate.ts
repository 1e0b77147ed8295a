/**
 * Příkaz validate pro CLI.
 * Naparsuje a zkompiluje všechny listy tabulky a vypíše počty pravidel.
 */

import type { GlobalOptions, ValidationOutput } from '../types.js';
import { ValidationError } from '../utils/errors.js';
import { printData } from '../utils/output.js';
import { loadTableFile, startCommandEngine } from '../utils/table-file.js';

/** Options pro příkaz validate */
export interface ValidateOptions extends GlobalOptions {
  /** Validovat jen tento list */
  sheet: string | undefined;
}

/**
 * Akce příkazu validate.
 */
export async function validateCommand(file: string, options: ValidateOptions): Promise<void> {
  const table = await loadTableFile(file);
  const engine = await startCommandEngine(options.config);

  try {
    const report = engine.validateTable(table.bytes, {
      contentType: table.contentType,
      source: table.path,
      ...(options.sheet !== undefined && { sheet: options.sheet }),
    });

    const output: ValidationOutput = {
      file: table.path,
      valid: report.valid,
      fingerprint: report.fingerprint,
      rulesCount: report.sheets.reduce((sum, sheet) => sum + sheet.rulesCount, 0),
      sheets: report.sheets,
      errors: report.errors,
    };

    printData({ type: 'validation', data: output });

    if (!report.valid) {
      throw new ValidationError(`Validation failed with ${report.errors.length} error(s)`, report.errors);
    }
  } finally {
    await engine.stop();
  }
}
