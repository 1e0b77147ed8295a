/**
 * Příkaz sheets pro CLI.
 * Vypíše listy sešitu a to, zda z nich lze načíst sadu pravidel.
 */

import type { GlobalOptions, SheetStatus } from '../types.js';
import { decodeTable } from '../../table/decoder.js';
import { getSheetNames, parseSheet } from '../../table/table-parser.js';
import { TableValidationError } from '../../errors/table-validation-error.js';
import { printData } from '../utils/output.js';
import { loadTableFile } from '../utils/table-file.js';

export type SheetsOptions = GlobalOptions;

/**
 * Akce příkazu sheets. Vadný list se jen ohlásí, chyba celého souboru
 * (formát, poškození) příkaz ukončí.
 */
export async function sheetsCommand(file: string, _options: SheetsOptions): Promise<void> {
  const loaded = await loadTableFile(file);
  const table = decodeTable(loaded.bytes, { contentType: loaded.contentType, source: loaded.path });

  const sheets = getSheetNames(table).map((name): SheetStatus => {
    try {
      const parsed = parseSheet(table, name);
      return {
        name,
        status: 'ok',
        ruleSetName: parsed.ruleSetName,
        tableName: parsed.tableName,
        rulesCount: parsed.rules.length,
      };
    } catch (error) {
      if (!(error instanceof TableValidationError)) throw error;
      return {
        name,
        status: error.errorType === 'EMPTY_TABLE' ? 'skipped' : 'invalid',
        message: error.message,
      };
    }
  });

  printData({ type: 'sheets', data: { file: loaded.path, sheets } });
}
