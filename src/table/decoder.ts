/**
 * Dekódování bajtů rozhodovací tabulky do {@link RawTable}.
 *
 * Podporované formáty sešitu:
 * - YAML (`application/yaml`, `.yaml`, `.yml`)
 * - JSON (`application/json`, `.json`)
 *
 * Podporované tvary dokumentu:
 *
 * ```yaml
 * # 1) pole listů
 * sheets:
 *   - name: Discounts
 *     rows:
 *       - [RuleSet, discounts]
 *       - ...
 *
 * # 2) mapa listů pod klíčem `sheets`
 * sheets:
 *   Discounts:
 *     - [RuleSet, discounts]
 *
 * # 3) mapa listů na nejvyšší úrovni
 * Discounts:
 *   - [RuleSet, discounts]
 * ```
 *
 * Deklarovaný typ musí odpovídat obsahu - binární sešit (xlsx/xls) nahraný
 * jako YAML je odmítnut, stejně jako YAML deklarovaný jako JSON.
 */

import { extname } from 'node:path';
import { parse } from 'yaml';
import type { Cell, RawSheet, RawTable } from '../types/table.js';
import { TableValidationError } from '../errors/table-validation-error.js';
import { isObject } from '../validation/types.js';

export type TableFormat = 'yaml' | 'json';

export interface DecodeOptions {
  /** MIME typ, zkratka formátu (`yaml`, `json`) nebo přípona (`.yml`) */
  contentType: string;
  /** Název zdroje do chybových hlášek */
  source?: string;
}

const CONTENT_TYPES: ReadonlyMap<string, TableFormat> = new Map([
  ['yaml', 'yaml'],
  ['yml', 'yaml'],
  ['.yaml', 'yaml'],
  ['.yml', 'yaml'],
  ['application/yaml', 'yaml'],
  ['application/x-yaml', 'yaml'],
  ['text/yaml', 'yaml'],
  ['text/x-yaml', 'yaml'],
  ['json', 'json'],
  ['.json', 'json'],
  ['application/json', 'json'],
  ['text/json', 'json'],
]);

/** Signatury binárních sešitů, které engine neumí číst */
const BINARY_SIGNATURES: ReadonlyArray<{ bytes: readonly number[]; description: string }> = [
  { bytes: [0x50, 0x4b, 0x03, 0x04], description: 'a zip archive (Excel .xlsx workbook)' },
  { bytes: [0xd0, 0xcf, 0x11, 0xe0], description: 'a legacy Excel .xls workbook' },
];

const DEFAULT_SOURCE = '<inline>';

/**
 * Převede deklarovaný content type na formát.
 *
 * @throws {TableValidationError} INVALID_FILE_FORMAT pro nepodporovaný typ
 */
export function resolveTableFormat(contentType: string, source = DEFAULT_SOURCE): TableFormat {
  const normalized = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  const format = CONTENT_TYPES.get(normalized);
  if (!format) {
    throw new TableValidationError(
      `Invalid file type "${contentType}" for '${source}'. Only YAML (.yaml, .yml) and JSON (.json) decision tables are supported.`,
      'INVALID_FILE_FORMAT',
      { source },
    );
  }
  return format;
}

/** Odvodí content type z přípony souboru (`rules/discounts.yaml` → `.yaml`). */
export function contentTypeFromPath(filePath: string): string {
  return extname(filePath).toLowerCase();
}

/**
 * Dekóduje bajty tabulky.
 *
 * @throws {TableValidationError} INVALID_FILE_FORMAT, CORRUPTED_FILE,
 *   INVALID_STRUCTURE nebo EMPTY_TABLE
 */
export function decodeTable(bytes: Uint8Array | string, options: DecodeOptions): RawTable {
  const source = options.source ?? DEFAULT_SOURCE;
  const format = resolveTableFormat(options.contentType, source);
  const text = typeof bytes === 'string' ? bytes : decodeText(bytes, format, source);

  if (text.includes('\u0000')) {
    throw new TableValidationError(
      `Declared content type "${format}" does not match the content of '${source}': the content is binary.`,
      'INVALID_FILE_FORMAT',
      { source },
    );
  }

  const content = text.startsWith('\uFEFF') ? text.slice(1) : text;
  if (content.trim() === '') {
    throw emptyWorkbook(source);
  }

  const document = parseDocument(content, format, source);
  const sheets = readSheets(document, source);
  if (sheets.length === 0) {
    throw emptyWorkbook(source);
  }

  return { source, sheets };
}

// ---------------------------------------------------------------------------
// Private
// ---------------------------------------------------------------------------

function decodeText(bytes: Uint8Array, format: TableFormat, source: string): string {
  for (const signature of BINARY_SIGNATURES) {
    if (signature.bytes.every((b, i) => bytes[i] === b)) {
      throw new TableValidationError(
        `Declared content type "${format}" does not match the content of '${source}': the file is ${signature.description}.`,
        'INVALID_FILE_FORMAT',
        { source },
      );
    }
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    throw new TableValidationError(
      `Declared content type "${format}" does not match the content of '${source}': the content is not valid UTF-8 text.`,
      'INVALID_FILE_FORMAT',
      { source },
      { cause: err },
    );
  }
}

function parseDocument(content: string, format: TableFormat, source: string): unknown {
  if (format === 'json') {
    const first = content.trimStart()[0];
    if (first !== '{' && first !== '[') {
      throw new TableValidationError(
        `Declared content type "json" does not match the content of '${source}': expected a JSON object.`,
        'INVALID_FILE_FORMAT',
        { source },
      );
    }
  }

  try {
    return format === 'json' ? JSON.parse(content) : parse(content);
  } catch (err) {
    throw new TableValidationError(
      `Error reading decision table '${source}': ${err instanceof Error ? err.message : String(err)}. The file may be corrupted or not a valid ${format.toUpperCase()} document.`,
      'CORRUPTED_FILE',
      { source },
      { cause: err },
    );
  }
}

function readSheets(document: unknown, source: string): RawSheet[] {
  if (document === null || document === undefined) {
    throw emptyWorkbook(source);
  }

  if (!isObject(document)) {
    throw new TableValidationError(
      `Decision table '${source}' must be a mapping of sheets, got ${Array.isArray(document) ? 'array' : typeof document}.`,
      'INVALID_STRUCTURE',
      { source },
    );
  }

  const sheetsField = document['sheets'];

  if (Array.isArray(sheetsField)) {
    const seen = new Set<string>();
    return sheetsField.map((item: unknown, i: number) => {
      if (!isObject(item)) {
        throw invalidStructure(source, `sheets[${i}] must be an object with "name" and "rows"`);
      }
      const name = item['name'];
      if (typeof name !== 'string' || name.trim() === '') {
        throw invalidStructure(source, `sheets[${i}].name must be a non-empty string`);
      }
      if (seen.has(name)) {
        throw invalidStructure(source, `duplicate sheet name "${name}"`);
      }
      seen.add(name);
      return { name, rows: readRows(item['rows'], name, source) };
    });
  }

  const mapping = isObject(sheetsField) ? sheetsField : document;
  return Object.entries(mapping).map(([name, rows]) => ({
    name,
    rows: readRows(rows, name, source),
  }));
}

function readRows(value: unknown, sheetName: string, source: string): Cell[][] {
  if (value === null || value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new TableValidationError(
      `Sheet '${sheetName}' in '${source}' must be a list of rows.`,
      'INVALID_STRUCTURE',
      { source, sheetName },
    );
  }

  return value.map((row: unknown, i: number) => {
    if (row === null || row === undefined) {
      return [];
    }
    if (!Array.isArray(row)) {
      throw new TableValidationError(
        `Row ${i + 1} of sheet '${sheetName}' in '${source}' must be a list of cells.`,
        'INVALID_STRUCTURE',
        { source, sheetName, row: i + 1 },
      );
    }
    return row.map((cell: unknown, column: number) => {
      if (cell === undefined || cell === null) return null;
      if (typeof cell === 'string' || typeof cell === 'number' || typeof cell === 'boolean') {
        return cell;
      }
      throw new TableValidationError(
        `Cell ${column + 1} in row ${i + 1} of sheet '${sheetName}' in '${source}' must be a scalar value.`,
        'INVALID_STRUCTURE',
        { source, sheetName, row: i + 1 },
      );
    });
  });
}

function invalidStructure(source: string, detail: string): TableValidationError {
  return new TableValidationError(
    `Decision table '${source}' has an invalid structure: ${detail}.`,
    'INVALID_STRUCTURE',
    { source },
  );
}

function emptyWorkbook(source: string): TableValidationError {
  return new TableValidationError(
    `The decision table '${source}' contains no worksheets. A valid decision table must contain at least one sheet with the required headers and data rows.`,
    'EMPTY_TABLE',
    { source },
  );
}
