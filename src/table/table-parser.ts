/**
 * Parser rozhodovacích tabulek.
 *
 * Každý list popisuje jednu sadu pravidel:
 *
 * ```
 * | RuleSet    | discounts |               |          |
 * | RuleTable  Pricing     |               |          |
 * | NAME       | CONDITION | CONDITION     | ACTION   |
 * | rule       | age:number| tier:string   | discount |
 * | senior-gold| >= 65     | GOLD          | 20       |
 * ```
 *
 * Řádky před deklarací `RuleSet` a mezi deklaracemi (poznámky) se ignorují,
 * zcela prázdné datové řádky se přeskakují. Buňky podmínek a akcí se zde
 * nevyhodnocují - jen se spárují s deklarovaným polem a typem sloupce.
 */

import type {
  Cell,
  CellDefinition,
  ColumnDefinition,
  ColumnRole,
  FieldType,
  MetadataRole,
  ParsedRuleSet,
  RawSheet,
  RawTable,
  RuleDefinition,
} from '../types/table.js';
import { FIELD_TYPES, METADATA_ROLES } from '../types/table.js';
import { TableValidationError } from '../errors/table-validation-error.js';
import { decodeTable, type DecodeOptions } from './decoder.js';

const REQUIRED_HEADERS = ['RuleSet', 'RuleTable', 'Condition', 'Action'] as const;

const FIELD_TYPE_SET: ReadonlySet<string> = new Set(FIELD_TYPES);
const METADATA_ROLE_SET: ReadonlySet<string> = new Set(METADATA_ROLES);
const INTEGER_RE = /^[+-]?\d+$/;
const RULE_SET_RE = /^rule\s*set(?:\s+(.*))?$/i;
const RULE_TABLE_RE = /^rule\s*table(?:\s+(.*))?$/i;

type SheetOutcome =
  | { kind: 'empty' }
  | { kind: 'no-data'; ruleSet: ParsedRuleSet }
  | { kind: 'parsed'; ruleSet: ParsedRuleSet };

export interface ParseBytesOptions extends DecodeOptions {
  /** Parsovat jen tento list */
  sheet?: string;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Názvy listů v pořadí, v jakém jsou ve zdroji. */
export function getSheetNames(table: RawTable): string[] {
  return table.sheets.map((s) => s.name);
}

/**
 * Naparsuje jeden pojmenovaný list.
 *
 * @throws {TableValidationError} SHEET_NOT_FOUND, když list neexistuje;
 *   EMPTY_TABLE, když list nemá datové řádky; MISSING_HEADERS /
 *   INVALID_STRUCTURE při vadné hlavičce
 */
export function parseSheet(table: RawTable, sheetName: string): ParsedRuleSet {
  const sheet = table.sheets.find((s) => s.name === sheetName);
  if (!sheet) {
    const available = getSheetNames(table).join(', ');
    throw new TableValidationError(
      `Sheet '${sheetName}' not found in '${table.source}'. Available sheets: ${available || '(none)'}.`,
      'SHEET_NOT_FOUND',
      { source: table.source, sheetName },
    );
  }

  const outcome = readSheet(sheet, table.source);
  switch (outcome.kind) {
    case 'empty':
      throw new TableValidationError(
        `Sheet '${sheetName}' in '${table.source}' is empty. A valid sheet must have the required headers and at least one data row.`,
        'EMPTY_TABLE',
        { source: table.source, sheetName },
      );
    case 'no-data':
      throw new TableValidationError(
        `Sheet '${sheetName}' in '${table.source}' contains headers but no data rows.`,
        'EMPTY_TABLE',
        { source: table.source, sheetName },
      );
    case 'parsed':
      return outcome.ruleSet;
  }
}

/**
 * Naparsuje všechny listy. Prázdné listy a listy bez datových řádků se
 * přeskočí s varováním.
 *
 * @throws {TableValidationError} EMPTY_TABLE, když žádný list nemá data
 */
export function parseAll(table: RawTable): Map<string, ParsedRuleSet> {
  const result = new Map<string, ParsedRuleSet>();

  for (const sheet of table.sheets) {
    const outcome = readSheet(sheet, table.source);
    switch (outcome.kind) {
      case 'empty':
        console.warn(`[table-parser] Skipping empty sheet '${sheet.name}' in '${table.source}'`);
        break;
      case 'no-data':
        console.warn(
          `[table-parser] Skipping sheet '${sheet.name}' in '${table.source}': contains headers but no data rows`,
        );
        break;
      case 'parsed':
        result.set(sheet.name, outcome.ruleSet);
        break;
    }
  }

  if (result.size === 0) {
    throw new TableValidationError(
      `The decision table '${table.source}' contains no valid sheets with data. Each sheet must have the required headers and at least one data row.`,
      'EMPTY_TABLE',
      { source: table.source },
    );
  }

  return result;
}

/**
 * Dekóduje a naparsuje bajty tabulky. S `options.sheet` vrací mapu s jediným
 * listem, jinak {@link parseAll}.
 */
export function parseBytes(
  bytes: Uint8Array | string,
  options: ParseBytesOptions,
): Map<string, ParsedRuleSet> {
  const table = decodeTable(bytes, options);
  if (options.sheet !== undefined) {
    return new Map([[options.sheet, parseSheet(table, options.sheet)]]);
  }
  return parseAll(table);
}

// ---------------------------------------------------------------------------
// Sheet reading
// ---------------------------------------------------------------------------

function readSheet(sheet: RawSheet, source: string): SheetOutcome {
  const rows = sheet.rows;
  if (rows.every(isBlankRow)) {
    return { kind: 'empty' };
  }

  const location = { source, sheetName: sheet.name };

  const ruleSetIdx = rows.findIndex((row) => RULE_SET_RE.test(firstText(row)));
  const ruleTableIdx = rows.findIndex(
    (row, i) => i > ruleSetIdx && RULE_TABLE_RE.test(firstText(row)),
  );
  const roleIdx =
    ruleTableIdx >= 0 ? nextNonBlank(rows, ruleTableIdx + 1) : rows.findIndex(hasRoleCell);
  const roleRow = roleIdx >= 0 ? rows[roleIdx] ?? [] : [];

  const missing = REQUIRED_HEADERS.filter((header) => {
    switch (header) {
      case 'RuleSet':
        return ruleSetIdx < 0;
      case 'RuleTable':
        return ruleTableIdx < 0;
      case 'Condition':
        return !roleRow.some((c) => normalize(c) === 'CONDITION');
      case 'Action':
        return !roleRow.some((c) => normalize(c) === 'ACTION');
    }
  });

  if (missing.length > 0) {
    throw new TableValidationError(
      `Sheet '${sheet.name}' in '${source}' is missing required headers: ${missing.join(', ')}. ` +
        `Expected a 'RuleSet' row, a 'RuleTable' row and a column role row with at least one CONDITION and one ACTION column.`,
      'MISSING_HEADERS',
      location,
    );
  }

  const ruleSetName = declarationValue(rows[ruleSetIdx] ?? [], RULE_SET_RE);
  if (ruleSetName === '') {
    throw new TableValidationError(
      `Sheet '${sheet.name}' in '${source}' declares a RuleSet without a name (row ${ruleSetIdx + 1}).`,
      'INVALID_STRUCTURE',
      { ...location, row: ruleSetIdx + 1 },
    );
  }
  const tableName =
    declarationValue(rows[ruleTableIdx] ?? [], RULE_TABLE_RE) || ruleSetName;

  const headerIdx = nextNonBlank(rows, roleIdx + 1);
  if (headerIdx < 0) {
    throw new TableValidationError(
      `Sheet '${sheet.name}' in '${source}' has no header row naming the fields of its columns.`,
      'INVALID_STRUCTURE',
      location,
    );
  }

  const columns = readColumns(roleRow, rows[headerIdx] ?? [], sheet.name, source, roleIdx + 1);

  const rules: RuleDefinition[] = [];
  for (let i = headerIdx + 1; i < rows.length; i++) {
    const row = rows[i] ?? [];
    if (isBlankRow(row)) continue;
    rules.push(readRule(row, i + 1, columns, ruleSetName, tableName, sheet.name, source));
  }

  const ruleSet: ParsedRuleSet = {
    ruleSetName,
    tableName,
    sheetName: sheet.name,
    columns,
    rules,
  };

  return rules.length === 0 ? { kind: 'no-data', ruleSet } : { kind: 'parsed', ruleSet };
}

function readColumns(
  roleRow: readonly Cell[],
  headerRow: readonly Cell[],
  sheetName: string,
  source: string,
  roleRowNumber: number,
): ColumnDefinition[] {
  const columns: ColumnDefinition[] = [];
  const seenMetadata = new Set<MetadataRole>();

  roleRow.forEach((cell, index) => {
    const roleText = normalize(cell);
    if (roleText === '') return;

    const role = toColumnRole(roleText);
    if (!role) {
      throw new TableValidationError(
        `Sheet '${sheetName}' in '${source}' has an unknown column role "${cellText(cell)}" in column ${index + 1} (row ${roleRowNumber}). ` +
          `Expected CONDITION, ACTION, ${METADATA_ROLES.join(', ')}.`,
        'INVALID_STRUCTURE',
        { source, sheetName, row: roleRowNumber },
      );
    }

    if (role.kind === 'METADATA') {
      if (seenMetadata.has(role.role)) {
        throw new TableValidationError(
          `Sheet '${sheetName}' in '${source}' declares the ${role.role} column more than once.`,
          'INVALID_STRUCTURE',
          { source, sheetName, row: roleRowNumber },
        );
      }
      seenMetadata.add(role.role);
      columns.push({
        index,
        role,
        field: cellText(headerRow[index] ?? null) || role.role.toLowerCase(),
        fieldType: role.role === 'PRIORITY' ? 'number' : 'string',
      });
      return;
    }

    const header = cellText(headerRow[index] ?? null);
    const { field, fieldType } = splitHeader(header, sheetName, source, roleRowNumber + 1, index);
    if (field === '') {
      throw new TableValidationError(
        `Sheet '${sheetName}' in '${source}' has a ${role.kind} column without a field name in column ${index + 1}.`,
        'INVALID_STRUCTURE',
        { source, sheetName },
      );
    }
    columns.push({ index, role, field, fieldType });
  });

  return columns;
}

function readRule(
  row: readonly Cell[],
  rowNumber: number,
  columns: readonly ColumnDefinition[],
  ruleSetName: string,
  tableName: string,
  sheetName: string,
  source: string,
): RuleDefinition {
  const conditions: CellDefinition[] = [];
  const actions: CellDefinition[] = [];
  let name = '';
  let priority = 0;
  let description = '';

  for (const column of columns) {
    const text = cellText(row[column.index] ?? null);

    switch (column.role.kind) {
      case 'CONDITION':
        conditions.push(cellDefinition(column, text));
        break;
      case 'ACTION':
        actions.push(cellDefinition(column, text));
        break;
      case 'METADATA':
        if (column.role.role === 'NAME') {
          name = text;
        } else if (column.role.role === 'DESCRIPTION') {
          description = text;
        } else if (text !== '') {
          priority = INTEGER_RE.test(text) ? Number.parseInt(text, 10) : Number.NaN;
          if (!Number.isSafeInteger(priority)) {
            throw new TableValidationError(
              `Sheet '${sheetName}' in '${source}' has an invalid priority "${text}" in row ${rowNumber}; expected a whole number.`,
              'INVALID_STRUCTURE',
              { source, sheetName, row: rowNumber },
            );
          }
        }
        break;
    }
  }

  return Object.freeze({
    ruleSetName,
    ruleId: name || `${tableName}_${rowNumber}`,
    priority,
    ...(description !== '' && { description }),
    row: rowNumber,
    conditions: Object.freeze(conditions),
    actions: Object.freeze(actions),
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function cellDefinition(column: ColumnDefinition, expression: string): CellDefinition {
  return Object.freeze({
    field: column.field,
    fieldType: column.fieldType,
    expression,
    column: column.index,
  });
}

function splitHeader(
  header: string,
  sheetName: string,
  source: string,
  rowNumber: number,
  index: number,
): { field: string; fieldType: FieldType } {
  const colon = header.lastIndexOf(':');
  if (colon < 0) {
    return { field: header, fieldType: 'any' };
  }

  const field = header.slice(0, colon).trim();
  const type = header.slice(colon + 1).trim().toLowerCase();
  if (!isFieldType(type)) {
    throw new TableValidationError(
      `Sheet '${sheetName}' in '${source}' declares an unknown field type "${type}" in column ${index + 1}. ` +
        `Expected one of: ${FIELD_TYPES.join(', ')}.`,
      'INVALID_STRUCTURE',
      { source, sheetName, row: rowNumber },
    );
  }
  return { field, fieldType: type };
}

function isFieldType(value: string): value is FieldType {
  return FIELD_TYPE_SET.has(value);
}

function isMetadataRole(value: string): value is MetadataRole {
  return METADATA_ROLE_SET.has(value);
}

function toColumnRole(roleText: string): ColumnRole | undefined {
  if (roleText === 'CONDITION') return { kind: 'CONDITION' };
  if (roleText === 'ACTION') return { kind: 'ACTION' };
  if (isMetadataRole(roleText)) return { kind: 'METADATA', role: roleText };
  return undefined;
}

function cellText(cell: Cell): string {
  if (cell === null) return '';
  return typeof cell === 'string' ? cell.trim() : String(cell);
}

function normalize(cell: Cell): string {
  return cellText(cell).toUpperCase();
}

function isBlankRow(row: readonly Cell[]): boolean {
  return row.every((c) => cellText(c) === '');
}

function hasRoleCell(row: readonly Cell[]): boolean {
  return row.some((c) => {
    const role = normalize(c);
    return role === 'CONDITION' || role === 'ACTION';
  });
}

function nextNonBlank(rows: readonly (readonly Cell[])[], from: number): number {
  for (let i = from; i < rows.length; i++) {
    if (!isBlankRow(rows[i] ?? [])) return i;
  }
  return -1;
}

function firstText(row: readonly Cell[]): string {
  return row.map(cellText).find((c) => c !== '') ?? '';
}

/**
 * Hodnota deklarace: text za klíčovým slovem v téže buňce
 * (`RuleTable Pricing`), jinak další neprázdná buňka řádku.
 */
function declarationValue(row: readonly Cell[], keyword: RegExp): string {
  const cells = row.map(cellText);
  const keywordIdx = cells.findIndex((c) => c !== '');
  const inline = keyword.exec(cells[keywordIdx] ?? '')?.[1]?.trim() ?? '';
  if (inline !== '') return inline;
  return cells.slice(keywordIdx + 1).find((c) => c !== '') ?? '';
}
