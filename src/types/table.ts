/** Hodnota jedné buňky tabulky */
export type Cell = string | number | boolean | null;

/** Jeden list rozhodovací tabulky */
export interface RawSheet {
  name: string;
  rows: Cell[][];
}

/**
 * Dekódovaná tabulka - posloupnost listů v pořadí, v jakém byly ve zdroji.
 * Transientní: po parsování se zahazuje.
 */
export interface RawTable {
  /** Odkud tabulka pochází (cesta, název uploadu, ...) - jen pro chybové hlášky */
  source: string;
  sheets: RawSheet[];
}

export const FIELD_TYPES = ['number', 'string', 'boolean', 'any'] as const;
export type FieldType = (typeof FIELD_TYPES)[number];

export const METADATA_ROLES = ['NAME', 'PRIORITY', 'DESCRIPTION'] as const;
export type MetadataRole = (typeof METADATA_ROLES)[number];

/** Role sloupce podle klasifikačního řádku */
export type ColumnRole =
  | { kind: 'CONDITION' }
  | { kind: 'ACTION' }
  | { kind: 'METADATA'; role: MetadataRole };

/** Sloupec rozhodovací tabulky */
export interface ColumnDefinition {
  /** 0-based index sloupce v listu */
  index: number;
  role: ColumnRole;
  /** Název pole faktu (u METADATA sloupců popisek hlavičky) */
  field: string;
  fieldType: FieldType;
}

/** Buňka podmínky nebo akce spárovaná s deklarovaným polem */
export interface CellDefinition {
  field: string;
  fieldType: FieldType;
  /** Neinterpretovaný obsah buňky (ořezaný) */
  expression: string;
  column: number;
}

/** Pravidlo tak, jak ho popisuje jeden datový řádek - ještě nezkompilované */
export interface RuleDefinition {
  readonly ruleSetName: string;
  readonly ruleId: string;
  /** Vyšší = dříve */
  readonly priority: number;
  readonly description?: string;
  /** 1-based číslo řádku v listu */
  readonly row: number;
  readonly conditions: readonly CellDefinition[];
  readonly actions: readonly CellDefinition[];
}

/** Výsledek parsování jednoho listu */
export interface ParsedRuleSet {
  ruleSetName: string;
  tableName: string;
  sheetName: string;
  columns: ColumnDefinition[];
  rules: RuleDefinition[];
}
