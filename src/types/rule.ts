import type { FieldType } from './table.js';
import type { Fact } from './fact.js';
import type { EvaluationContext } from '../pool/evaluation-context.js';

/** Skalární literál z buňky tabulky */
export type Scalar = string | number | boolean;

/** Podmínka nad jedním polem - uzavřená množina variant */
export type ConditionOperator =
  | { kind: 'wildcard' }                                   // Prázdná buňka - bez omezení
  | { kind: 'eq'; operand: Scalar }
  | { kind: 'neq'; operand: Scalar }
  | { kind: 'gt' | 'gte' | 'lt' | 'lte'; operand: number }
  | { kind: 'between'; min: number; max: number }          // Včetně hranic
  | { kind: 'in'; operands: Scalar[] };

export type ConditionKind = ConditionOperator['kind'];

/** Efekt akce nad jedním polem */
export type ActionOperation =
  | { kind: 'set'; value: Scalar }
  | { kind: 'add'; amount: number }
  | { kind: 'subtract'; amount: number }
  | { kind: 'append'; label: Scalar }
  | { kind: 'halt' };

export type ActionKind = ActionOperation['kind'];

export interface CompiledCondition {
  field: string;
  operator: ConditionOperator;
  /** Původní text buňky pro diagnostiku */
  expression: string;
}

export interface CompiledAction {
  field: string;
  operation: ActionOperation;
  expression: string;
}

/** Pravidlo připravené k vyhodnocení */
export interface CompiledRule {
  readonly ruleId: string;
  readonly priority: number;
  /** Pořadí řádku ve zdrojové tabulce - rozhoduje při shodné prioritě */
  readonly order: number;
  readonly row: number;
  readonly description?: string;
  readonly conditions: readonly CompiledCondition[];
  readonly actions: readonly CompiledAction[];

  /** AND všech neprázdných podmínek */
  matches(fact: Fact, memory: ReadonlyMap<string, unknown>): boolean;

  /** Aplikuje akce pravidla na fakt a kontext */
  apply(fact: Fact, context: EvaluationContext): void;
}

/** Zkompilovaná, neměnná sada pravidel jednoho listu */
export interface ExecutableRuleSet {
  readonly ruleSetName: string;
  readonly tableName: string;
  readonly sheetName: string;
  /** Seřazeno podle priority (sestupně), shody podle pořadí řádků */
  readonly rules: readonly CompiledRule[];
  /** SHA-256 bajtů zdrojové tabulky */
  readonly fingerprint: string;
  readonly compiledAt: number;
}

/** Deklarované typy polí faktu; pole mimo schéma jsou při kompilaci chybou */
export type FactSchema = Readonly<Record<string, FieldType>>;
