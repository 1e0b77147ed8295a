/**
 * CLI typy pro tabula-rules.
 */

import type { ValidationIssue } from '../validation/types.js';
import type { SheetSummary } from '../types/engine.js';
import type { Fact, FiredRuleTrace } from '../types/fact.js';

/** Podporované výstupní formáty */
export const OUTPUT_FORMATS = ['json', 'pretty'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Exit kódy CLI */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  InvalidArguments: 2,
  ValidationError: 3,
  FileNotFound: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Globální CLI options */
export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  noColor: boolean;
  /** Cesta ke konfiguraci enginu (tabula.config.*) */
  config: string | undefined;
}

/** Výstup příkazu validate */
export interface ValidationOutput {
  file: string;
  valid: boolean;
  fingerprint: string;
  rulesCount: number;
  sheets: SheetSummary[];
  errors: ValidationIssue[];
}

/** Stav jednoho listu v příkazu sheets */
export type SheetStatus =
  | { name: string; status: 'ok'; ruleSetName: string; tableName: string; rulesCount: number }
  | { name: string; status: 'skipped' | 'invalid'; message: string };

/** Výstup příkazu sheets */
export interface SheetsOutput {
  file: string;
  sheets: SheetStatus[];
}

/** Výstup příkazu evaluate */
export interface EvaluationOutput {
  file: string;
  ruleSetName: string;
  fact: Fact;
  trace: FiredRuleTrace;
  rulesEvaluated: number;
  rulesFired: number;
  halted: boolean;
}

/** Formátovatelná data pro výstup */
export type FormattableData = (
  | { type: 'validation'; data: ValidationOutput }
  | { type: 'sheets'; data: SheetsOutput }
  | { type: 'evaluation'; data: EvaluationOutput }
  | { type: 'message'; data: string }
  | { type: 'error'; data: string }
) & { meta?: Record<string, unknown> };
