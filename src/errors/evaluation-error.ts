import type { EvaluationPhase } from '../types/fact.js';
import { TabulaError } from './tabula-error.js';

export interface EvaluationErrorDetails {
  ruleSetId: string;
  /** Identita faktu (id / key / name) nebo '<anonymous>' */
  factId: string;
  /** Fáze, ve které vyhodnocení selhalo */
  phase: EvaluationPhase;
  /** Pravidlo, jehož podmínka nebo akce selhala */
  ruleId?: string;
}

/**
 * Neočekávaná chyba při matchování nebo aplikaci akcí.
 *
 * Kontext je v okamžiku vyhození již vrácen do poolu (nebo zlikvidován);
 * původní chyba je dostupná přes `cause`.
 */
export class EvaluationError extends TabulaError {
  override readonly statusCode = 500;
  override readonly code = 'RULE_EVALUATION_ERROR';
  readonly ruleSetId: string;
  readonly factId: string;
  readonly phase: EvaluationPhase;
  readonly ruleId: string | undefined;

  constructor(details: EvaluationErrorDetails, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const where = details.ruleId !== undefined ? ` in rule "${details.ruleId}"` : '';
    super(
      `Evaluation of fact "${details.factId}" against rule set "${details.ruleSetId}" failed during ${details.phase}${where}: ${reason}`,
      { cause },
    );
    this.name = 'EvaluationError';
    this.ruleSetId = details.ruleSetId;
    this.factId = details.factId;
    this.phase = details.phase;
    this.ruleId = details.ruleId;
  }
}

/** Požadovaná sada pravidel není registrována. */
export class UnknownRuleSetError extends TabulaError {
  override readonly statusCode = 404;
  override readonly code = 'RULE_SET_NOT_FOUND';
  readonly ruleSetId: string;

  constructor(ruleSetId: string) {
    super(`Rule set "${ruleSetId}" is not registered`);
    this.name = 'UnknownRuleSetError';
    this.ruleSetId = ruleSetId;
  }
}
