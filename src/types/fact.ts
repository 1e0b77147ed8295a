/**
 * Fakt - záznam předaný volajícím, vyhodnocovaný a měněný na místě.
 * Vlastníkem zůstává volající; engine ho drží jen po dobu jednoho vyhodnocení.
 */
export type Fact = Record<string, unknown>;

/** Záznam o vystřelení pravidla */
export interface FiredRule {
  ruleId: string;
  /** Pořadí vystřelení v rámci jednoho vyhodnocení (od 1) */
  firedAtSequence: number;
}

export type FiredRuleTrace = FiredRule[];

/** Fáze vyhodnocení - FAILED je absorpční */
export const EVALUATION_PHASES = [
  'start',
  'context_acquired',
  'matching',
  'acting',
  'done',
  'failed',
] as const;
export type EvaluationPhase = (typeof EVALUATION_PHASES)[number];

/** Výsledek jednoho vyhodnocení */
export interface EvaluationResult<T extends Fact = Fact> {
  /** Tentýž objekt, který předal volající - po aplikaci akcí */
  fact: T;
  trace: FiredRuleTrace;
  ruleSetId: string;
  ruleSetName: string;
  rulesEvaluated: number;
  rulesFired: number;
  /** Zda některé pravidlo ukončilo vyhodnocení akcí halt */
  halted: boolean;
  durationMs: number;
}

/** Výsledek jedné položky dávky - pořadí odpovídá vstupu */
export type BatchItemResult<T extends Fact = Fact> =
  | { status: 'fulfilled'; index: number; value: EvaluationResult<T> }
  | { status: 'rejected'; index: number; error: Error };
