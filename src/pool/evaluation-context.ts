import type { EvaluationPhase, FiredRule, FiredRuleTrace } from '../types/fact.js';

export interface EvaluationContextOptions {
  id: string;
  ruleSetName: string;
  /** Generace poolu, ve které byl kontext vytvořen */
  generation: number;
}

/**
 * Znovupoužitelný pracovní kontext jednoho vyhodnocení.
 *
 * Mezi `borrow` a `release` patří právě jednomu vyhodnocení. Drží pracovní
 * paměť (`$` proměnné), trace vystřelených pravidel a čítače; `reset()` ho
 * vrací do stavu po vytvoření.
 */
export class EvaluationContext {
  readonly id: string;
  readonly ruleSetName: string;
  readonly generation: number;
  readonly workingMemory = new Map<string, unknown>();

  private readonly firedRules: FiredRule[] = [];
  private _rulesEvaluated = 0;
  private _sequence = 0;
  private _halted = false;
  private _phase: EvaluationPhase = 'start';
  private _poisoned = false;
  private _disposed = false;
  private _useCount = 0;

  constructor(options: EvaluationContextOptions) {
    this.id = options.id;
    this.ruleSetName = options.ruleSetName;
    this.generation = options.generation;
  }

  get trace(): readonly FiredRule[] {
    return this.firedRules;
  }

  get rulesEvaluated(): number {
    return this._rulesEvaluated;
  }

  get rulesFired(): number {
    return this.firedRules.length;
  }

  get sequence(): number {
    return this._sequence;
  }

  get halted(): boolean {
    return this._halted;
  }

  get phase(): EvaluationPhase {
    return this._phase;
  }

  /** Kontext v nekonzistentním stavu - pool ho při vrácení zlikviduje */
  get poisoned(): boolean {
    return this._poisoned;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  /** Kolikrát byl kontext vypůjčen */
  get useCount(): number {
    return this._useCount;
  }

  /** Volá pool při každém vypůjčení. */
  markBorrowed(): void {
    this.assertUsable();
    this._useCount++;
  }

  transition(phase: EvaluationPhase): void {
    if (this._phase === 'failed') return;
    this._phase = phase;
  }

  recordEvaluation(): void {
    this._rulesEvaluated++;
  }

  recordFiring(ruleId: string): void {
    this._sequence++;
    this.firedRules.push({ ruleId, firedAtSequence: this._sequence });
  }

  halt(): void {
    this._halted = true;
  }

  poison(): void {
    this._poisoned = true;
  }

  /** Kopie trace - kontext se po vrácení resetuje */
  snapshotTrace(): FiredRuleTrace {
    return this.firedRules.map((r) => ({ ...r }));
  }

  /**
   * Vrátí kontext do počátečního stavu.
   *
   * @throws {Error} Pokud je kontext zlikvidovaný
   */
  reset(): void {
    this.assertUsable();
    this.workingMemory.clear();
    this.firedRules.length = 0;
    this._rulesEvaluated = 0;
    this._sequence = 0;
    this._halted = false;
    this._phase = 'start';
    this._poisoned = false;
  }

  /** Idempotentní. */
  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    this.workingMemory.clear();
    this.firedRules.length = 0;
  }

  private assertUsable(): void {
    if (this._disposed) {
      throw new Error(`Evaluation context ${this.id} has been disposed`);
    }
  }
}

/** Továrna kontextů - pool přes ni vytváří nové instance */
export type EvaluationContextFactory = (options: EvaluationContextOptions) => EvaluationContext;

export const defaultContextFactory: EvaluationContextFactory = (options) => new EvaluationContext(options);
