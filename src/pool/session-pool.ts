import { InvalidInputError } from '../errors/tabula-error.js';
import {
  defaultContextFactory,
  type EvaluationContext,
  type EvaluationContextFactory,
} from './evaluation-context.js';

export interface SessionPoolOptions {
  /** Maximální počet nečinných kontextů (všech sad dohromady) */
  maxSize: number;
  factory?: EvaluationContextFactory;
}

export interface SessionPoolStats {
  idle: number;
  maxSize: number;
  created: number;
  borrowed: number;
  returned: number;
  disposed: number;
  inUse: number;
  generation: number;
}

/**
 * Pool znovupoužitelných kontextů vyhodnocení.
 *
 * Nečinné kontexty jsou ve frontách podle názvu sady pravidel. Nad `maxSize`
 * se nic nefrontuje - přebytečný kontext se při vrácení zlikviduje.
 * `clear()` zvýší generaci, takže kontexty vypůjčené před ním se při vrácení
 * také zlikvidují.
 */
export class SessionPool {
  private readonly maxSize: number;
  private readonly factory: EvaluationContextFactory;
  private readonly idle = new Map<string, EvaluationContext[]>();
  private readonly checkedOut = new Set<EvaluationContext>();

  private generation = 0;
  private idleCount = 0;
  private nextId = 1;

  private created = 0;
  private borrowed = 0;
  private returned = 0;
  private disposed = 0;

  constructor(options: SessionPoolOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 0) {
      throw new InvalidInputError(`Pool maxSize must be a non-negative integer, got ${options.maxSize}`);
    }
    this.maxSize = options.maxSize;
    this.factory = options.factory ?? defaultContextFactory;
  }

  /** Počet nečinných kontextů */
  get size(): number {
    return this.idleCount;
  }

  /**
   * Vypůjčí kontext pro sadu pravidel - nečinný z aktuální generace,
   * jinak nový.
   */
  borrow(ruleSetName: string): EvaluationContext {
    let context = this.idle.get(ruleSetName)?.shift();

    if (context) {
      this.idleCount--;
    } else {
      context = this.factory({
        id: `ctx-${this.nextId++}`,
        ruleSetName,
        generation: this.generation,
      });
      this.created++;
    }

    context.markBorrowed();
    this.checkedOut.add(context);
    this.borrowed++;
    return context;
  }

  /**
   * Vrátí kontext do poolu. Kontext se místo vrácení zlikviduje, když je
   * otrávený, ze staré generace, pool je plný nebo selže jeho reset.
   * Opakované vrácení a `null` se ignorují.
   */
  release(context: EvaluationContext | null | undefined): void {
    if (!context || !this.checkedOut.delete(context)) {
      return;
    }

    if (context.poisoned || context.generation !== this.generation || this.idleCount >= this.maxSize) {
      this.dispose(context);
      return;
    }

    try {
      context.reset();
    } catch (err) {
      console.warn(
        `[session-pool] Failed to reset context ${context.id}, disposing it:`,
        err instanceof Error ? err.message : err,
      );
      this.dispose(context);
      return;
    }

    let queue = this.idle.get(context.ruleSetName);
    if (!queue) {
      queue = [];
      this.idle.set(context.ruleSetName, queue);
    }
    queue.push(context);
    this.idleCount++;
    this.returned++;
  }

  /**
   * Zlikviduje všechny nečinné kontexty a zvýší generaci.
   */
  clear(): void {
    for (const queue of this.idle.values()) {
      for (const context of queue) {
        this.dispose(context);
      }
    }
    this.idle.clear();
    this.idleCount = 0;
    this.generation++;
  }

  getStats(): SessionPoolStats {
    return {
      idle: this.idleCount,
      maxSize: this.maxSize,
      created: this.created,
      borrowed: this.borrowed,
      returned: this.returned,
      disposed: this.disposed,
      inUse: this.checkedOut.size,
      generation: this.generation,
    };
  }

  private dispose(context: EvaluationContext): void {
    this.disposed++;
    try {
      context.dispose();
    } catch (err) {
      console.error(
        `[session-pool] Failed to dispose context ${context.id}:`,
        err instanceof Error ? err.message : err,
      );
    }
  }
}
