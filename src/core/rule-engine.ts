import type { BatchItemResult, EvaluationResult, Fact } from '../types/fact.js';
import type { ExecutableRuleSet } from '../types/rule.js';
import type { ParsedRuleSet } from '../types/table.js';
import type {
  EngineStats,
  EvaluateAsyncOptions,
  ReloadOptions,
  TableValidationReport,
  ValidateTableOptions,
} from '../types/engine.js';
import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from '../config/engine-config.js';
import { CompilationCache } from '../cache/compilation-cache.js';
import { SessionPool } from '../pool/session-pool.js';
import type { EvaluationContext, EvaluationContextFactory } from '../pool/evaluation-context.js';
import { BoundedTaskScheduler, type TaskScheduler } from './task-scheduler.js';
import { RuleCompiler } from '../compiler/rule-compiler.js';
import { decodeTable } from '../table/decoder.js';
import { parseAll, parseSheet } from '../table/table-parser.js';
import { fingerprint } from '../utils/fingerprint.js';
import { InvalidInputError, TabulaError } from '../errors/tabula-error.js';
import { EvaluationError, UnknownRuleSetError } from '../errors/evaluation-error.js';
import { TableValidationError } from '../errors/table-validation-error.js';
import { CompilationError } from '../errors/compilation-error.js';
import type { ValidationIssue } from '../validation/types.js';
import { isObject } from '../validation/types.js';
import { FileTableSource } from './hot-reload/sources.js';
import { HotReloadWatcher } from './hot-reload/watcher.js';
import type { ReloadResult, TableSource } from './hot-reload/types.js';

/** Publikovaný stav sady - bajty zůstávají, aby šlo při cache miss rekompilovat */
interface RuleSetSnapshot {
  readonly bytes: Uint8Array;
  readonly hash: string;
  readonly cacheKey: string;
  readonly contentType: string;
  readonly sheet: string | undefined;
  readonly ruleSetName: string;
}

interface RuleSetEntry {
  readonly id: string;
  readonly source: TableSource;
  readonly snapshot: RuleSetSnapshot | null;
}

interface EngineInternals {
  evaluations: number;
  failures: number;
  rulesFired: number;
  totalDurationMs: number;
  reloads: number;
  reloadFailures: number;
}

/** Závislosti, které lze enginu podstrčit (testy, vlastní plánovač) */
export interface RuleEngineDependencies {
  contextFactory?: EvaluationContextFactory;
  scheduler?: TaskScheduler;
}

const ANONYMOUS_FACT = '<anonymous>';

/**
 * Hlavní orchestrátor rule enginu nad rozhodovacími tabulkami.
 *
 * Poskytuje unified API pro:
 * - Správu sad pravidel (register, load, reload, evict)
 * - Vyhodnocení faktů (jednotlivě, dávkově, po blocích, asynchronně)
 * - Validaci tabulek nanečisto
 *
 * Vyhodnocení jednoho faktu: `start → context_acquired → matching → acting →
 * done`. Vystřelí každé vyhovující pravidlo v pořadí priority, dokud některé
 * neukončí vyhodnocení akcí halt. Matchování a akce běží synchronně, takže
 * kontext patří mezi borrow a release právě jednomu vyhodnocení a sada
 * převzatá na začátku se během něj nezmění.
 */
export class RuleEngine {
  private readonly config: EngineConfig;
  private readonly cache: CompilationCache;
  private readonly pool: SessionPool;
  private readonly scheduler: TaskScheduler;
  private readonly compiler = new RuleCompiler();

  private readonly ruleSets = new Map<string, RuleSetEntry>();
  private readonly inflight = new Map<string, Promise<ExecutableRuleSet>>();

  private readonly internals: EngineInternals = {
    evaluations: 0,
    failures: 0,
    rulesFired: 0,
    totalDurationMs: 0,
    reloads: 0,
    reloadFailures: 0,
  };

  private running = false;
  private watcher: HotReloadWatcher | null = null;

  private constructor(config: EngineConfig, dependencies: RuleEngineDependencies) {
    this.config = config;
    this.cache = new CompilationCache({ enabled: config.cache.enabled });
    this.pool = new SessionPool({
      maxSize: config.pool.maxSize,
      ...(dependencies.contextFactory !== undefined && { factory: dependencies.contextFactory }),
    });
    this.scheduler = dependencies.scheduler ?? new BoundedTaskScheduler(config.maxConcurrency);
  }

  /**
   * Vytvoří a spustí novou instanci RuleEngine.
   *
   * Nakonfigurované sady pravidel se načtou hned - vadná tabulka start
   * zastaví. S `hotReload.enabled` se spustí i watcher zdrojů.
   */
  static async start(
    input: EngineConfigInput = {},
    dependencies: RuleEngineDependencies = {},
  ): Promise<RuleEngine> {
    const config = resolveEngineConfig(input);
    const engine = new RuleEngine(config, dependencies);
    engine.running = true;

    for (const [id, source] of Object.entries(config.ruleSets)) {
      engine.registerRuleSet(id, new FileTableSource(source));
      await engine.load(id);
    }

    if (config.hotReload.enabled) {
      engine.watcher = await HotReloadWatcher.start(engine, { schedule: config.hotReload.schedule });
    }

    return engine;
  }

  /**
   * Zastaví watcher, počká na naplánovaná vyhodnocení a vyprázdní pool.
   */
  async stop(): Promise<void> {
    this.watcher?.stop();
    this.watcher = null;

    // Naplánovaná vyhodnocení ještě doběhnou
    await this.scheduler.drain();
    this.running = false;
    this.pool.clear();
  }

  /**
   * Kontroluje, zda engine běží.
   */
  get isRunning(): boolean {
    return this.running;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                          SPRÁVA SAD PRAVIDEL
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Registruje zdroj sady pravidel. Tabulka se načte až při prvním
   * vyhodnocení nebo voláním {@link load}.
   */
  registerRuleSet(ruleSetId: string, source: TableSource): void {
    this.ensureRunning();
    if (ruleSetId === '') {
      throw new InvalidInputError('Rule set id must be a non-empty string');
    }
    if (this.ruleSets.has(ruleSetId)) {
      throw new InvalidInputError(`Rule set "${ruleSetId}" is already registered`);
    }
    this.ruleSets.set(ruleSetId, { id: ruleSetId, source, snapshot: null });
  }

  /**
   * Odregistruje sadu a smaže její záznamy v cache.
   */
  unregisterRuleSet(ruleSetId: string): boolean {
    this.ensureRunning();
    this.cache.evict(ruleSetId);
    return this.ruleSets.delete(ruleSetId);
  }

  getRuleSetIds(): string[] {
    return [...this.ruleSets.keys()];
  }

  /** Zdroje registrovaných sad - pro hot-reload watcher. */
  getRuleSetSources(): ReadonlyMap<string, TableSource> {
    return new Map([...this.ruleSets].map(([id, entry]): [string, TableSource] => [id, entry.source]));
  }

  getCompilationCache(): CompilationCache {
    return this.cache;
  }

  /**
   * Načte a zkompiluje sadu ze zdroje, pokud ještě není publikovaná.
   * Souběžná volání pro stejnou sadu sdílí jedno načítání.
   *
   * @throws {UnknownRuleSetError} Pro neregistrovanou sadu
   * @throws {TableValidationError | CompilationError} Při vadné tabulce
   */
  async load(ruleSetId: string): Promise<ExecutableRuleSet> {
    this.ensureRunning();
    const entry = this.getEntry(ruleSetId);
    if (entry.snapshot) {
      return this.resolveSnapshot(entry.id, entry.snapshot);
    }

    const pending = this.inflight.get(ruleSetId);
    if (pending) {
      return pending;
    }

    const loading = this.loadFromSource(entry).finally(() => {
      this.inflight.delete(ruleSetId);
    });
    this.inflight.set(ruleSetId, loading);
    return loading;
  }

  /**
   * Vrátí publikovanou sadu (z cache, při miss rekompilací snapshotu),
   * nebo undefined, dokud není načtená.
   */
  getRuleSet(ruleSetId: string): ExecutableRuleSet | undefined {
    const entry = this.ruleSets.get(ruleSetId);
    return entry?.snapshot ? this.resolveSnapshot(entry.id, entry.snapshot) : undefined;
  }

  /**
   * Smaže zkompilovanou sadu z cache. Další vyhodnocení ji zkompiluje znovu
   * z publikovaného snapshotu; watcher při příští kontrole hlásí změnu.
   */
  evictRuleSet(ruleSetId: string): void {
    this.getEntry(ruleSetId);
    this.cache.evict(ruleSetId);
  }

  /**
   * Nahradí sadu novými bajty tabulky.
   *
   * Tabulka se nejprve dekóduje, naparsuje a zkompiluje - při chybě zůstává
   * v platnosti předchozí sada a chyba se propaguje. Teprve potom se nová
   * sada uloží do cache, atomicky publikuje a pool se vyprázdní.
   */
  reload(ruleSetId: string, bytes: Uint8Array | string, options: ReloadOptions = {}): ReloadResult {
    this.ensureRunning();
    const startTime = performance.now();
    const entry = this.getEntry(ruleSetId);
    const contentType = options.contentType ?? entry.source.contentType;
    const sheet = options.sheet ?? entry.source.sheet;
    const content = typeof bytes === 'string' ? new TextEncoder().encode(bytes) : bytes;
    const hash = fingerprint(content);

    let ruleSet: ExecutableRuleSet;
    try {
      ruleSet = this.compileBytes(content, contentType, sheet, entry.source.name, hash);
    } catch (error) {
      this.internals.reloadFailures++;
      console.warn(
        `[${this.config.name}] Reload of rule set "${ruleSetId}" rejected, keeping the previous version:`,
        error instanceof Error ? error.message : error,
      );
      throw error;
    }

    this.publish(entry, ruleSet, { bytes: content, hash, contentType, sheet });
    this.pool.clear();
    this.internals.reloads++;

    return {
      ruleSetId,
      success: true,
      rulesCount: ruleSet.rules.length,
      fingerprint: hash,
      durationMs: performance.now() - startTime,
      timestamp: Date.now(),
    };
  }

  /**
   * Dekóduje, naparsuje a zkompiluje tabulku nanečisto. Chyby tabulky
   * a kompilace vrací v reportu místo vyhození.
   */
  validateTable(bytes: Uint8Array | string, options: ValidateTableOptions): TableValidationReport {
    const source = options.source ?? '<inline>';
    const schema = options.schema ?? this.config.schema;
    const report: TableValidationReport = {
      valid: true,
      source,
      fingerprint: fingerprint(bytes),
      sheets: [],
      errors: [],
    };

    try {
      const table = decodeTable(bytes, { contentType: options.contentType, source });
      const parsed =
        options.sheet !== undefined
          ? new Map([[options.sheet, parseSheet(table, options.sheet)]])
          : parseAll(table);

      for (const [sheetName, sheet] of parsed) {
        try {
          const ruleSet = this.compiler.compile(sheet, {
            ...(schema !== undefined && { schema }),
            fingerprint: report.fingerprint,
          });
          report.sheets.push({
            sheetName,
            ruleSetName: ruleSet.ruleSetName,
            tableName: ruleSet.tableName,
            rulesCount: ruleSet.rules.length,
          });
        } catch (error) {
          if (!(error instanceof CompilationError)) throw error;
          report.errors.push(...error.issues.map(toValidationIssue));
        }
      }
    } catch (error) {
      if (!(error instanceof TableValidationError)) throw error;
      report.errors.push({
        path: error.sheetName ?? source,
        message: error.message,
        severity: 'error',
      });
    }

    report.valid = report.errors.length === 0;
    return report;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                             VYHODNOCENÍ
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Vyhodnotí fakt proti sadě pravidel. Fakt se mění na místě.
   *
   * @throws {InvalidInputError} Pro null / ne-objektový fakt (před vypůjčením kontextu)
   * @throws {UnknownRuleSetError} Pro neregistrovanou sadu
   * @throws {EvaluationError} Při selhání podmínky nebo akce
   */
  async evaluate<T extends Fact>(fact: T | null | undefined, ruleSetId: string): Promise<EvaluationResult<T>> {
    this.ensureRunning();
    const checked = requireFact(fact);
    const ruleSet = await this.load(ruleSetId);
    return this.evaluateWith(checked, ruleSetId, ruleSet);
  }

  /**
   * Vyhodnotí dávku faktů. Výsledky odpovídají pořadí vstupu; selhání
   * jednoho faktu ostatní neovlivní.
   *
   * @throws {InvalidInputError} Pro null / ne-pole / prázdnou dávku
   * @throws {UnknownRuleSetError} Pro neregistrovanou sadu
   */
  async evaluateBatch<T extends Fact>(
    facts: ReadonlyArray<T | null | undefined> | null | undefined,
    ruleSetId: string,
  ): Promise<BatchItemResult<T>[]> {
    this.ensureRunning();
    const batch = requireBatch(facts);
    const ruleSet = await this.load(ruleSetId);

    return batch.map((fact, index): BatchItemResult<T> => {
      try {
        return { status: 'fulfilled', index, value: this.evaluateWith(requireFact(fact), ruleSetId, ruleSet) };
      } catch (error) {
        return { status: 'rejected', index, error: toError(error) };
      }
    });
  }

  /**
   * Vyhodnotí dávku po blocích: jeden kontext na blok (mezi fakty se
   * resetuje), mezi bloky se uvolní event loop.
   *
   * @throws {InvalidInputError} Pro prázdnou dávku nebo neplatnou velikost bloku
   */
  async evaluateChunked<T extends Fact>(
    facts: ReadonlyArray<T | null | undefined> | null | undefined,
    ruleSetId: string,
    chunkSize: number,
  ): Promise<BatchItemResult<T>[]> {
    this.ensureRunning();
    const batch = requireBatch(facts);
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new InvalidInputError(`Chunk size must be a positive integer, got ${chunkSize}`);
    }
    const ruleSet = await this.load(ruleSetId);
    const results: BatchItemResult<T>[] = [];

    for (let offset = 0; offset < batch.length; offset += chunkSize) {
      let context: EvaluationContext | null = null;
      try {
        for (let index = offset; index < Math.min(offset + chunkSize, batch.length); index++) {
          try {
            const fact = requireFact(batch[index]);
            if (context !== null) {
              context = this.resetForNextFact(context);
            }
            if (context === null) {
              context = this.pool.borrow(ruleSet.ruleSetName);
            }
            context.transition('context_acquired');
            results.push({
              status: 'fulfilled',
              index,
              value: this.execute(fact, ruleSetId, ruleSet, context, performance.now()),
            });
          } catch (error) {
            results.push({ status: 'rejected', index, error: toError(error) });
            if (context?.poisoned) {
              this.pool.release(context);
              context = null;
            }
          }
        }
      } finally {
        this.pool.release(context);
      }

      if (offset + chunkSize < batch.length) {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
    }

    return results;
  }

  /**
   * Připraví kontext bloku pro další fakt. Kontext, který nejde resetovat,
   * se otráví a vrátí poolu k likvidaci; volající si půjčí nový.
   */
  private resetForNextFact(context: EvaluationContext): EvaluationContext | null {
    try {
      context.reset();
      return context;
    } catch (error) {
      console.warn(
        `[${this.config.name}] Failed to reset context ${context.id} between chunk facts, replacing it:`,
        error instanceof Error ? error.message : error,
      );
      context.poison();
      this.pool.release(context);
      return null;
    }
  }

  /**
   * Naplánuje vyhodnocení přes plánovač. Zrušení před startem úlohu
   * vyřadí; zrušení po startu odmítne promise, vyhodnocení ale doběhne
   * a kontext vrátí.
   */
  evaluateAsync<T extends Fact>(
    fact: T | null | undefined,
    ruleSetId: string,
    options: EvaluateAsyncOptions = {},
  ): Promise<EvaluationResult<T>> {
    return this.scheduler.schedule(() => this.evaluate(fact, ruleSetId), options.signal);
  }

  /**
   * Naplánuje dávkové vyhodnocení přes plánovač.
   */
  evaluateBatchAsync<T extends Fact>(
    facts: ReadonlyArray<T | null | undefined> | null | undefined,
    ruleSetId: string,
    options: EvaluateAsyncOptions = {},
  ): Promise<BatchItemResult<T>[]> {
    return this.scheduler.schedule(() => this.evaluateBatch(facts, ruleSetId), options.signal);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                              STATISTIKY
  // ═══════════════════════════════════════════════════════════════════════════

  getStats(): EngineStats {
    const { evaluations, failures, rulesFired, totalDurationMs, reloads, reloadFailures } = this.internals;

    return {
      name: this.config.name,
      ruleSetsCount: this.ruleSets.size,
      loadedRuleSets: [...this.ruleSets.values()].filter((e) => e.snapshot !== null).map((e) => e.id),
      evaluations,
      failures,
      rulesFired,
      avgDurationMs: evaluations > 0 ? totalDurationMs / evaluations : 0,
      reloads,
      reloadFailures,
      cache: this.cache.getStats(),
      pool: this.pool.getStats(),
      scheduler: { pending: this.scheduler.pending, running: this.scheduler.running },
      hotReload: this.watcher?.getStatus() ?? null,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                           PRIVÁTNÍ METODY
  // ═══════════════════════════════════════════════════════════════════════════

  private evaluateWith<T extends Fact>(fact: T, ruleSetId: string, ruleSet: ExecutableRuleSet): EvaluationResult<T> {
    const startTime = performance.now();
    const context = this.pool.borrow(ruleSet.ruleSetName);
    context.transition('context_acquired');
    try {
      return this.execute(fact, ruleSetId, ruleSet, context, startTime);
    } finally {
      this.pool.release(context);
    }
  }

  /** Synchronní jádro: matchování a akce nad vypůjčeným kontextem. */
  private execute<T extends Fact>(
    fact: T,
    ruleSetId: string,
    ruleSet: ExecutableRuleSet,
    context: EvaluationContext,
    startTime: number,
  ): EvaluationResult<T> {
    let currentRuleId: string | undefined;

    try {
      for (const rule of ruleSet.rules) {
        if (context.halted) break;

        currentRuleId = rule.ruleId;
        context.transition('matching');
        context.recordEvaluation();
        if (!rule.matches(fact, context.workingMemory)) continue;

        context.transition('acting');
        rule.apply(fact, context);
        context.recordFiring(rule.ruleId);
      }
      context.transition('done');
    } catch (error) {
      const phase = context.phase;
      context.transition('failed');
      context.poison();
      this.internals.evaluations++;
      this.internals.failures++;
      this.internals.totalDurationMs += performance.now() - startTime;
      throw new EvaluationError(
        {
          ruleSetId,
          factId: factIdentity(fact),
          phase,
          ...(currentRuleId !== undefined && { ruleId: currentRuleId }),
        },
        error,
      );
    }

    const durationMs = performance.now() - startTime;
    this.internals.evaluations++;
    this.internals.rulesFired += context.rulesFired;
    this.internals.totalDurationMs += durationMs;

    return {
      fact,
      trace: context.snapshotTrace(),
      ruleSetId,
      ruleSetName: ruleSet.ruleSetName,
      rulesEvaluated: context.rulesEvaluated,
      rulesFired: context.rulesFired,
      halted: context.halted,
      durationMs,
    };
  }

  private async loadFromSource(entry: RuleSetEntry): Promise<ExecutableRuleSet> {
    const bytes = await entry.source.read();
    const hash = fingerprint(bytes);
    const ruleSet = this.compileBytes(bytes, entry.source.contentType, entry.source.sheet, entry.source.name, hash);

    // Mezitím mohl proběhnout reload - novější snapshot nepřepisovat
    const current = this.ruleSets.get(entry.id);
    if (current?.snapshot) {
      return this.resolveSnapshot(current.id, current.snapshot);
    }
    if (current !== entry) {
      throw new UnknownRuleSetError(entry.id);
    }

    this.publish(entry, ruleSet, {
      bytes,
      hash,
      contentType: entry.source.contentType,
      sheet: entry.source.sheet,
    });
    return ruleSet;
  }

  private publish(
    entry: RuleSetEntry,
    ruleSet: ExecutableRuleSet,
    content: Pick<RuleSetSnapshot, 'bytes' | 'hash' | 'contentType' | 'sheet'>,
  ): void {
    const cacheKey = CompilationCache.buildKey(content.hash, content.sheet);
    const snapshot: RuleSetSnapshot = { ...content, cacheKey, ruleSetName: ruleSet.ruleSetName };

    this.cache.evict(entry.id);
    this.cache.put(cacheKey, ruleSet, entry.id);
    this.ruleSets.set(entry.id, { ...entry, snapshot });
    this.cache.recordHash(entry.id, content.hash);
  }

  private resolveSnapshot(ruleSetId: string, snapshot: RuleSetSnapshot): ExecutableRuleSet {
    const cached = this.cache.get(snapshot.cacheKey);
    if (cached.hit) {
      return cached.ruleSet;
    }

    const entry = this.getEntry(ruleSetId);
    const ruleSet = this.compileBytes(snapshot.bytes, snapshot.contentType, snapshot.sheet, entry.source.name, snapshot.hash);
    this.cache.put(snapshot.cacheKey, ruleSet, ruleSetId);
    return ruleSet;
  }

  private compileBytes(
    bytes: Uint8Array,
    contentType: string,
    sheet: string | undefined,
    source: string,
    hash: string,
  ): ExecutableRuleSet {
    const table = decodeTable(bytes, { contentType, source });
    const parsed: ParsedRuleSet | undefined =
      sheet !== undefined ? parseSheet(table, sheet) : [...parseAll(table).values()][0];

    if (!parsed) {
      throw new TableValidationError(
        `The decision table '${source}' contains no valid sheets with data.`,
        'EMPTY_TABLE',
        { source },
      );
    }

    return this.compiler.compile(parsed, {
      ...(this.config.schema !== undefined && { schema: this.config.schema }),
      fingerprint: hash,
    });
  }

  private getEntry(ruleSetId: string): RuleSetEntry {
    const entry = this.ruleSets.get(ruleSetId);
    if (!entry) {
      throw new UnknownRuleSetError(ruleSetId);
    }
    return entry;
  }

  private ensureRunning(): void {
    if (!this.running) {
      throw new Error(`RuleEngine "${this.config.name}" is not running`);
    }
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function requireFact<T extends Fact>(fact: T | null | undefined): T {
  if (!isObject(fact)) {
    throw new InvalidInputError(
      `Fact must be an object, got ${fact === null ? 'null' : Array.isArray(fact) ? 'array' : typeof fact}`,
    );
  }
  return fact;
}

function requireBatch<T>(facts: ReadonlyArray<T> | null | undefined): ReadonlyArray<T> {
  if (facts === null || facts === undefined || !Array.isArray(facts)) {
    throw new InvalidInputError('Facts must be an array');
  }
  if (facts.length === 0) {
    throw new InvalidInputError('Facts must not be empty');
  }
  return facts;
}

/** Identita faktu pro chybové hlášky: `id`, `key` nebo `name` */
function factIdentity(fact: Fact): string {
  for (const key of ['id', 'key', 'name']) {
    const value = fact[key];
    if (typeof value === 'string' || typeof value === 'number') {
      return String(value);
    }
  }
  return ANONYMOUS_FACT;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new TabulaError(String(error));
}

function toValidationIssue(issue: ValidationIssue): ValidationIssue {
  return { path: issue.path, message: issue.message, severity: issue.severity };
}
