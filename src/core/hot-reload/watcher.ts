import { Cron } from 'croner';
import type { RuleEngine } from '../rule-engine.js';
import { DEFAULT_HOT_RELOAD_SCHEDULE } from '../../config/engine-config.js';
import { fingerprint } from '../../utils/fingerprint.js';
import type { CheckResult, HotReloadConfig, HotReloadStatus, ReloadResult, TableSource } from './types.js';

// ── HotReloadWatcher ────────────────────────────────────────────────────────

/**
 * Sleduje zdroje registrovaných sad pravidel a při změně obsahu je
 * reloaduje do enginu.
 *
 * Polling běží na croner plánu s `protect: true` - další kontrola nezačne,
 * dokud předchozí neskončila. Vadná nová tabulka se zaloguje, započítá jako
 * selhání a sada dál slouží v předchozí verzi.
 */
export class HotReloadWatcher {
  private readonly engine: RuleEngine;
  private readonly schedule: string;
  private job: Cron | null = null;

  private lastReloadAt: number | null = null;
  private reloadCount = 0;
  private failureCount = 0;

  private constructor(engine: RuleEngine, config: HotReloadConfig) {
    this.engine = engine;
    this.schedule = config.schedule ?? DEFAULT_HOT_RELOAD_SCHEDULE;
  }

  /**
   * Vytvoří a spustí HotReloadWatcher.
   *
   * Hashe zdrojů zaznamenává engine při načtení sady, takže první kontrola
   * hlásí jen skutečné změny oproti běžícímu stavu.
   */
  static async start(engine: RuleEngine, config: HotReloadConfig = {}): Promise<HotReloadWatcher> {
    const watcher = new HotReloadWatcher(engine, config);

    watcher.job = new Cron(
      watcher.schedule,
      {
        name: 'hot-reload',
        protect: true,
        catch: (error: unknown) => {
          console.error('[hot-reload] Check failed:', error instanceof Error ? error.message : error);
        },
      },
      async () => {
        await watcher.performCheck();
      },
    );

    return watcher;
  }

  /**
   * Zastaví plánované kontroly.
   */
  stop(): void {
    this.job?.stop();
    this.job = null;
  }

  /**
   * Vrátí aktuální stav watcheru.
   */
  getStatus(): HotReloadStatus {
    return {
      running: this.job !== null && this.job.isRunning(),
      schedule: this.schedule,
      nextCheckAt: this.job?.nextRun()?.getTime() ?? null,
      trackedSources: this.engine.getRuleSetIds().length,
      lastReloadAt: this.lastReloadAt,
      reloadCount: this.reloadCount,
      failureCount: this.failureCount,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                           CHECK & RELOAD
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Jeden kontrolní cyklus - volán z plánu, lze ho zavolat i přímo.
   *
   * Pro každý zdroj zjistí přes cache, zda se změnil obsah; změněné sady
   * reloaduje. Chyba čtení zdroje se hlásí jako změna a reload pak selže.
   */
  async performCheck(): Promise<CheckResult> {
    const cache = this.engine.getCompilationCache();
    const result: CheckResult = { checked: 0, changed: [], reloads: [] };

    for (const [ruleSetId, source] of this.engine.getRuleSetSources()) {
      result.checked++;

      const captured: { bytes?: Uint8Array; error?: unknown } = {};
      const changed = await cache.hasSourceChanged(ruleSetId, async () => {
        try {
          captured.bytes = await source.read();
          return captured.bytes;
        } catch (error) {
          captured.error = error;
          throw error;
        }
      });
      if (!changed) continue;

      result.changed.push(ruleSetId);
      result.reloads.push(await this.reloadSource(ruleSetId, source, captured));
    }

    return result;
  }

  private async reloadSource(
    ruleSetId: string,
    source: TableSource,
    captured: { bytes?: Uint8Array; error?: unknown },
  ): Promise<ReloadResult> {
    const startTime = Date.now();

    try {
      if (captured.error !== undefined) {
        throw captured.error;
      }
      // Vypnutá cache hlásí změnu bez čtení zdroje
      const bytes = captured.bytes ?? (await source.read());
      captured.bytes = bytes;

      const reload = this.engine.reload(ruleSetId, bytes);
      this.lastReloadAt = reload.timestamp;
      this.reloadCount++;
      console.info(`[hot-reload] Reloaded rule set "${ruleSetId}" (${reload.rulesCount} rules)`);
      return reload;
    } catch (error) {
      this.failureCount++;
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[hot-reload] Reload of rule set "${ruleSetId}" failed: ${message}`);

      return {
        ruleSetId,
        success: false,
        rulesCount: 0,
        fingerprint: captured.bytes ? fingerprint(captured.bytes) : '',
        durationMs: Date.now() - startTime,
        error: message,
        timestamp: Date.now(),
      };
    }
  }
}
