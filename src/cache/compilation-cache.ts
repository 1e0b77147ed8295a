import type { ExecutableRuleSet } from '../types/rule.js';
import { fingerprint } from '../utils/fingerprint.js';

export type CacheLookup =
  | { hit: true; ruleSet: ExecutableRuleSet }
  | { hit: false };

export interface CompilationCacheOptions {
  /** Vypnutá cache: get vždy miss, put no-op, hasChanged vždy true */
  enabled?: boolean;
}

export interface CompilationCacheStats {
  enabled: boolean;
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 bez dotazů */
  hitRatio: number;
  /** Počet uložených zkompilovaných sad */
  size: number;
  /** Počet zdrojů se zaznamenaným hashem */
  trackedResources: number;
}

/**
 * Cache zkompilovaných sad pravidel a hashů zdrojových tabulek.
 *
 * Klíč záznamu skládá volající ({@link CompilationCache.buildKey}) z otisku
 * bajtů a výběru listu. Záznam lze svázat se zdrojem - `evict(resourceId)`
 * pak smaže hash i všechny jeho záznamy.
 */
export class CompilationCache {
  private readonly enabled: boolean;
  private readonly entries = new Map<string, ExecutableRuleSet>();
  private readonly resourceHashes = new Map<string, string>();
  private readonly resourceKeys = new Map<string, Set<string>>();
  private hits = 0;
  private misses = 0;

  constructor(options: CompilationCacheOptions = {}) {
    this.enabled = options.enabled ?? true;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /** Vrací uloženou sadu; mění jen čítač hitů nebo missů. */
  get(key: string): CacheLookup {
    const ruleSet = this.enabled ? this.entries.get(key) : undefined;
    if (!ruleSet) {
      this.misses++;
      return { hit: false };
    }
    this.hits++;
    return { hit: true, ruleSet };
  }

  /** Uloží nebo přepíše záznam; s `resourceId` ho sváže se zdrojem. */
  put(key: string, ruleSet: ExecutableRuleSet, resourceId?: string): void {
    if (!this.enabled) return;

    this.entries.set(key, ruleSet);
    if (resourceId !== undefined) {
      let keys = this.resourceKeys.get(resourceId);
      if (!keys) {
        keys = new Set();
        this.resourceKeys.set(resourceId, keys);
      }
      keys.add(key);
    }
  }

  /**
   * Porovná otisk bajtů s naposledy zaznamenaným pro zdroj.
   * Při změně (nebo u neznámého zdroje) nový otisk zaznamená a vrátí true.
   */
  hasChanged(bytes: Uint8Array | string, resourceId: string): boolean {
    if (!this.enabled) return true;

    const hash = fingerprint(bytes);
    if (this.resourceHashes.get(resourceId) === hash) {
      return false;
    }
    this.resourceHashes.set(resourceId, hash);
    return true;
  }

  /**
   * Přečte zdroj a zjistí, zda se změnil. Chyba čtení se zaloguje a hlásí
   * se jako změna - následný reload ji ohlásí volajícímu.
   */
  async hasSourceChanged(resourceId: string, read: () => Promise<Uint8Array>): Promise<boolean> {
    if (!this.enabled) return true;

    let bytes: Uint8Array;
    try {
      bytes = await read();
    } catch (err) {
      console.warn(
        `[compilation-cache] Failed to read resource '${resourceId}', treating it as changed:`,
        err instanceof Error ? err.message : err,
      );
      return true;
    }
    return this.hasChanged(bytes, resourceId);
  }

  /** Zaznamená otisk bez porovnání (po úspěšném reloadu). */
  recordHash(resourceId: string, hash: string): void {
    if (!this.enabled) return;
    this.resourceHashes.set(resourceId, hash);
  }

  /** Smaže hash zdroje a jeho záznamy - příští kontrola hlásí změnu. */
  evict(resourceId: string): void {
    this.resourceHashes.delete(resourceId);
    const keys = this.resourceKeys.get(resourceId);
    if (keys) {
      for (const key of keys) {
        this.entries.delete(key);
      }
      this.resourceKeys.delete(resourceId);
    }
  }

  /** Smaže všechny záznamy a hashe. Statistiky zůstávají. */
  evictAll(): void {
    this.entries.clear();
    this.resourceHashes.clear();
    this.resourceKeys.clear();
  }

  getTrackedResourceIds(): string[] {
    return [...this.resourceHashes.keys()];
  }

  getStats(): CompilationCacheStats {
    const total = this.hits + this.misses;
    return {
      enabled: this.enabled,
      hits: this.hits,
      misses: this.misses,
      hitRatio: total === 0 ? 0 : this.hits / total,
      size: this.entries.size,
      trackedResources: this.resourceHashes.size,
    };
  }

  /** Klíč záznamu: otisk bajtů + vybraný list (`*` = první list s daty). */
  static buildKey(hash: string, sheet?: string): string {
    return `${hash}:${sheet ?? '*'}`;
  }
}
