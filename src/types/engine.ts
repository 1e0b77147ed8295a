import type { ValidationIssue } from '../validation/types.js';
import type { CompilationCacheStats } from '../cache/compilation-cache.js';
import type { SessionPoolStats } from '../pool/session-pool.js';
import type { HotReloadStatus } from '../core/hot-reload/types.js';
import type { FactSchema } from './rule.js';

/** Volby asynchronního vyhodnocení */
export interface EvaluateAsyncOptions {
  /** Zrušení - před startem úlohu vyřadí, po startu jen odmítne promise */
  signal?: AbortSignal;
}

/** Volby reloadu sady pravidel */
export interface ReloadOptions {
  /** Výchozí podle zdroje sady */
  contentType?: string;
  /** Výchozí podle zdroje sady */
  sheet?: string;
}

/** Volby suchého běhu validace tabulky */
export interface ValidateTableOptions {
  contentType: string;
  source?: string;
  /** Validovat jen tento list */
  sheet?: string;
  /** Výchozí schéma enginu */
  schema?: FactSchema;
}

/** Shrnutí jednoho úspěšně zkompilovaného listu */
export interface SheetSummary {
  sheetName: string;
  ruleSetName: string;
  tableName: string;
  rulesCount: number;
}

/** Výsledek validace tabulky bez registrace */
export interface TableValidationReport {
  valid: boolean;
  source: string;
  /** SHA-256 validovaných bajtů */
  fingerprint: string;
  sheets: SheetSummary[];
  errors: ValidationIssue[];
}

/** Statistiky enginu */
export interface EngineStats {
  name: string;
  /** Registrované sady */
  ruleSetsCount: number;
  /** Sady s publikovaným snapshotem */
  loadedRuleSets: string[];
  evaluations: number;
  failures: number;
  rulesFired: number;
  avgDurationMs: number;
  reloads: number;
  reloadFailures: number;
  cache: CompilationCacheStats;
  pool: SessionPoolStats;
  scheduler: { pending: number; running: number };
  hotReload: HotReloadStatus | null;
}
