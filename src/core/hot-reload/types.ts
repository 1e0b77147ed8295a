/** Zdroj bajtů tabulky jedné sady pravidel */
export interface TableSource {
  /** Název zdroje pro logování a chybové hlášky */
  readonly name: string;

  /** Deklarovaný content type (`yaml`, `application/json`, `.yml`, ...) */
  readonly contentType: string;

  /** List sešitu; bez něj první list s daty */
  readonly sheet?: string;

  /** Načte aktuální bajty tabulky */
  read(): Promise<Uint8Array>;
}

/** Konfigurace hot-reload mechanismu */
export interface HotReloadConfig {
  /** Cron výraz se sekundami (výchozí: '*\/5 * * * * *') */
  schedule?: string;
}

/** Výsledek reloadu jedné sady pravidel */
export interface ReloadResult {
  ruleSetId: string;
  success: boolean;
  /** Počet pravidel nové sady (0 při neúspěchu) */
  rulesCount: number;
  /** SHA-256 nových bajtů */
  fingerprint: string;
  durationMs: number;
  error?: string;
  timestamp: number;
}

/** Výsledek jednoho kontrolního cyklu watcheru */
export interface CheckResult {
  checked: number;
  changed: string[];
  reloads: ReloadResult[];
}

/** Veřejný stav hot-reload watcheru */
export interface HotReloadStatus {
  running: boolean;
  schedule: string;
  nextCheckAt: number | null;
  trackedSources: number;
  lastReloadAt: number | null;
  reloadCount: number;
  failureCount: number;
}
