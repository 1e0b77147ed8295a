/**
 * Konfigurace enginu - výchozí hodnoty, validace a načítání ze souboru.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, extname, isAbsolute, join, resolve } from 'node:path';
import { parse } from 'yaml';
import type { FactSchema } from '../types/rule.js';
import { FIELD_TYPES } from '../types/table.js';
import { InvalidInputError } from '../errors/tabula-error.js';
import { IssueCollector, isObject } from '../validation/types.js';

export const CONFIG_FILENAMES = ['tabula.config.json', 'tabula.config.yaml', 'tabula.config.yml'] as const;

/** Výchozí plán kontroly zdrojů: každých 5 sekund */
export const DEFAULT_HOT_RELOAD_SCHEDULE = '*/5 * * * * *';

/** Zdroj tabulky sady pravidel */
export interface RuleSetSourceConfig {
  /** Cesta k souboru tabulky */
  path: string;
  /** Content type; výchozí podle přípony */
  contentType?: string;
  /** List sešitu; výchozí první list s daty */
  sheet?: string;
}

export interface HotReloadOptions {
  enabled?: boolean;
  /** Cron výraz se sekundami (výchozí: každých 5 s) */
  schedule?: string;
}

export interface EngineConfigInput {
  /** Název instance - prefix logů (výchozí: 'tabula') */
  name?: string;
  cache?: { enabled?: boolean };
  pool?: { maxSize?: number };
  /** Maximum souběžných asynchronních vyhodnocení (výchozí: 10) */
  maxConcurrency?: number;
  /** Sady pravidel podle id; řetězec je zkratka pro `{ path }` */
  ruleSets?: Record<string, RuleSetSourceConfig | string>;
  hotReload?: HotReloadOptions;
  /** Schéma faktů - pole mimo něj jsou chybou kompilace */
  schema?: FactSchema;
}

export interface EngineConfig {
  name: string;
  cache: { enabled: boolean };
  pool: { maxSize: number };
  maxConcurrency: number;
  ruleSets: Record<string, RuleSetSourceConfig>;
  hotReload: { enabled: boolean; schedule: string };
  schema?: FactSchema;
}

/**
 * Doplní výchozí hodnoty a zkontroluje rozsahy.
 *
 * @throws {InvalidInputError} Při neplatné hodnotě
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const maxSize = input.pool?.maxSize ?? 10;
  if (!Number.isInteger(maxSize) || maxSize < 0) {
    throw new InvalidInputError(`pool.maxSize must be a non-negative integer, got ${maxSize}`);
  }

  const maxConcurrency = input.maxConcurrency ?? 10;
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    throw new InvalidInputError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
  }

  const ruleSets: Record<string, RuleSetSourceConfig> = {};
  for (const [id, source] of Object.entries(input.ruleSets ?? {})) {
    ruleSets[id] = typeof source === 'string' ? { path: source } : { ...source };
  }

  return {
    name: input.name ?? 'tabula',
    cache: { enabled: input.cache?.enabled ?? true },
    pool: { maxSize },
    maxConcurrency,
    ruleSets,
    hotReload: {
      enabled: input.hotReload?.enabled ?? false,
      schedule: input.hotReload?.schedule ?? DEFAULT_HOT_RELOAD_SCHEDULE,
    },
    ...(input.schema !== undefined && { schema: input.schema }),
  };
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadedEngineConfig {
  config: EngineConfig;
  /** Cesta k načtenému souboru, null když se použily výchozí hodnoty */
  path: string | null;
}

/** Hledá konfigurační soubor v hierarchii adresářů */
export function findConfigFile(startDir: string): string | null {
  let currentDir = resolve(startDir);

  while (true) {
    for (const filename of CONFIG_FILENAMES) {
      const configPath = join(currentDir, filename);
      if (existsSync(configPath)) {
        return configPath;
      }
    }

    const parentDir = resolve(currentDir, '..');
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Načte konfiguraci enginu.
 *
 * Priorita:
 * 1. Explicitně zadaná cesta
 * 2. Konfigurační soubor v `cwd` nebo jeho rodičích
 * 3. Výchozí konfigurace
 *
 * Relativní cesty sad pravidel se vztahují k adresáři konfiguračního souboru.
 */
export function loadEngineConfig(explicitPath?: string, cwd: string = process.cwd()): LoadedEngineConfig {
  const pathToLoad = explicitPath ? resolve(cwd, explicitPath) : findConfigFile(cwd);

  if (!pathToLoad) {
    return { config: resolveEngineConfig(), path: null };
  }
  if (!existsSync(pathToLoad)) {
    throw new InvalidInputError(`Configuration file not found: ${pathToLoad}`);
  }

  const content = readFileSync(pathToLoad, 'utf-8');
  const input = parseConfigFile(content, pathToLoad);
  const config = resolveEngineConfig(input);

  const baseDir = dirname(pathToLoad);
  for (const source of Object.values(config.ruleSets)) {
    if (!isAbsolute(source.path)) {
      source.path = resolve(baseDir, source.path);
    }
  }

  return { config, path: pathToLoad };
}

/**
 * Parsuje a validuje obsah konfiguračního souboru (JSON nebo YAML podle přípony).
 *
 * @throws {InvalidInputError} Se všemi nalezenými problémy
 */
export function parseConfigFile(content: string, filePath: string): EngineConfigInput {
  let parsed: unknown;
  try {
    parsed = extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`Invalid configuration in ${filePath}: ${message}`);
  }

  const collector = new IssueCollector();
  const input = validateConfigInput(parsed, collector);
  if (collector.hasErrors || !input) {
    const details = collector
      .toResult()
      .errors.map((e) => `${e.path}: ${e.message}`)
      .join('; ');
    throw new InvalidInputError(`Invalid configuration in ${filePath}: ${details}`);
  }
  return input;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateConfigInput(value: unknown, collector: IssueCollector): EngineConfigInput | undefined {
  if (!isObject(value)) {
    collector.addError('', 'Configuration must be an object');
    return undefined;
  }

  const input: EngineConfigInput = {};

  const name = value['name'];
  if (name !== undefined) {
    if (typeof name === 'string' && name !== '') input.name = name;
    else collector.addError('name', 'must be a non-empty string');
  }

  const cache = value['cache'];
  if (cache !== undefined) {
    const enabled = isObject(cache) ? cache['enabled'] : undefined;
    if (isObject(cache) && (enabled === undefined || typeof enabled === 'boolean')) {
      input.cache = enabled === undefined ? {} : { enabled };
    } else {
      collector.addError('cache.enabled', 'must be a boolean');
    }
  }

  const pool = value['pool'];
  if (pool !== undefined) {
    const maxSize = isObject(pool) ? pool['maxSize'] : undefined;
    if (isObject(pool) && (maxSize === undefined || typeof maxSize === 'number')) {
      input.pool = maxSize === undefined ? {} : { maxSize };
    } else {
      collector.addError('pool.maxSize', 'must be a number');
    }
  }

  const maxConcurrency = value['maxConcurrency'];
  if (maxConcurrency !== undefined) {
    if (typeof maxConcurrency === 'number') input.maxConcurrency = maxConcurrency;
    else collector.addError('maxConcurrency', 'must be a number');
  }

  const ruleSets = value['ruleSets'];
  if (ruleSets !== undefined) {
    if (isObject(ruleSets)) {
      input.ruleSets = {};
      for (const [id, source] of Object.entries(ruleSets)) {
        const parsedSource = validateSource(source, `ruleSets.${id}`, collector);
        if (parsedSource) input.ruleSets[id] = parsedSource;
      }
    } else {
      collector.addError('ruleSets', 'must be a mapping of rule-set id to source');
    }
  }

  const hotReload = value['hotReload'];
  if (hotReload !== undefined) {
    if (isObject(hotReload)) {
      const options: HotReloadOptions = {};
      const enabled = hotReload['enabled'];
      const schedule = hotReload['schedule'];
      if (typeof enabled === 'boolean') options.enabled = enabled;
      else if (enabled !== undefined) collector.addError('hotReload.enabled', 'must be a boolean');
      if (typeof schedule === 'string') options.schedule = schedule;
      else if (schedule !== undefined) collector.addError('hotReload.schedule', 'must be a cron expression');
      input.hotReload = options;
    } else {
      collector.addError('hotReload', 'must be an object');
    }
  }

  const schema = value['schema'];
  if (schema !== undefined) {
    if (isObject(schema)) {
      const fields: Record<string, (typeof FIELD_TYPES)[number]> = {};
      for (const [field, type] of Object.entries(schema)) {
        const fieldType = FIELD_TYPES.find((t) => t === type);
        if (fieldType) fields[field] = fieldType;
        else collector.addError(`schema.${field}`, `must be one of: ${FIELD_TYPES.join(', ')}`);
      }
      input.schema = fields;
    } else {
      collector.addError('schema', 'must be a mapping of field to type');
    }
  }

  return input;
}

function validateSource(
  value: unknown,
  path: string,
  collector: IssueCollector,
): RuleSetSourceConfig | string | undefined {
  if (typeof value === 'string' && value !== '') {
    return value;
  }
  const sourcePath = isObject(value) ? value['path'] : undefined;
  if (!isObject(value) || typeof sourcePath !== 'string' || sourcePath === '') {
    collector.addError(path, 'must be a path or an object with "path"');
    return undefined;
  }

  const source: RuleSetSourceConfig = { path: sourcePath };
  const contentType = value['contentType'];
  const sheet = value['sheet'];
  if (typeof contentType === 'string') source.contentType = contentType;
  else if (contentType !== undefined) collector.addError(`${path}.contentType`, 'must be a string');
  if (typeof sheet === 'string') source.sheet = sheet;
  else if (sheet !== undefined) collector.addError(`${path}.sheet`, 'must be a string');
  return source;
}
