/**
 * Načítání souborů s rozhodovacími tabulkami a engine pro jednorázové příkazy.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { contentTypeFromPath } from '../../table/decoder.js';
import { loadEngineConfig } from '../../config/engine-config.js';
import { RuleEngine } from '../../core/rule-engine.js';
import { FileNotFoundError } from './errors.js';

/** Načtený soubor tabulky */
export interface LoadedTableFile {
  /** Absolutní cesta */
  path: string;
  bytes: Uint8Array;
  contentType: string;
}

/**
 * Načte soubor tabulky; content type se odvodí z přípony.
 *
 * @throws FileNotFoundError pokud soubor neexistuje
 */
export async function loadTableFile(filePath: string): Promise<LoadedTableFile> {
  const absolutePath = resolve(filePath);

  if (!existsSync(absolutePath)) {
    throw new FileNotFoundError(filePath);
  }

  return {
    path: absolutePath,
    bytes: await readFile(absolutePath),
    contentType: contentTypeFromPath(absolutePath),
  };
}

/**
 * Spustí engine s konfigurací z `tabula.config.*` (jméno, schéma, pool).
 * Nakonfigurované sady pravidel ani hot reload se pro příkaz nepoužijí.
 */
export async function startCommandEngine(configPath: string | undefined): Promise<RuleEngine> {
  const { config } = loadEngineConfig(configPath);
  return RuleEngine.start({ ...config, ruleSets: {}, hotReload: { enabled: false } });
}
