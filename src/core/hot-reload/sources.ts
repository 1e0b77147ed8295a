import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { contentTypeFromPath } from '../../table/decoder.js';
import type { TableSource } from './types.js';

// ── FileTableSource ─────────────────────────────────────────────────────────

export interface FileTableSourceConfig {
  path: string;
  /** Výchozí podle přípony souboru */
  contentType?: string;
  sheet?: string;
}

/**
 * Tabulka uložená v souboru. Čte se při každém `read()` - watcher tak
 * pozná změnu obsahu bez sledování mtime.
 */
export class FileTableSource implements TableSource {
  readonly name: string;
  readonly path: string;
  readonly contentType: string;
  readonly sheet?: string;

  constructor(config: FileTableSourceConfig) {
    this.path = resolve(config.path);
    this.name = basename(this.path);
    this.contentType = config.contentType ?? contentTypeFromPath(this.path);
    if (config.sheet !== undefined) {
      this.sheet = config.sheet;
    }
  }

  async read(): Promise<Uint8Array> {
    return readFile(this.path);
  }
}

// ── MemoryTableSource ───────────────────────────────────────────────────────

export interface MemoryTableSourceConfig {
  name: string;
  content: Uint8Array | string;
  contentType: string;
  sheet?: string;
}

/** Tabulka držená v paměti (upload, testy). Obsah lze vyměnit přes `update()`. */
export class MemoryTableSource implements TableSource {
  readonly name: string;
  readonly contentType: string;
  readonly sheet?: string;
  private content: Uint8Array;

  constructor(config: MemoryTableSourceConfig) {
    this.name = config.name;
    this.contentType = config.contentType;
    this.content = toBytes(config.content);
    if (config.sheet !== undefined) {
      this.sheet = config.sheet;
    }
  }

  update(content: Uint8Array | string): void {
    this.content = toBytes(content);
  }

  async read(): Promise<Uint8Array> {
    return this.content;
  }
}

function toBytes(content: Uint8Array | string): Uint8Array {
  return typeof content === 'string' ? new TextEncoder().encode(content) : content;
}
