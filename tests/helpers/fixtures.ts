import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

/** Absolutní cesta k fixture tabulce */
export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/tables/${name}`, import.meta.url));
}

/** Obsah fixture tabulky jako text */
export function readFixture(name: string): string {
  return readFileSync(fixturePath(name), 'utf-8');
}
