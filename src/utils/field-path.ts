import { isObject } from '../validation/types.js';

/** Prefix pole adresujícího pracovní paměť kontextu (`$total`) */
export const MEMORY_PREFIX = '$';

export function isMemoryField(field: string): boolean {
  return field.startsWith(MEMORY_PREFIX);
}

/** Segmenty, přes které by se cesta dostala k prototypu objektu */
const UNSAFE_SEGMENTS: ReadonlySet<string> = new Set(['__proto__', 'prototype', 'constructor']);

/** Cesta obsahuje segment mířící na prototyp (`__proto__.x`, `constructor.prototype`). */
export function isUnsafePath(path: string): boolean {
  return path.split('.').some((part) => UNSAFE_SEGMENTS.has(part));
}

/**
 * Získá vnořenou hodnotu z objektu pomocí tečkové notace.
 * Čte jen vlastní vlastnosti, zděděné hodnoty jsou `undefined`.
 */
export function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split('.')) {
    if (!isObject(current) || !Object.hasOwn(current, part)) return undefined;
    current = current[part];
  }

  return current;
}

/**
 * Zapíše hodnotu na tečkovou cestu, chybějící mezilehlé objekty vytvoří.
 *
 * @throws {TypeError} Když mezilehlá hodnota není objekt nebo cesta míří na prototyp
 */
export function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  if (isUnsafePath(path)) {
    throw new TypeError(`Cannot write "${path}": prototype access is not allowed`);
  }

  const parts = path.split('.');
  const last = parts.pop() ?? path;
  let current = obj;

  for (const part of parts) {
    const next = Object.hasOwn(current, part) ? current[part] : undefined;
    if (next === undefined || next === null) {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    } else if (isObject(next)) {
      current = next;
    } else {
      throw new TypeError(`Cannot write "${path}": "${part}" is not an object`);
    }
  }

  current[last] = value;
}

/** Hodnota pole faktu nebo proměnné pracovní paměti. */
export function readField(
  fact: Record<string, unknown>,
  memory: ReadonlyMap<string, unknown>,
  field: string,
): unknown {
  return isMemoryField(field)
    ? memory.get(field.slice(MEMORY_PREFIX.length))
    : getNestedValue(fact, field);
}
