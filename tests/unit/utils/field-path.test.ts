import { describe, it, expect } from 'vitest';
import { getNestedValue, isMemoryField, isUnsafePath, readField, setNestedValue } from '../../../src/utils/field-path.js';

describe('field paths', () => {
  describe('getNestedValue', () => {
    it('reads dotted paths', () => {
      const fact = { order: { total: 120, items: { count: 3 } } };

      expect(getNestedValue(fact, 'order.total')).toBe(120);
      expect(getNestedValue(fact, 'order.items.count')).toBe(3);
    });

    it('returns undefined for missing or non-object segments', () => {
      const fact = { order: { total: 120 }, tags: ['a'] };

      expect(getNestedValue(fact, 'customer.name')).toBeUndefined();
      expect(getNestedValue(fact, 'order.total.value')).toBeUndefined();
      expect(getNestedValue(fact, 'tags.0')).toBeUndefined();
    });

    it('ignores inherited properties', () => {
      const fact = { order: { total: 120 } };

      expect(getNestedValue(fact, 'constructor')).toBeUndefined();
      expect(getNestedValue(fact, 'order.toString')).toBeUndefined();
      expect(getNestedValue(fact, '__proto__')).toBeUndefined();
    });
  });

  describe('setNestedValue', () => {
    it('creates missing intermediate objects', () => {
      const fact: Record<string, unknown> = { shipping: null };

      setNestedValue(fact, 'shipping.cost', 5);
      setNestedValue(fact, 'a.b.c', true);

      expect(fact).toEqual({ shipping: { cost: 5 }, a: { b: { c: true } } });
    });

    it('refuses to write through a scalar', () => {
      const fact: Record<string, unknown> = { order: 42 };

      expect(() => setNestedValue(fact, 'order.total', 1)).toThrow(
        new TypeError('Cannot write "order.total": "order" is not an object'),
      );
    });

    it('never writes onto a prototype', () => {
      const fact: Record<string, unknown> = {};

      expect(() => setNestedValue(fact, '__proto__.isAdmin', true)).toThrow(
        new TypeError('Cannot write "__proto__.isAdmin": prototype access is not allowed'),
      );
      expect(() => setNestedValue(fact, 'constructor.prototype.isAdmin', true)).toThrow(TypeError);
      expect(() => setNestedValue(fact, 'order.__proto__', {})).toThrow(TypeError);

      expect('isAdmin' in {}).toBe(false);
      expect(fact).toEqual({});
    });

    it('shadows inherited names with own objects', () => {
      const fact: Record<string, unknown> = {};

      setNestedValue(fact, 'toString.label', 'x');

      expect(Object.hasOwn(fact, 'toString')).toBe(true);
      expect(fact['toString']).toEqual({ label: 'x' });
    });
  });

  describe('isUnsafePath', () => {
    it('flags prototype segments anywhere in the path', () => {
      expect(isUnsafePath('__proto__')).toBe(true);
      expect(isUnsafePath('a.constructor.b')).toBe(true);
      expect(isUnsafePath('order.prototype')).toBe(true);
      expect(isUnsafePath('order.total')).toBe(false);
      expect(isUnsafePath('protoType')).toBe(false);
    });
  });

  describe('readField', () => {
    it('reads $ fields from working memory', () => {
      const memory = new Map<string, unknown>([['score', 7]]);

      expect(isMemoryField('$score')).toBe(true);
      expect(readField({ score: 1 }, memory, '$score')).toBe(7);
      expect(readField({ score: 1 }, memory, 'score')).toBe(1);
    });
  });
});
