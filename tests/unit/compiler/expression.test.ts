import { describe, it, expect } from 'vitest';
import { parseAction, parseCondition, parseLiteral, parseOperand } from '../../../src/compiler/expression.js';

describe('parseLiteral', () => {
  it('parses quoted strings, booleans and numbers', () => {
    expect(parseLiteral('"GOLD"')).toBe('GOLD');
    expect(parseLiteral("'a, b'")).toBe('a, b');
    expect(parseLiteral('TRUE')).toBe(true);
    expect(parseLiteral('false')).toBe(false);
    expect(parseLiteral('-12.5')).toBe(-12.5);
    expect(parseLiteral('1e3')).toBe(1000);
    expect(parseLiteral('  GOLD ')).toBe('GOLD');
  });
});

describe('parseOperand', () => {
  it('keeps text for string fields', () => {
    expect(parseOperand('42', 'string')).toEqual({ ok: true, value: '42' });
    expect(parseOperand('"42"', 'string')).toEqual({ ok: true, value: '42' });
  });

  it('requires literals matching numeric and boolean fields', () => {
    expect(parseOperand('42', 'number')).toEqual({ ok: true, value: 42 });
    expect(parseOperand('abc', 'number')).toEqual({ ok: false, message: 'expected a number, got "abc"' });
    expect(parseOperand('yes', 'boolean')).toEqual({ ok: false, message: 'expected true or false, got "yes"' });
  });

  it('rejects an empty operand', () => {
    expect(parseOperand('  ', 'any')).toEqual({ ok: false, message: 'missing operand' });
  });
});

describe('parseCondition', () => {
  it('treats empty, "*" and "-" as wildcards', () => {
    for (const text of ['', '  ', '*', '-']) {
      expect(parseCondition(text, 'number')).toEqual({ ok: true, value: { kind: 'wildcard' } });
    }
  });

  it('parses comparison operators', () => {
    expect(parseCondition('> 60', 'number')).toEqual({ ok: true, value: { kind: 'gt', operand: 60 } });
    expect(parseCondition('>=18', 'any')).toEqual({ ok: true, value: { kind: 'gte', operand: 18 } });
    expect(parseCondition('< 0.5', 'number')).toEqual({ ok: true, value: { kind: 'lt', operand: 0.5 } });
    expect(parseCondition('<= 100', 'number')).toEqual({ ok: true, value: { kind: 'lte', operand: 100 } });
    expect(parseCondition('== "GOLD"', 'string')).toEqual({ ok: true, value: { kind: 'eq', operand: 'GOLD' } });
    expect(parseCondition('==GOLD', 'any')).toEqual({ ok: true, value: { kind: 'eq', operand: 'GOLD' } });
    expect(parseCondition('!= CZ', 'string')).toEqual({ ok: true, value: { kind: 'neq', operand: 'CZ' } });
  });

  it('treats a bare literal as equality', () => {
    expect(parseCondition('GOLD', 'string')).toEqual({ ok: true, value: { kind: 'eq', operand: 'GOLD' } });
    expect(parseCondition('true', 'boolean')).toEqual({ ok: true, value: { kind: 'eq', operand: true } });
    expect(parseCondition('7', 'any')).toEqual({ ok: true, value: { kind: 'eq', operand: 7 } });
  });

  it('parses between and in', () => {
    expect(parseCondition('between(18, 25)', 'number')).toEqual({
      ok: true,
      value: { kind: 'between', min: 18, max: 25 },
    });
    expect(parseCondition('in("CZ", "SK", \'A, B\')', 'string')).toEqual({
      ok: true,
      value: { kind: 'in', operands: ['CZ', 'SK', 'A, B'] },
    });
    expect(parseCondition('IN(1, 2)', 'number')).toEqual({ ok: true, value: { kind: 'in', operands: [1, 2] } });
  });

  it('reports malformed between and in', () => {
    expect(parseCondition('between(1)', 'number')).toEqual({ ok: false, message: 'between expects 2 bounds, got 1' });
    expect(parseCondition('between(9, 3)', 'number')).toEqual({
      ok: false,
      message: 'between bounds are reversed (9 > 3)',
    });
    expect(parseCondition('in()', 'string')).toEqual({ ok: false, message: 'in expects at least one value' });
  });

  it('reports unknown operators', () => {
    expect(parseCondition('matches(a.*)', 'string')).toEqual({ ok: false, message: 'unknown operator "matches"' });
    expect(parseCondition('=> 5', 'number')).toEqual({ ok: false, message: 'unknown operator "=>"' });
  });

  it('rejects ordering on non-numeric fields and operands', () => {
    expect(parseCondition('> 5', 'string')).toEqual({
      ok: false,
      message: 'operator ">" requires a numeric field, "string" declared',
    });
    expect(parseCondition('> old', 'number')).toEqual({
      ok: false,
      message: 'operator ">" expects a number, got "old"',
    });
    expect(parseCondition('>', 'number')).toEqual({ ok: false, message: 'missing operand' });
  });
});

describe('parseAction', () => {
  it('returns null for an empty cell', () => {
    expect(parseAction('  ', 'discount', 'number')).toEqual({ ok: true, value: null });
  });

  it('parses assignments', () => {
    expect(parseAction('20', 'discount', 'any')).toEqual({ ok: true, value: { kind: 'set', value: 20 } });
    expect(parseAction('= 15', 'cost', 'number')).toEqual({ ok: true, value: { kind: 'set', value: 15 } });
    expect(parseAction('GOLD', 'tier', 'string')).toEqual({ ok: true, value: { kind: 'set', value: 'GOLD' } });
    expect(parseAction('cheap', 'cost', 'number')).toEqual({ ok: false, message: 'expected a number, got "cheap"' });
  });

  it('parses arithmetic', () => {
    expect(parseAction('+= 5', 'discount', 'number')).toEqual({ ok: true, value: { kind: 'add', amount: 5 } });
    expect(parseAction('-=2.5', 'discount', 'any')).toEqual({ ok: true, value: { kind: 'subtract', amount: 2.5 } });
    expect(parseAction('+= 5', 'tier', 'string')).toEqual({
      ok: false,
      message: 'operator "+=" requires a numeric field, "string" declared',
    });
  });

  it('parses append', () => {
    expect(parseAction('append(senior)', 'labels', 'any')).toEqual({
      ok: true,
      value: { kind: 'append', label: 'senior' },
    });
    expect(parseAction('append()', 'labels', 'any')).toEqual({ ok: false, message: 'append expects a label' });
  });

  it('reads halt columns as flags', () => {
    expect(parseAction('x', 'halt', 'any')).toEqual({ ok: true, value: { kind: 'halt' } });
    expect(parseAction('YES', 'Halt', 'any')).toEqual({ ok: true, value: { kind: 'halt' } });
    expect(parseAction('no', 'halt', 'any')).toEqual({ ok: true, value: null });
    expect(parseAction('', 'halt', 'any')).toEqual({ ok: true, value: null });
    expect(parseAction('maybe', 'halt', 'any')).toEqual({
      ok: false,
      message: 'halt column expects one of true, yes, x, 1 (or empty), got "maybe"',
    });
  });
});
