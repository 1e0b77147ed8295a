/**
 * Grammar of condition and action cells.
 *
 * Conditions:
 * - empty, `*` or `-` → wildcard
 * - `== v`, `!= v`, `> n`, `>= n`, `< n`, `<= n`
 * - `between(a, b)` (inclusive), `in(a, b, …)`
 * - bare literal → `== literal`
 *
 * Actions:
 * - `v` or `= v` → set
 * - `+= n` / `-= n` → add / subtract
 * - `append(label)` → append to a list field
 * - a truthy cell (`true`, `yes`, `x`, `1`) in a `halt` column → halt
 *
 * Literals: `"quoted"` or `'quoted'` strings, `true`/`false`, numbers,
 * otherwise bare strings. Operands are checked against the column's declared
 * field type.
 *
 * @module
 */

import type { FieldType } from '../types/table.js';
import type { ActionOperation, ConditionOperator, Scalar } from '../types/rule.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; message: string };

/** Column name that turns an ACTION column into a halt marker. */
export const HALT_FIELD = 'halt';

const WILDCARDS: ReadonlySet<string> = new Set(['', '*', '-']);
const TRUTHY: ReadonlySet<string> = new Set(['true', 'yes', 'x', '1']);
const FALSY: ReadonlySet<string> = new Set(['', '-', 'false', 'no', '0']);

const NUMBER_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;
const OPERATOR_RE = /^([<>=!~]+)\s*(.*)$/s;
const CALL_RE = /^([a-z_][\w]*)\s*\((.*)\)$/is;

const ORDERING: Readonly<Record<string, 'gt' | 'gte' | 'lt' | 'lte'>> = {
  '>': 'gt',
  '>=': 'gte',
  '<': 'lt',
  '<=': 'lte',
};

// ---------------------------------------------------------------------------
// Literals
// ---------------------------------------------------------------------------

/** Parses a literal without regard to the field type. */
export function parseLiteral(text: string): Scalar {
  const trimmed = text.trim();
  const quoted = unquote(trimmed);
  if (quoted !== undefined) return quoted;

  const lower = trimmed.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  if (NUMBER_RE.test(trimmed)) return Number(trimmed);
  return trimmed;
}

/**
 * Parses an operand and coerces it to the field type.
 *
 * `string` fields take the literal text (quotes removed), `number` and
 * `boolean` fields require a literal of that type, `any` keeps the literal.
 */
export function parseOperand(text: string, fieldType: FieldType): ParseResult<Scalar> {
  const trimmed = text.trim();
  if (trimmed === '') {
    return { ok: false, message: 'missing operand' };
  }

  if (fieldType === 'string') {
    return { ok: true, value: unquote(trimmed) ?? trimmed };
  }

  const literal = parseLiteral(trimmed);
  if (fieldType === 'number' && typeof literal !== 'number') {
    return { ok: false, message: `expected a number, got "${trimmed}"` };
  }
  if (fieldType === 'boolean' && typeof literal !== 'boolean') {
    return { ok: false, message: `expected true or false, got "${trimmed}"` };
  }
  return { ok: true, value: literal };
}

// ---------------------------------------------------------------------------
// Conditions
// ---------------------------------------------------------------------------

export function parseCondition(expression: string, fieldType: FieldType): ParseResult<ConditionOperator> {
  const text = expression.trim();
  if (WILDCARDS.has(text)) {
    return { ok: true, value: { kind: 'wildcard' } };
  }

  const call = CALL_RE.exec(text);
  if (call) {
    const name = (call[1] ?? '').toLowerCase();
    const args = splitArguments(call[2] ?? '');
    if (name === 'between') return parseBetween(args, fieldType);
    if (name === 'in') return parseIn(args, fieldType);
    return { ok: false, message: `unknown operator "${call[1] ?? ''}"` };
  }

  const op = OPERATOR_RE.exec(text);
  if (op) {
    const symbol = op[1] ?? '';
    const operandText = op[2] ?? '';

    if (symbol === '==' || symbol === '!=') {
      const operand = parseOperand(operandText, fieldType);
      if (!operand.ok) return operand;
      return { ok: true, value: { kind: symbol === '==' ? 'eq' : 'neq', operand: operand.value } };
    }

    const ordering = ORDERING[symbol];
    if (ordering) {
      const bound = parseNumericOperand(operandText, fieldType, symbol);
      if (!bound.ok) return bound;
      return { ok: true, value: { kind: ordering, operand: bound.value } };
    }

    return { ok: false, message: `unknown operator "${symbol}"` };
  }

  const operand = parseOperand(text, fieldType);
  if (!operand.ok) return operand;
  return { ok: true, value: { kind: 'eq', operand: operand.value } };
}

function parseBetween(args: string[], fieldType: FieldType): ParseResult<ConditionOperator> {
  if (args.length !== 2) {
    return { ok: false, message: `between expects 2 bounds, got ${args.length}` };
  }
  const min = parseNumericOperand(args[0] ?? '', fieldType, 'between');
  if (!min.ok) return min;
  const max = parseNumericOperand(args[1] ?? '', fieldType, 'between');
  if (!max.ok) return max;
  if (min.value > max.value) {
    return { ok: false, message: `between bounds are reversed (${min.value} > ${max.value})` };
  }
  return { ok: true, value: { kind: 'between', min: min.value, max: max.value } };
}

function parseIn(args: string[], fieldType: FieldType): ParseResult<ConditionOperator> {
  if (args.length === 0 || args.every((a) => a.trim() === '')) {
    return { ok: false, message: 'in expects at least one value' };
  }
  const operands: Scalar[] = [];
  for (const arg of args) {
    const operand = parseOperand(arg, fieldType);
    if (!operand.ok) return operand;
    operands.push(operand.value);
  }
  return { ok: true, value: { kind: 'in', operands } };
}

function parseNumericOperand(text: string, fieldType: FieldType, operator: string): ParseResult<number> {
  if (fieldType === 'string' || fieldType === 'boolean') {
    return { ok: false, message: `operator "${operator}" requires a numeric field, "${fieldType}" declared` };
  }
  const trimmed = text.trim();
  if (trimmed === '') {
    return { ok: false, message: 'missing operand' };
  }
  const literal = parseLiteral(trimmed);
  if (typeof literal !== 'number') {
    return { ok: false, message: `operator "${operator}" expects a number, got "${trimmed}"` };
  }
  return { ok: true, value: literal };
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

/**
 * Parses an action cell. An empty cell (or a falsy halt cell) yields
 * `null`, meaning the rule has no action for this column.
 */
export function parseAction(
  expression: string,
  field: string,
  fieldType: FieldType,
): ParseResult<ActionOperation | null> {
  const text = expression.trim();

  if (field.toLowerCase() === HALT_FIELD) {
    const flag = text.toLowerCase();
    if (TRUTHY.has(flag)) return { ok: true, value: { kind: 'halt' } };
    if (FALSY.has(flag)) return { ok: true, value: null };
    return { ok: false, message: `halt column expects one of true, yes, x, 1 (or empty), got "${text}"` };
  }

  if (text === '') {
    return { ok: true, value: null };
  }

  const arithmetic = /^([+-])=\s*(.*)$/s.exec(text);
  if (arithmetic) {
    const amount = parseNumericOperand(arithmetic[2] ?? '', fieldType, `${arithmetic[1] ?? ''}=`);
    if (!amount.ok) return amount;
    return {
      ok: true,
      value: arithmetic[1] === '+' ? { kind: 'add', amount: amount.value } : { kind: 'subtract', amount: amount.value },
    };
  }

  const call = CALL_RE.exec(text);
  if (call && (call[1] ?? '').toLowerCase() === 'append') {
    const label = (call[2] ?? '').trim();
    if (label === '') {
      return { ok: false, message: 'append expects a label' };
    }
    return { ok: true, value: { kind: 'append', label: parseLiteral(label) } };
  }

  const assignment = /^=(?!=)\s*(.*)$/s.exec(text);
  const operand = parseOperand(assignment ? assignment[1] ?? '' : text, fieldType);
  if (!operand.ok) return operand;
  return { ok: true, value: { kind: 'set', value: operand.value } };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function unquote(text: string): string | undefined {
  if (text.length >= 2) {
    const first = text[0];
    if ((first === '"' || first === "'") && text.endsWith(first)) {
      return text.slice(1, -1);
    }
  }
  return undefined;
}

/** Splits call arguments on commas outside quotes. */
function splitArguments(text: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: string | null = null;

  for (const ch of text) {
    if (quote) {
      current += ch;
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === ',') {
      args.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }

  if (current.trim() !== '' || args.length > 0) {
    args.push(current.trim());
  }
  return args;
}
