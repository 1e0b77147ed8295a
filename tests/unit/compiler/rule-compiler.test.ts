import { describe, it, expect } from 'vitest';
import { RuleCompiler } from '../../../src/compiler/rule-compiler.js';
import { CompilationError } from '../../../src/errors/compilation-error.js';
import { decodeTable } from '../../../src/table/decoder.js';
import { parseSheet } from '../../../src/table/table-parser.js';
import { EvaluationContext } from '../../../src/pool/evaluation-context.js';
import type { ParsedRuleSet } from '../../../src/types/table.js';
import type { ExecutableRuleSet } from '../../../src/types/rule.js';
import type { Fact } from '../../../src/types/fact.js';
import { readFixture } from '../../helpers/fixtures.js';

// ── Helpers ──────────────────────────────────────────────────────────────────

function parseYaml(content: string, sheet: string): ParsedRuleSet {
  return parseSheet(decodeTable(content, { contentType: 'yaml', source: 'test.yaml' }), sheet);
}

function compileError(fn: () => unknown): CompilationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof CompilationError) return error;
    throw error;
  }
  throw new Error('Expected a CompilationError');
}

/** Vystřelí všechna vyhovující pravidla a vrátí jejich id */
function fire(ruleSet: ExecutableRuleSet, fact: Fact): string[] {
  const context = new EvaluationContext({ id: 'ctx-test', ruleSetName: ruleSet.ruleSetName, generation: 0 });
  const fired: string[] = [];
  for (const rule of ruleSet.rules) {
    if (context.halted) break;
    if (rule.matches(fact, context.workingMemory)) {
      rule.apply(fact, context);
      fired.push(rule.ruleId);
    }
  }
  return fired;
}

// ── Tests ────────────────────────────────────────────────────────────────────

describe('RuleCompiler', () => {
  const compiler = new RuleCompiler();

  describe('compile', () => {
    it('compiles the discount table into an executable rule set', () => {
      const ruleSet = compiler.compile(parseYaml(readFixture('discounts.yaml'), 'Discounts'), {
        fingerprint: 'abc123',
      });

      expect(ruleSet.ruleSetName).toBe('discounts');
      expect(ruleSet.tableName).toBe('Pricing');
      expect(ruleSet.sheetName).toBe('Discounts');
      expect(ruleSet.fingerprint).toBe('abc123');
      expect(ruleSet.rules).toHaveLength(1);
      expect(ruleSet.rules[0]?.conditions).toEqual([
        { field: 'Age', operator: { kind: 'gt', operand: 60 }, expression: '>60' },
        { field: 'Tier', operator: { kind: 'eq', operand: 'GOLD' }, expression: '==GOLD' },
      ]);
      expect(ruleSet.rules[0]?.actions).toEqual([
        { field: 'Discount', operation: { kind: 'set', value: 20 }, expression: '20' },
      ]);
    });

    it('orders rules by priority, ties by row order', () => {
      const ruleSet = compiler.compile(parseYaml(readFixture('priorities.yaml'), 'Ordering'));

      expect(ruleSet.rules.map((r) => [r.ruleId, r.priority])).toEqual([
        ['first', 10],
        ['second', 5],
        ['third', 5],
        ['last', 1],
      ]);
    });

    it('drops wildcard conditions so the rule matches every fact', () => {
      const ruleSet = compiler.compile(parseYaml(readFixture('priorities.yaml'), 'Ordering'));
      const last = ruleSet.rules.find((r) => r.ruleId === 'last');

      expect(last?.conditions).toEqual([]);
      expect(last?.matches({}, new Map())).toBe(true);
    });

    it('skips empty action cells and falsy halt cells', () => {
      const ruleSet = compiler.compile(parseYaml(readFixture('workbook.yaml'), 'Loyalty'));

      expect(ruleSet.rules.map((r) => r.actions.map((a) => a.operation.kind))).toEqual([
        ['set', 'halt'],
        ['set'],
        ['set'],
      ]);
    });

    it('produces frozen rule sets', () => {
      const ruleSet = compiler.compile(parseYaml(readFixture('discounts.yaml'), 'Discounts'));

      expect(Object.isFrozen(ruleSet)).toBe(true);
      expect(Object.isFrozen(ruleSet.rules)).toBe(true);
      expect(Object.isFrozen(ruleSet.rules[0])).toBe(true);
    });

    it('derives the fingerprint from the rule rows when none is given', () => {
      const parsed = parseYaml(readFixture('discounts.yaml'), 'Discounts');

      const first = compiler.compile(parsed);
      const second = compiler.compile(parsed);

      expect(first.fingerprint).toMatch(/^[0-9a-f]{64}$/);
      expect(second.fingerprint).toBe(first.fingerprint);
    });

    it('fires identically when the same table is compiled twice', () => {
      const parsed = parseYaml(readFixture('workbook.yaml'), 'Loyalty');
      const a = compiler.compile(parsed);
      const b = compiler.compile(parsed);

      for (const points of [1500, 700, 10]) {
        const factA: Fact = { points };
        const factB: Fact = { points };
        expect(fire(a, factA)).toEqual(fire(b, factB));
        expect(factA).toEqual(factB);
      }
    });
  });

  describe('compilation errors', () => {
    it('names the rule and field of an invalid cell', () => {
      const error = compileError(() => compiler.compile(parseYaml(readFixture('broken.yaml'), 'Broken')));

      expect(error.code).toBe('RULE_COMPILATION_ERROR');
      expect(error.statusCode).toBe(422);
      expect(error.ruleSetName).toBe('broken');
      expect(error.issues).toEqual([
        {
          path: 'Broken!5.age',
          message: 'rule "too-old", field "age": operator ">" expects a number, got "old"',
          severity: 'error',
          ruleId: 'too-old',
          field: 'age',
        },
      ]);
      expect(error.message).toBe(
        'Rule set "broken" failed to compile: rule "too-old", field "age": operator ">" expects a number, got "old"',
      );
    });

    it('collects every issue, including duplicate rule ids', () => {
      const parsed = parseYaml(
        `Sheet1:
  - [RuleSet, dupes]
  - [RuleTable, Dupes]
  - [NAME, CONDITION, ACTION]
  - [rule, "age:number", "tier:string"]
  - [r1, "> 1", A]
  - [r1, "> 2", B]
  - [r2, "between(5)", C]
`,
        'Sheet1',
      );
      const error = compileError(() => compiler.compile(parsed));

      expect(error.issues.map((i) => [i.path, i.message])).toEqual([
        ['Sheet1!6', 'duplicate rule id "r1" (row 6)'],
        ['Sheet1!7.age', 'rule "r2", field "age": between expects 2 bounds, got 1'],
      ]);
      expect(error.message).toBe('Rule set "dupes" failed to compile: duplicate rule id "r1" (row 6) (and 1 more)');
    });

    it('rejects field paths that reach an object prototype', () => {
      const parsed = parseYaml(
        `Sheet1:
  - [RuleSet, evil]
  - [RuleTable, Evil]
  - [NAME, CONDITION, ACTION, ACTION]
  - [rule, "age:number", "__proto__.isAdmin", "constructor.prototype.x"]
  - [r1, "*", "true", "1"]
`,
        'Sheet1',
      );
      const error = compileError(() => compiler.compile(parsed));

      expect(error.issues).toEqual([
        {
          path: 'Sheet1!5.__proto__.isAdmin',
          message: 'rule "r1", field "__proto__.isAdmin": action field path "__proto__.isAdmin" is not allowed',
          severity: 'error',
          ruleId: 'r1',
          field: '__proto__.isAdmin',
        },
        {
          path: 'Sheet1!5.constructor.prototype.x',
          message:
            'rule "r1", field "constructor.prototype.x": action field path "constructor.prototype.x" is not allowed',
          severity: 'error',
          ruleId: 'r1',
          field: 'constructor.prototype.x',
        },
      ]);
      expect('isAdmin' in {}).toBe(false);
    });

    it('checks fields against the fact schema', () => {
      const parsed = parseYaml(readFixture('discounts.yaml'), 'Discounts');
      const error = compileError(() =>
        compiler.compile(parsed, { schema: { Age: 'number', Tier: 'number' } }),
      );

      expect(error.issues.map((i) => i.message)).toEqual([
        'rule "senior-gold", field "Tier": expected a number, got "GOLD"',
        'rule "senior-gold", field "Discount": unknown action field "Discount"',
      ]);
    });

    it('reports a column type that conflicts with the schema', () => {
      const parsed = parseYaml(readFixture('broken.yaml'), 'Broken');
      const error = compileError(() =>
        compiler.compile(parsed, { schema: { age: 'string', discount: 'number' } }),
      );

      expect(error.issues.map((i) => i.message)).toEqual([
        'rule "too-old", field "age": column declares "number" but the schema declares "string" for "age"',
      ]);
    });

    it('narrows untyped columns by the schema', () => {
      const parsed = parseYaml(readFixture('discounts.yaml'), 'Discounts');
      const ruleSet = compiler.compile(parsed, {
        schema: { Age: 'number', Tier: 'string', Discount: 'string' },
      });

      expect(ruleSet.rules[0]?.actions[0]?.operation).toEqual({ kind: 'set', value: '20' });
    });
  });

  describe('compileAll', () => {
    it('compiles every parsed sheet', () => {
      const parsed = new Map([
        ['Discounts', parseYaml(readFixture('discounts.yaml'), 'Discounts')],
        ['Ordering', parseYaml(readFixture('priorities.yaml'), 'Ordering')],
      ]);

      const ruleSets = compiler.compileAll(parsed);

      expect([...ruleSets.keys()]).toEqual(['Discounts', 'Ordering']);
      expect(ruleSets.get('Ordering')?.rules).toHaveLength(4);
    });
  });
});
