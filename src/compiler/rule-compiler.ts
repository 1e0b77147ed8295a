/**
 * Compiles parsed rule rows into an immutable, priority-ordered rule set.
 *
 * Every problem in the table is collected before anything is thrown, so one
 * {@link CompilationError} lists all of them.
 *
 * @module
 */

import type { CellDefinition, FieldType, ParsedRuleSet, RuleDefinition } from '../types/table.js';
import type {
  CompiledAction,
  CompiledCondition,
  CompiledRule,
  ExecutableRuleSet,
  FactSchema,
} from '../types/rule.js';
import type { Fact } from '../types/fact.js';
import type { EvaluationContext } from '../pool/evaluation-context.js';
import { CompilationError, type CompilationIssue } from '../errors/compilation-error.js';
import { ConditionEvaluator } from '../evaluation/condition-evaluator.js';
import { ActionExecutor } from '../evaluation/action-executor.js';
import { isMemoryField, isUnsafePath } from '../utils/field-path.js';
import { fingerprint as sha256 } from '../utils/fingerprint.js';
import { HALT_FIELD, parseAction, parseCondition } from './expression.js';

export interface CompileOptions {
  /** Declared fact fields; fields outside the schema are compile errors. */
  schema?: FactSchema;
  /** SHA-256 of the source bytes. Derived from the rule rows when omitted. */
  fingerprint?: string;
}

const conditionEvaluator = new ConditionEvaluator();
const actionExecutor = new ActionExecutor();

class TableRule implements CompiledRule {
  readonly ruleId: string;
  readonly priority: number;
  readonly order: number;
  readonly row: number;
  readonly description?: string;
  readonly conditions: readonly CompiledCondition[];
  readonly actions: readonly CompiledAction[];

  constructor(
    definition: RuleDefinition,
    order: number,
    conditions: CompiledCondition[],
    actions: CompiledAction[],
  ) {
    this.ruleId = definition.ruleId;
    this.priority = definition.priority;
    this.order = order;
    this.row = definition.row;
    if (definition.description !== undefined) {
      this.description = definition.description;
    }
    // Wildcards never constrain a fact
    this.conditions = Object.freeze(conditions.filter((c) => c.operator.kind !== 'wildcard'));
    this.actions = Object.freeze(actions);
    Object.freeze(this);
  }

  matches(fact: Fact, memory: ReadonlyMap<string, unknown>): boolean {
    return conditionEvaluator.evaluateAll(this.conditions, fact, memory);
  }

  apply(fact: Fact, context: EvaluationContext): void {
    actionExecutor.execute(this.actions, fact, context);
  }
}

export class RuleCompiler {
  /**
   * Compiles one parsed sheet.
   *
   * @throws {CompilationError} With every issue found in the sheet
   */
  compile(parsed: ParsedRuleSet, options: CompileOptions = {}): ExecutableRuleSet {
    const issues: CompilationIssue[] = [];
    const seenIds = new Set<string>();
    const rules: TableRule[] = [];

    parsed.rules.forEach((definition, order) => {
      if (seenIds.has(definition.ruleId)) {
        issues.push({
          path: issuePath(parsed, definition),
          message: `duplicate rule id "${definition.ruleId}" (row ${definition.row})`,
          severity: 'error',
          ruleId: definition.ruleId,
        });
      }
      seenIds.add(definition.ruleId);

      const conditions: CompiledCondition[] = [];
      const actions: CompiledAction[] = [];
      const before = issues.length;

      for (const cell of definition.conditions) {
        const fieldType = this.resolveFieldType(cell, options.schema, parsed, definition, issues, 'condition');
        if (fieldType === undefined) continue;

        const result = parseCondition(cell.expression, fieldType);
        if (!result.ok) {
          issues.push(cellIssue(parsed, definition, cell, result.message));
          continue;
        }
        conditions.push({ field: cell.field, operator: result.value, expression: cell.expression });
      }

      for (const cell of definition.actions) {
        const isHalt = cell.field.toLowerCase() === HALT_FIELD;
        const fieldType = isHalt
          ? cell.fieldType
          : this.resolveFieldType(cell, options.schema, parsed, definition, issues, 'action');
        if (fieldType === undefined) continue;

        const result = parseAction(cell.expression, cell.field, fieldType);
        if (!result.ok) {
          issues.push(cellIssue(parsed, definition, cell, result.message));
          continue;
        }
        if (result.value !== null) {
          actions.push({ field: cell.field, operation: result.value, expression: cell.expression });
        }
      }

      if (issues.length === before) {
        rules.push(new TableRule(definition, order, conditions, actions));
      }
    });

    if (issues.length > 0) {
      throw new CompilationError(parsed.ruleSetName, issues);
    }

    rules.sort((a, b) => b.priority - a.priority || a.order - b.order);

    return Object.freeze({
      ruleSetName: parsed.ruleSetName,
      tableName: parsed.tableName,
      sheetName: parsed.sheetName,
      rules: Object.freeze(rules),
      fingerprint: options.fingerprint ?? sha256(JSON.stringify(parsed.rules)),
      compiledAt: Date.now(),
    });
  }

  /**
   * Compiles every parsed sheet.
   *
   * @throws {CompilationError} For the first sheet that fails
   */
  compileAll(parsed: ReadonlyMap<string, ParsedRuleSet>, options: CompileOptions = {}): Map<string, ExecutableRuleSet> {
    const result = new Map<string, ExecutableRuleSet>();
    for (const [sheetName, ruleSet] of parsed) {
      result.set(sheetName, this.compile(ruleSet, options));
    }
    return result;
  }

  /**
   * Column type, narrowed by the schema when the column declares `any`.
   * Returns undefined (and records an issue) for unknown or conflicting fields.
   */
  private resolveFieldType(
    cell: CellDefinition,
    schema: FactSchema | undefined,
    parsed: ParsedRuleSet,
    definition: RuleDefinition,
    issues: CompilationIssue[],
    kind: 'condition' | 'action',
  ): FieldType | undefined {
    if (isMemoryField(cell.field)) {
      return cell.fieldType;
    }
    if (isUnsafePath(cell.field)) {
      issues.push(cellIssue(parsed, definition, cell, `${kind} field path "${cell.field}" is not allowed`));
      return undefined;
    }
    if (!schema) {
      return cell.fieldType;
    }

    const schemaType = Object.hasOwn(schema, cell.field) ? schema[cell.field] : undefined;
    if (schemaType === undefined) {
      issues.push(cellIssue(parsed, definition, cell, `unknown ${kind} field "${cell.field}"`));
      return undefined;
    }
    if (cell.fieldType === 'any') {
      return schemaType;
    }
    if (schemaType !== 'any' && schemaType !== cell.fieldType) {
      issues.push(
        cellIssue(
          parsed,
          definition,
          cell,
          `column declares "${cell.fieldType}" but the schema declares "${schemaType}" for "${cell.field}"`,
        ),
      );
      return undefined;
    }
    return cell.fieldType;
  }
}

function issuePath(parsed: ParsedRuleSet, definition: RuleDefinition): string {
  return `${parsed.sheetName}!${definition.row}`;
}

function cellIssue(
  parsed: ParsedRuleSet,
  definition: RuleDefinition,
  cell: CellDefinition,
  message: string,
): CompilationIssue {
  return {
    path: `${issuePath(parsed, definition)}.${cell.field}`,
    message: `rule "${definition.ruleId}", field "${cell.field}": ${message}`,
    severity: 'error',
    ruleId: definition.ruleId,
    field: cell.field,
  };
}
