import type { CompiledCondition } from '../types/rule.js';
import type { Fact } from '../types/fact.js';
import { evaluateOperator } from '../utils/operators.js';
import { readField } from '../utils/field-path.js';

/**
 * Vyhodnocuje podmínky pravidel.
 */
export class ConditionEvaluator {
  /**
   * Vyhodnotí všechny podmínky (AND logika). Prázdný seznam i samé
   * wildcardy matchují každý fakt.
   */
  evaluateAll(
    conditions: readonly CompiledCondition[],
    fact: Fact,
    memory: ReadonlyMap<string, unknown>,
  ): boolean {
    for (const condition of conditions) {
      if (!this.evaluate(condition, fact, memory)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Vyhodnotí jednu podmínku.
   */
  evaluate(condition: CompiledCondition, fact: Fact, memory: ReadonlyMap<string, unknown>): boolean {
    if (condition.operator.kind === 'wildcard') {
      return true;
    }
    return evaluateOperator(condition.operator, readField(fact, memory, condition.field));
  }
}
