import type { ConditionOperator } from '../types/rule.js';

/**
 * Vyhodnotí operátor podmínky nad hodnotou pole.
 *
 * Porovnání jsou striktní (`===`), uspořádání a `between` platí jen pro čísla -
 * chybějící nebo nečíselná hodnota jim nevyhoví.
 */
export function evaluateOperator(operator: ConditionOperator, value: unknown): boolean {
  switch (operator.kind) {
    case 'wildcard':
      return true;

    case 'eq':
      return value === operator.operand;

    case 'neq':
      return value !== operator.operand;

    case 'gt':
      return typeof value === 'number' && value > operator.operand;

    case 'gte':
      return typeof value === 'number' && value >= operator.operand;

    case 'lt':
      return typeof value === 'number' && value < operator.operand;

    case 'lte':
      return typeof value === 'number' && value <= operator.operand;

    case 'between':
      return typeof value === 'number' && value >= operator.min && value <= operator.max;

    case 'in':
      return operator.operands.some((operand) => operand === value);
  }
}
