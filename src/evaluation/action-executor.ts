import type { CompiledAction } from '../types/rule.js';
import type { Fact } from '../types/fact.js';
import type { EvaluationContext } from '../pool/evaluation-context.js';
import { isMemoryField, MEMORY_PREFIX, readField, setNestedValue } from '../utils/field-path.js';

/**
 * Spouštění akcí pravidla nad faktem a pracovní pamětí kontextu.
 *
 * Akce se aplikují v pořadí sloupců. Chyba (např. `+=` nad textovým polem)
 * se propaguje - engine ji obalí do EvaluationError a kontext otráví.
 */
export class ActionExecutor {
  /**
   * Spustí všechny akce.
   */
  execute(actions: readonly CompiledAction[], fact: Fact, context: EvaluationContext): void {
    for (const action of actions) {
      this.executeAction(action, fact, context);
    }
  }

  /**
   * Spustí jednu akci.
   */
  executeAction(action: CompiledAction, fact: Fact, context: EvaluationContext): void {
    const { field, operation } = action;

    switch (operation.kind) {
      case 'set':
        this.write(fact, context, field, operation.value);
        return;

      case 'add':
      case 'subtract': {
        const current = this.readNumber(fact, context, field);
        const delta = operation.kind === 'add' ? operation.amount : -operation.amount;
        this.write(fact, context, field, current + delta);
        return;
      }

      case 'append': {
        const current = readField(fact, context.workingMemory, field);
        if (current === undefined || current === null) {
          this.write(fact, context, field, [operation.label]);
        } else if (Array.isArray(current)) {
          current.push(operation.label);
        } else {
          throw new TypeError(`Cannot append to "${field}": current value is not a list`);
        }
        return;
      }

      case 'halt':
        context.halt();
        return;
    }
  }

  private readNumber(fact: Fact, context: EvaluationContext, field: string): number {
    const current = readField(fact, context.workingMemory, field);
    if (current === undefined || current === null) return 0;
    if (typeof current !== 'number') {
      throw new TypeError(`Cannot do arithmetic on "${field}": current value is ${typeof current}`);
    }
    return current;
  }

  private write(fact: Fact, context: EvaluationContext, field: string, value: unknown): void {
    if (isMemoryField(field)) {
      context.workingMemory.set(field.slice(MEMORY_PREFIX.length), value);
    } else {
      setNestedValue(fact, field, value);
    }
  }
}
