/**
 * Nálezy validace rozhodovacích tabulek.
 *
 * @module
 */

/** Nález z dekodéru, kompilátoru nebo konfigurace; `path` ukazuje na buňku, sloupec nebo klíč. */
export interface ValidationIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}

/** Souhrn validace jedné tabulky. Tabulka je platná, když nemá žádnou chybu. */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Sběrač nálezů. Dekodér i kompilátor hlásí všechny problémy tabulky najednou,
 * místo aby skončily na prvním.
 */
export class IssueCollector {
  private readonly found: ValidationIssue[] = [];

  addError(path: string, message: string): void {
    this.found.push({ path: path || '(root)', message, severity: 'error' });
  }

  addWarning(path: string, message: string): void {
    this.found.push({ path: path || '(root)', message, severity: 'warning' });
  }

  get hasErrors(): boolean {
    return this.found.some((issue) => issue.severity === 'error');
  }

  toResult(): ValidationResult {
    const errors = this.found.filter((issue) => issue.severity === 'error');
    return {
      valid: errors.length === 0,
      errors,
      warnings: this.found.filter((issue) => issue.severity === 'warning'),
    };
  }
}

/** Plain objekt (ne pole, ne null). */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
