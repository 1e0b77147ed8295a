/**
 * Error thrown when a parsed rule row is semantically invalid.
 *
 * @module
 */

import type { ValidationIssue } from '../validation/types.js';
import { TabulaError } from './tabula-error.js';

/** A compilation problem tied to a rule row and, usually, a field. */
export interface CompilationIssue extends ValidationIssue {
  ruleId: string;
  field?: string;
}

export class CompilationError extends TabulaError {
  override readonly statusCode = 422;
  override readonly code = 'RULE_COMPILATION_ERROR';
  readonly ruleSetName: string;
  readonly issues: CompilationIssue[];

  constructor(ruleSetName: string, issues: CompilationIssue[]) {
    super(CompilationError.buildMessage(ruleSetName, issues));
    this.name = 'CompilationError';
    this.ruleSetName = ruleSetName;
    this.issues = issues;
  }

  /** Exposes issues as `details` for an API error handler. */
  get details(): CompilationIssue[] {
    return this.issues;
  }

  private static buildMessage(ruleSetName: string, issues: CompilationIssue[]): string {
    const first = issues[0];
    if (!first) {
      return `Rule set "${ruleSetName}" failed to compile`;
    }
    const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : '';
    return `Rule set "${ruleSetName}" failed to compile: ${first.message}${more}`;
  }
}
