/**
 * CLI chybové třídy.
 */

import { ExitCode } from '../types.js';
import type { ValidationIssue } from '../../validation/types.js';
import { InvalidInputError } from '../../errors/tabula-error.js';
import { TableValidationError } from '../../errors/table-validation-error.js';
import { CompilationError } from '../../errors/compilation-error.js';

export type { ValidationIssue } from '../../validation/types.js';

/** Základní CLI chyba */
export class CliError extends Error {
  public readonly exitCode: ExitCode;
  public override readonly cause: Error | undefined;

  constructor(message: string, exitCode: ExitCode = ExitCode.GeneralError, cause?: Error) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
    this.cause = cause;
  }
}

/** Chyba validace argumentů */
export class InvalidArgumentsError extends CliError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.InvalidArguments, cause);
    this.name = 'InvalidArgumentsError';
  }
}

/** Soubor nenalezen */
export class FileNotFoundError extends CliError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: Error) {
    super(`File not found: ${filePath}`, ExitCode.FileNotFound, cause);
    this.name = 'FileNotFoundError';
    this.filePath = filePath;
  }
}

/** Tabulka nebo její pravidla neprošla validací */
export class ValidationError extends CliError {
  public readonly errors: ValidationIssue[];

  constructor(message: string, errors: ValidationIssue[] = [], cause?: Error) {
    super(message, ExitCode.ValidationError, cause);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/** Získá exit kód z chyby */
export function getExitCode(error: unknown): ExitCode {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof TableValidationError || error instanceof CompilationError) {
    return ExitCode.ValidationError;
  }
  if (error instanceof InvalidInputError) {
    return ExitCode.InvalidArguments;
  }
  return ExitCode.GeneralError;
}

/** Formátuje chybu pro výstup */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError && error.errors.length > 0) {
    return (
      error.message +
      '\n' +
      error.errors.map((e) => `  ${e.severity === 'error' ? '✗' : '⚠'} ${e.path}: ${e.message}`).join('\n')
    );
  }
  if (error instanceof CompilationError) {
    return error.message + '\n' + error.issues.map((i) => `  ✗ ${i.path}: ${i.message}`).join('\n');
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
