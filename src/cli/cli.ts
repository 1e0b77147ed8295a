/**
 * Hlavní CLI setup pomocí CAC.
 */

import { cac } from 'cac';
import { version } from './version.js';
import { OUTPUT_FORMATS, type GlobalOptions } from './types.js';
import { setOutputOptions, printError } from './utils/output.js';
import { getExitCode, formatError, InvalidArgumentsError } from './utils/errors.js';
import { validateCommand } from './commands/validate.js';
import { sheetsCommand } from './commands/sheets.js';
import { evaluateCommand } from './commands/evaluate.js';

/** CLI instance */
const cli = cac('tabula-rules');

/**
 * Promise z běžící async akce.
 * CAC neawaituje async action handlery — musíme to udělat sami.
 */
let _actionPromise: Promise<void> | undefined;

/** Obalí async action handler tak, aby se jeho Promise dala awaitovat v run(). */
function tracked<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => void {
  return (...args: T) => {
    _actionPromise = fn(...args);
  };
}

/** Spustí akci příkazu; chybu vypíše a ukončí proces s odpovídajícím exit kódem */
async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    printError(formatError(err));
    process.exit(getExitCode(err));
  }
}

/** Přečte řetězcovou option; mri převádí číselné hodnoty na number */
export function stringOption(options: Record<string, unknown>, name: string): string | undefined {
  const value = options[name];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  throw new InvalidArgumentsError(`Option --${name} expects a value`);
}

/** Zpracuje globální options */
export function processGlobalOptions(options: Record<string, unknown>): GlobalOptions {
  const formatValue = stringOption(options, 'format') ?? 'pretty';
  const format = OUTPUT_FORMATS.find((f) => f === formatValue);
  if (format === undefined) {
    throw new InvalidArgumentsError(
      `Invalid format "${formatValue}". Expected one of: ${OUTPUT_FORMATS.join(', ')}`
    );
  }

  const quiet = options['quiet'] === true;
  // --no-color nastaví option `color` na false
  const noColor = options['color'] === false;

  setOutputOptions({ format, quiet, noColor });

  return {
    format,
    quiet,
    noColor,
    config: stringOption(options, 'config')
  };
}

/** Registruje globální options */
function registerGlobalOptions(): void {
  cli
    .option('-f, --format <format>', 'Output format: json, pretty')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to engine config file (tabula.config.json / .yaml)');
}

/** Registruje příkaz version */
function registerVersionCommand(): void {
  cli.command('version', 'Show version information').action(() => {
    console.log(`tabula-rules v${version}`);
  });
}

/** Registruje příkaz validate */
function registerValidateCommand(): void {
  cli
    .command('validate <file>', 'Parse and compile every sheet of a decision table')
    .option('-s, --sheet <name>', 'Validate only this sheet')
    .action(tracked((file: string, options: Record<string, unknown>) =>
      runAction(() =>
        validateCommand(file, {
          ...processGlobalOptions(options),
          sheet: stringOption(options, 'sheet')
        })
      )
    ));
}

/** Registruje příkaz sheets */
function registerSheetsCommand(): void {
  cli
    .command('sheets <file>', 'List the sheets of a decision table workbook')
    .action(tracked((file: string, options: Record<string, unknown>) =>
      runAction(() => sheetsCommand(file, processGlobalOptions(options)))
    ));
}

/** Registruje příkaz evaluate */
function registerEvaluateCommand(): void {
  cli
    .command('evaluate <file>', 'Evaluate a fact against a decision table')
    .option('--fact <json>', 'Fact as a JSON object')
    .option('-s, --sheet <name>', 'Sheet to load (default: first sheet with data)')
    .action(tracked((file: string, options: Record<string, unknown>) =>
      runAction(() =>
        evaluateCommand(file, {
          ...processGlobalOptions(options),
          fact: stringOption(options, 'fact'),
          sheet: stringOption(options, 'sheet')
        })
      )
    ));
}

/** Inicializuje a spustí CLI */
export async function run(args: string[] = process.argv): Promise<void> {
  registerGlobalOptions();
  registerVersionCommand();
  registerValidateCommand();
  registerSheetsCommand();
  registerEvaluateCommand();

  cli.help();
  cli.version(version);

  try {
    cli.parse(args);
    if (_actionPromise) {
      await _actionPromise;
    }
  } catch (err) {
    printError(formatError(err));
    process.exit(getExitCode(err));
  }
}

export { cli };
