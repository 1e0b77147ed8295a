/**
 * Příkaz evaluate pro CLI.
 * Vyhodnotí jeden fakt proti tabulce a vypíše výsledný fakt a trace.
 */

import { basename } from 'node:path';
import type { EvaluationOutput, GlobalOptions } from '../types.js';
import type { Fact } from '../../types/fact.js';
import { isObject } from '../../validation/types.js';
import { MemoryTableSource } from '../../core/hot-reload/sources.js';
import { InvalidArgumentsError } from '../utils/errors.js';
import { printData } from '../utils/output.js';
import { loadTableFile, startCommandEngine } from '../utils/table-file.js';

/** Id, pod kterým příkaz registruje tabulku */
const CLI_RULE_SET_ID = 'cli';

/** Options pro příkaz evaluate */
export interface EvaluateOptions extends GlobalOptions {
  /** Fakt jako JSON objekt */
  fact: string | undefined;
  sheet: string | undefined;
}

/** Parsuje fakt z argumentu --fact */
export function parseFactArgument(text: string | undefined): Fact {
  if (text === undefined) {
    throw new InvalidArgumentsError('Missing required option --fact <json>');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidArgumentsError(`Invalid JSON in --fact: ${message}`);
  }

  if (!isObject(parsed)) {
    throw new InvalidArgumentsError('--fact must be a JSON object');
  }
  return parsed;
}

/**
 * Akce příkazu evaluate.
 */
export async function evaluateCommand(file: string, options: EvaluateOptions): Promise<void> {
  const fact = parseFactArgument(options.fact);
  const table = await loadTableFile(file);
  const engine = await startCommandEngine(options.config);

  try {
    engine.registerRuleSet(
      CLI_RULE_SET_ID,
      new MemoryTableSource({
        name: basename(table.path),
        content: table.bytes,
        contentType: table.contentType,
        ...(options.sheet !== undefined && { sheet: options.sheet }),
      }),
    );
    const result = await engine.evaluate(fact, CLI_RULE_SET_ID);

    const output: EvaluationOutput = {
      file: table.path,
      ruleSetName: result.ruleSetName,
      fact: result.fact,
      trace: result.trace,
      rulesEvaluated: result.rulesEvaluated,
      rulesFired: result.rulesFired,
      halted: result.halted,
    };
    printData({ type: 'evaluation', data: output });
  } finally {
    await engine.stop();
  }
}
