/**
 * Pretty formátter pro CLI výstup - lidsky čitelný formát.
 */

import type {
  EvaluationOutput,
  FormattableData,
  SheetsOutput,
  ValidationOutput,
} from '../types.js';
import type { OutputFormatter } from './index.js';

export class PrettyFormatter implements OutputFormatter {
  constructor(private readonly useColors: boolean = true) {}

  format(data: FormattableData): string {
    switch (data.type) {
      case 'validation':
        return this.formatValidation(data.data);
      case 'sheets':
        return this.formatSheets(data.data);
      case 'evaluation':
        return this.formatEvaluation(data.data);
      case 'error':
        return this.color(`✗ ${data.data}`, 'red');
      case 'message':
        return data.data;
    }
  }

  private formatValidation(output: ValidationOutput): string {
    const lines: string[] = [this.color(`File: ${output.file}`, 'bold'), ''];

    for (const sheet of output.sheets) {
      const name = sheet.ruleSetName === sheet.tableName ? sheet.ruleSetName : `${sheet.ruleSetName} / ${sheet.tableName}`;
      lines.push(`  ${this.color('●', 'green')} ${sheet.sheetName} ${this.color(`(${name})`, 'dim')}: ${sheet.rulesCount} rule(s)`);
    }
    if (output.sheets.length > 0) {
      lines.push('');
    }

    if (output.valid) {
      lines.push(this.color(`✓ Valid: ${output.rulesCount} rule(s) in ${output.sheets.length} sheet(s)`, 'green'));
    } else {
      lines.push(this.color(`✗ ${output.errors.length} error(s)`, 'red'));
      lines.push('');
      for (const err of output.errors) {
        lines.push(`  ${this.color('✗', 'red')} ${this.color(err.path, 'cyan')}: ${err.message}`);
      }
    }

    return lines.join('\n');
  }

  private formatSheets(output: SheetsOutput): string {
    if (output.sheets.length === 0) {
      return this.color('No sheets found.', 'dim');
    }

    const lines: string[] = [this.color(`Found ${output.sheets.length} sheet(s) in ${output.file}:`, 'cyan'), ''];

    for (const sheet of output.sheets) {
      if (sheet.status === 'ok') {
        lines.push(`${this.color('●', 'green')} ${sheet.name}`);
        lines.push(`  ${this.color('RuleSet:', 'dim')} ${sheet.ruleSetName}`);
        lines.push(`  ${this.color('RuleTable:', 'dim')} ${sheet.tableName}`);
        lines.push(`  ${this.color('Rules:', 'dim')} ${sheet.rulesCount}`);
      } else {
        const mark = sheet.status === 'skipped' ? this.color('○', 'dim') : this.color('✗', 'red');
        lines.push(`${mark} ${sheet.name}`);
        lines.push(`  ${this.color(sheet.message, sheet.status === 'skipped' ? 'dim' : 'red')}`);
      }
    }

    return lines.join('\n');
  }

  private formatEvaluation(output: EvaluationOutput): string {
    const lines: string[] = [
      this.color(`Rule set: ${output.ruleSetName}`, 'bold'),
      `Rules evaluated: ${output.rulesEvaluated}, fired: ${output.rulesFired}${output.halted ? ' (halted)' : ''}`,
      '',
    ];

    if (output.trace.length === 0) {
      lines.push(this.color('No rule fired.', 'dim'));
    } else {
      lines.push(this.color('Fired rules:', 'cyan'));
      for (const fired of output.trace) {
        lines.push(`  ${this.color(`${fired.firedAtSequence}.`, 'dim')} ${fired.ruleId}`);
      }
    }

    lines.push('');
    lines.push(this.color('Fact:', 'cyan'));
    lines.push(JSON.stringify(output.fact, null, 2));

    return lines.join('\n');
  }

  private color(text: string, style: ColorStyle): string {
    if (!this.useColors) {
      return text;
    }
    const codes: Record<ColorStyle, string> = {
      bold: '\x1b[1m',
      dim: '\x1b[2m',
      red: '\x1b[31m',
      green: '\x1b[32m',
      cyan: '\x1b[36m'
    };
    return `${codes[style]}${text}\x1b[0m`;
  }
}

type ColorStyle = 'bold' | 'dim' | 'red' | 'green' | 'cyan';
