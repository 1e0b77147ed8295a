import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { validateCommand } from '../../../../src/cli/commands/validate.js';
import { sheetsCommand } from '../../../../src/cli/commands/sheets.js';
import { evaluateCommand, parseFactArgument } from '../../../../src/cli/commands/evaluate.js';
import { setOutputOptions } from '../../../../src/cli/utils/output.js';
import { FileNotFoundError, InvalidArgumentsError, ValidationError } from '../../../../src/cli/utils/errors.js';
import { FileTableSource, MemoryTableSource } from '../../../../src/core/hot-reload/sources.js';
import type { GlobalOptions } from '../../../../src/cli/types.js';
import { fingerprint } from '../../../../src/utils/fingerprint.js';
import { fixturePath, readFixture } from '../../../helpers/fixtures.js';

const globals: GlobalOptions = { format: 'json', quiet: false, noColor: true, config: undefined };

/** Poslední JSON vypsaný na stdout */
function lastOutput(): unknown {
  const calls = vi.mocked(console.log).mock.calls;
  const last = calls[calls.length - 1];
  return JSON.parse(String(last?.[0]));
}

describe('CLI commands', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    setOutputOptions({ format: 'json', quiet: false, noColor: true });
  });

  afterEach(() => {
    setOutputOptions({ format: 'pretty', quiet: false, noColor: false });
    vi.restoreAllMocks();
  });

  // ── validate ──────────────────────────────────────────────────────────────

  describe('validate', () => {
    it('prints a summary of a valid table', async () => {
      const file = fixturePath('discounts.yaml');

      await validateCommand(file, { ...globals, sheet: undefined });

      expect(lastOutput()).toEqual({
        success: true,
        validation: {
          file,
          valid: true,
          fingerprint: fingerprint(readFixture('discounts.yaml')),
          rulesCount: 1,
          sheets: [{ sheetName: 'Discounts', ruleSetName: 'discounts', tableName: 'Pricing', rulesCount: 1 }],
          errors: [],
        },
      });
    });

    it('prints the report and fails for a broken table', async () => {
      const error = await validateCommand(fixturePath('broken.yaml'), { ...globals, sheet: undefined }).then(
        () => null,
        (err: unknown) => err,
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.message).toBe('Validation failed with 1 error(s)');
      expect(lastOutput()).toMatchObject({ success: false, validation: { valid: false, rulesCount: 0 } });
    });

    it('fails for a missing file', async () => {
      await expect(validateCommand('missing.yaml', { ...globals, sheet: undefined })).rejects.toThrow(
        new FileNotFoundError('missing.yaml'),
      );
    });
  });

  // ── sheets ────────────────────────────────────────────────────────────────

  describe('sheets', () => {
    it('reports the status of every sheet', async () => {
      const file = fixturePath('workbook.yaml');

      await sheetsCommand(file, globals);

      expect(lastOutput()).toMatchObject({
        success: true,
        data: {
          file,
          sheets: [
            { name: 'Notes', status: 'skipped' },
            {
              name: 'Draft',
              status: 'skipped',
              message: `Sheet 'Draft' in '${file}' contains headers but no data rows.`,
            },
            { name: 'Loyalty', status: 'ok', ruleSetName: 'loyalty', tableName: 'Tiers', rulesCount: 3 },
          ],
        },
      });
    });
  });

  // ── evaluate ──────────────────────────────────────────────────────────────

  describe('evaluate', () => {
    it('parses the fact argument', () => {
      expect(parseFactArgument('{"Age": 65}')).toEqual({ Age: 65 });
      expect(() => parseFactArgument(undefined)).toThrow('Missing required option --fact <json>');
      expect(() => parseFactArgument('[1]')).toThrow('--fact must be a JSON object');
      expect(() => parseFactArgument('{')).toThrow(InvalidArgumentsError);
      expect(() => parseFactArgument('{')).toThrow(/^Invalid JSON in --fact: /);
    });

    it('prints the evaluated fact and trace', async () => {
      const file = fixturePath('discounts.yaml');

      await evaluateCommand(file, { ...globals, fact: '{"Age": 65, "Tier": "GOLD"}', sheet: undefined });

      expect(lastOutput()).toEqual({
        success: true,
        data: {
          file,
          ruleSetName: 'discounts',
          fact: { Age: 65, Tier: 'GOLD', Discount: 20 },
          trace: [{ ruleId: 'senior-gold', firedAtSequence: 1 }],
          rulesEvaluated: 1,
          rulesFired: 1,
          halted: false,
        },
      });
    });

    it('reads the table file only once', async () => {
      const fileRead = vi.spyOn(FileTableSource.prototype, 'read');
      const memoryRead = vi.spyOn(MemoryTableSource.prototype, 'read');

      await evaluateCommand(fixturePath('discounts.yaml'), { ...globals, fact: '{"Age": 65, "Tier": "GOLD"}', sheet: undefined });

      expect(fileRead).not.toHaveBeenCalled();
      expect(memoryRead).toHaveBeenCalledTimes(1);
    });

    it('loads the requested sheet', async () => {
      await evaluateCommand(fixturePath('workbook.yaml'), { ...globals, fact: '{"points": 1500}', sheet: 'Loyalty' });

      expect(lastOutput()).toMatchObject({
        data: { ruleSetName: 'loyalty', fact: { points: 1500, tier: 'PLATINUM' }, halted: true },
      });
    });

    it('validates the fact before touching the file', async () => {
      await expect(
        evaluateCommand('missing.yaml', { ...globals, fact: 'nope', sheet: undefined }),
      ).rejects.toThrow(InvalidArgumentsError);
    });
  });
});
