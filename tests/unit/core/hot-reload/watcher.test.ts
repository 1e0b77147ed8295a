import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RuleEngine } from '../../../../src/core/rule-engine.js';
import { HotReloadWatcher } from '../../../../src/core/hot-reload/watcher.js';
import { MemoryTableSource } from '../../../../src/core/hot-reload/sources.js';
import type { TableSource } from '../../../../src/core/hot-reload/types.js';
import type { Fact } from '../../../../src/types/fact.js';
import { fingerprint } from '../../../../src/utils/fingerprint.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Jednou ročně - kontroly v testech voláme ručně */
const YEARLY = '0 0 0 1 1 *';

function discountsTable(discount: number, ageCondition = '">60"'): string {
  return [
    'Discounts:',
    '  - [RuleSet, discounts]',
    '  - [RuleTable, Pricing]',
    '  - [NAME, CONDITION, CONDITION, ACTION]',
    '  - [rule, Age, Tier, Discount]',
    `  - [senior-gold, ${ageCondition}, "==GOLD", ${discount}]`,
    '',
  ].join('\n');
}

class FlakySource implements TableSource {
  readonly name = 'flaky.yaml';
  readonly contentType = 'yaml';
  failing = false;

  async read(): Promise<Uint8Array> {
    if (this.failing) {
      throw new Error('disk gone');
    }
    return new TextEncoder().encode(discountsTable(20));
  }
}

async function discountFor(engine: RuleEngine): Promise<unknown> {
  const fact: Fact = { Age: 65, Tier: 'GOLD' };
  await engine.evaluate(fact, 'discounts');
  return fact['Discount'];
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe('HotReloadWatcher', () => {
  let engine: RuleEngine;
  let watcher: HotReloadWatcher | null;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    engine = await RuleEngine.start({ name: 'test' });
    watcher = null;
  });

  afterEach(async () => {
    watcher?.stop();
    await engine.stop();
    vi.restoreAllMocks();
  });

  describe('performCheck', () => {
    let source: MemoryTableSource;

    beforeEach(async () => {
      source = new MemoryTableSource({ name: 'discounts.yaml', content: discountsTable(20), contentType: 'yaml' });
      engine.registerRuleSet('discounts', source);
      await engine.load('discounts');
      watcher = await HotReloadWatcher.start(engine, { schedule: YEARLY });
    });

    it('reports no change for content loaded by the engine', async () => {
      expect(await watcher?.performCheck()).toEqual({ checked: 1, changed: [], reloads: [] });
    });

    it('reloads a rule set whose content changed', async () => {
      source.update(discountsTable(30));

      const result = await watcher?.performCheck();

      expect(result?.changed).toEqual(['discounts']);
      expect(result?.reloads[0]).toMatchObject({
        ruleSetId: 'discounts',
        success: true,
        rulesCount: 1,
        fingerprint: fingerprint(discountsTable(30)),
      });
      expect(console.info).toHaveBeenCalledWith('[hot-reload] Reloaded rule set "discounts" (1 rules)');
      expect(await discountFor(engine)).toBe(30);
      expect(watcher?.getStatus()).toMatchObject({ reloadCount: 1, failureCount: 0 });
    });

    it('keeps the previous rule set when the new table is broken', async () => {
      const message =
        'Rule set "discounts" failed to compile: rule "senior-gold", field "Age": operator ">" expects a number, got "old"';
      source.update(discountsTable(30, '"> old"'));

      const result = await watcher?.performCheck();

      expect(result?.reloads[0]).toMatchObject({ success: false, rulesCount: 0, error: message });
      expect(console.error).toHaveBeenCalledWith(`[hot-reload] Reload of rule set "discounts" failed: ${message}`);
      expect(await discountFor(engine)).toBe(20);
      expect(watcher?.getStatus()).toMatchObject({ reloadCount: 0, failureCount: 1, lastReloadAt: null });
    });

    it('does not retry a failed reload until the content changes again', async () => {
      source.update(discountsTable(30, '"> old"'));
      await watcher?.performCheck();

      expect(await watcher?.performCheck()).toEqual({ checked: 1, changed: [], reloads: [] });

      source.update(discountsTable(40));
      const result = await watcher?.performCheck();
      expect(result?.reloads[0]?.success).toBe(true);
      expect(await discountFor(engine)).toBe(40);
    });
  });

  it('reports a failed read as a failed reload', async () => {
    const source = new FlakySource();
    engine.registerRuleSet('discounts', source);
    await engine.load('discounts');
    watcher = await HotReloadWatcher.start(engine, { schedule: YEARLY });

    source.failing = true;
    const result = await watcher.performCheck();

    expect(result.changed).toEqual(['discounts']);
    expect(result.reloads[0]).toMatchObject({ success: false, fingerprint: '', error: 'disk gone' });
    expect(await discountFor(engine)).toBe(20);
  });

  it('reloads on every check when the cache is disabled', async () => {
    await engine.stop();
    engine = await RuleEngine.start({ name: 'test', cache: { enabled: false } });
    engine.registerRuleSet(
      'discounts',
      new MemoryTableSource({ name: 'discounts.yaml', content: discountsTable(20), contentType: 'yaml' }),
    );
    await engine.load('discounts');
    watcher = await HotReloadWatcher.start(engine, { schedule: YEARLY });

    await watcher.performCheck();
    const result = await watcher.performCheck();

    expect(result.changed).toEqual(['discounts']);
    expect(watcher.getStatus().reloadCount).toBe(2);
  });

  it('reports its schedule status and stops', async () => {
    watcher = await HotReloadWatcher.start(engine, { schedule: YEARLY });

    const status = watcher.getStatus();
    expect(status).toMatchObject({ running: true, schedule: YEARLY, trackedSources: 0, lastReloadAt: null });
    expect(typeof status.nextCheckAt).toBe('number');

    watcher.stop();
    expect(watcher.getStatus()).toMatchObject({ running: false, nextCheckAt: null });
  });
});
