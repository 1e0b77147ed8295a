import { describe, it, expect } from 'vitest';
import { EvaluationContext } from '../../../src/pool/evaluation-context.js';

describe('EvaluationContext', () => {
  const create = () => new EvaluationContext({ id: 'ctx-1', ruleSetName: 'discounts', generation: 0 });

  it('records firings with increasing sequence numbers', () => {
    const context = create();

    context.recordEvaluation();
    context.recordFiring('first');
    context.recordEvaluation();
    context.recordEvaluation();
    context.recordFiring('second');

    expect(context.rulesEvaluated).toBe(3);
    expect(context.rulesFired).toBe(2);
    expect(context.trace).toEqual([
      { ruleId: 'first', firedAtSequence: 1 },
      { ruleId: 'second', firedAtSequence: 2 },
    ]);
  });

  it('returns a trace snapshot that survives reset', () => {
    const context = create();
    context.recordFiring('only');

    const snapshot = context.snapshotTrace();
    context.reset();

    expect(snapshot).toEqual([{ ruleId: 'only', firedAtSequence: 1 }]);
    expect(context.trace).toEqual([]);
  });

  it('reset clears memory, counters, halt, phase and poison', () => {
    const context = create();
    context.workingMemory.set('score', 3);
    context.recordEvaluation();
    context.recordFiring('r1');
    context.halt();
    context.transition('acting');
    context.poison();

    context.reset();

    expect(context.workingMemory.size).toBe(0);
    expect(context.rulesEvaluated).toBe(0);
    expect(context.sequence).toBe(0);
    expect(context.halted).toBe(false);
    expect(context.phase).toBe('start');
    expect(context.poisoned).toBe(false);
  });

  it('stays in the failed phase once entered', () => {
    const context = create();

    context.transition('failed');
    context.transition('done');

    expect(context.phase).toBe('failed');
  });

  it('counts borrows and rejects use after dispose', () => {
    const context = create();
    context.markBorrowed();
    context.markBorrowed();

    expect(context.useCount).toBe(2);

    context.dispose();
    context.dispose();

    expect(context.disposed).toBe(true);
    expect(() => context.reset()).toThrow('Evaluation context ctx-1 has been disposed');
    expect(() => context.markBorrowed()).toThrow('Evaluation context ctx-1 has been disposed');
  });
});
