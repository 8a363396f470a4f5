import { describe, it, expect } from 'vitest';
import { ResultTracker } from './result-tracker.js';
import { testCase } from '../../testing/fakes.js';

describe('ResultTracker', () => {
  it('spends one retry on a fail, fail, pass sequence and drops the entry', () => {
    const results = new ResultTracker(2);

    results.registerFail('t');
    expect(results.remainingRetries('t')).toBe(2);
    results.registerFail('t');
    expect(results.remainingRetries('t')).toBe(1);
    results.registerPass('t');

    expect(results.remainingRetries('t')).toBeUndefined();
    expect(results.failed).toEqual([]);
    expect(results.passed).toEqual(['t']);
  });

  it('never retries without a budget but keeps the failure', () => {
    const results = new ResultTracker(0);
    const tests = [testCase({ name: 't' })];

    results.registerFail('t');

    expect(results.filterRetries(tests)).toEqual([]);
    expect(results.failed).toEqual(['t']);
    expect(results.hasFailures()).toBe(true);
  });

  it('retries while the budget lasts', () => {
    const results = new ResultTracker(1);
    const tests = [testCase({ name: 'a' }), testCase({ name: 'b' })];

    results.registerFail('a');
    results.registerPass('b');
    expect(results.filterRetries(tests).map((t) => t.name)).toEqual(['a']);

    results.registerFail('a');
    expect(results.filterRetries(tests)).toEqual([]);
  });

  it('records a skip once', () => {
    const results = new ResultTracker(1);

    results.registerSkip('t');
    results.registerSkip('t');

    expect(results.skipped).toEqual(['t']);
    expect(results.hasFailures()).toBe(false);
  });

  it('keeps a failed test failed when its devices vanish on retry', () => {
    const results = new ResultTracker(3);

    results.registerFail('t');
    results.registerSkip('t');

    expect(results.failed).toEqual(['t']);
    expect(results.skipped).toEqual([]);
    expect(results.filterRetries([testCase({ name: 't' })])).toEqual([]);
  });
});
