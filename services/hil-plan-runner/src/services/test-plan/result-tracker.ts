/**
 * Result Tracker
 *
 * Keeps the passed, failed and skipped test names of a plan run and the
 * remaining retry budget of each failed test.
 */

import type { TestCase } from '../../types/hil-types.js';

export class ResultTracker {
  readonly passed: string[] = [];
  readonly failed: string[] = [];
  readonly skipped: string[] = [];

  private readonly retries = new Map<string, number>();

  constructor(readonly maxRetries: number) {}

  /**
   * A skip is final. A test that already failed and loses its devices on a
   * retry stays failed and is not retried again.
   */
  registerSkip(name: string): void {
    if (this.failed.includes(name)) {
      this.retries.delete(name);
      return;
    }
    if (!this.skipped.includes(name)) {
      this.skipped.push(name);
    }
  }

  /**
   * The first failure opens the retry budget, later failures spend it
   */
  registerFail(name: string): void {
    if (!this.failed.includes(name)) {
      this.failed.push(name);
      this.retries.set(name, this.maxRetries);
      return;
    }

    const remaining = this.retries.get(name);
    if (remaining !== undefined) {
      this.retries.set(name, remaining - 1);
    }
  }

  registerPass(name: string): void {
    const failedIndex = this.failed.indexOf(name);
    if (failedIndex >= 0) {
      this.failed.splice(failedIndex, 1);
    }
    this.retries.delete(name);

    if (!this.passed.includes(name)) {
      this.passed.push(name);
    }
  }

  remainingRetries(name: string): number | undefined {
    return this.retries.get(name);
  }

  /**
   * Tests of the list that still have retries left
   */
  filterRetries(testCases: TestCase[]): TestCase[] {
    return testCases.filter((testCase) => (this.retries.get(testCase.name) ?? 0) > 0);
  }

  hasFailures(): boolean {
    return this.failed.length > 0;
  }
}
