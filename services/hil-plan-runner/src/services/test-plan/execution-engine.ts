/**
 * Execution Engine
 *
 * Runs the selected test cases pass after pass. Each test is gated on device
 * availability, its switchable devices are power cycled, and the test tool
 * is invoked. Failed tests are run again while their retry budget lasts.
 */

import type { PlanRunSummary, TestCase } from '../../types/hil-types.js';
import type { DeviceResolver } from './device-resolver.js';
import type { ResetSequencer } from './reset-sequencer.js';
import type { TestInvoker } from './test-invoker.js';
import type { PlanReporter } from './plan-reporter.js';
import { ResultTracker } from './result-tracker.js';
import { requiresMultipleDevices } from './test-catalog.js';

export interface TestPlanRunnerDeps {
  resolver: DeviceResolver;
  resetSequencer: ResetSequencer;
  invoker: TestInvoker;
  reporter: PlanReporter;
}

export class TestPlanRunner {
  constructor(private readonly deps: TestPlanRunnerDeps) {}

  async run(testCases: TestCase[], maxRetries = 0): Promise<PlanRunSummary> {
    const results = new ResultTracker(maxRetries);
    let pending = testCases;
    let passes = 0;

    while (pending.length > 0) {
      passes++;
      for (const testCase of pending) {
        await this.runTest(testCase, results);
      }

      pending = results.filterRetries(pending);
      if (pending.length > 0) {
        this.deps.reporter.retriesScheduled(pending.map((testCase) => testCase.name));
      }
    }

    const summary: PlanRunSummary = {
      passed: [...results.passed],
      failed: [...results.failed],
      skipped: [...results.skipped],
      passes,
      exitCode: results.hasFailures() ? 1 : 0,
    };
    this.deps.reporter.planFinished(summary);

    return summary;
  }

  private async runTest(testCase: TestCase, results: ResultTracker): Promise<void> {
    const { resolver, resetSequencer, invoker, reporter } = this.deps;
    const { dut, stub } = await resolver.resolve(testCase);

    const dutPort = dut?.access?.address ?? null;
    const stubPort = stub?.access?.address ?? null;

    if (dutPort === null || (requiresMultipleDevices(testCase) && stubPort === null)) {
      results.registerSkip(testCase.name);
      reporter.testSkipped(testCase.name);
      return;
    }

    await resetSequencer.resetDevices([dut, stub]);

    reporter.testStarted(testCase.name, dutPort, stubPort);
    const exitCode = await invoker.invoke(testCase, { dut: dutPort, stub: stubPort });

    if (exitCode === 0) {
      results.registerPass(testCase.name);
      reporter.testPassed(testCase.name);
    } else {
      results.registerFail(testCase.name);
      reporter.testFailed(testCase.name, exitCode);
    }
  }
}
