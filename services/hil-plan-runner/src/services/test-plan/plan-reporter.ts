/**
 * Plan Reporter
 *
 * Progress and summary output of a plan run.
 */

import type { PlanRunSummary } from '../../types/hil-types.js';
import { log, type Logger } from '../../utils/logger.js';

export interface PlanInfo {
  testPlanFile: string;
  hilDevsFile?: string;
  board?: string;
}

export interface PlanReporter {
  planStarted(info: PlanInfo): void;
  testStarted(name: string, dutPort: string, stubPort: string | null): void;
  testPassed(name: string): void;
  testFailed(name: string, exitCode: number): void;
  testSkipped(name: string): void;
  retriesScheduled(names: string[]): void;
  planFinished(summary: PlanRunSummary): void;
}

/**
 * One-line verdict followed by the per-outcome name lists
 */
export function formatSummary(summary: Pick<PlanRunSummary, 'passed' | 'failed' | 'skipped'>): string[] {
  const passCount = summary.passed.length;
  const failCount = summary.failed.length;
  const skipCount = summary.skipped.length;
  const total = passCount + failCount + skipCount;

  if (failCount === 0 && skipCount === 0) {
    return [`all ${passCount} tests passed`];
  }

  const lines: string[] = [];
  if (passCount > 0) {
    lines.push(`only ${passCount} out of ${total} test passed`);
  } else if (skipCount === 0) {
    lines.push(`all ${failCount} tests failed`);
  } else {
    lines.push('');
  }

  if (passCount > 0) lines.push(` - passed  : ${summary.passed.join(' ')}`);
  if (skipCount > 0) lines.push(` - skipped : ${summary.skipped.join(' ')}`);
  if (failCount > 0) lines.push(` - failed  : ${summary.failed.join(' ')}`);

  return lines;
}

export class LoggerPlanReporter implements PlanReporter {
  constructor(private readonly logger: Logger = log.child({ service: 'test-plan' })) {}

  planStarted(info: PlanInfo): void {
    this.logger.info('Running test plan', {
      testPlanFile: info.testPlanFile,
      hilDevsFile: info.hilDevsFile,
      board: info.board,
    });
  }

  testStarted(name: string, dutPort: string, stubPort: string | null): void {
    this.logger.info(`> running test : ${name}`, {
      testName: name,
      dutPort,
      stubPort: stubPort ?? undefined,
    });
  }

  testPassed(name: string): void {
    this.logger.info(`> passed test  : ${name}`, { testName: name });
  }

  testFailed(name: string, exitCode: number): void {
    this.logger.warn(`> failed test  : ${name}`, { testName: name, exitCode });
  }

  testSkipped(name: string): void {
    this.logger.warn(`> skipped test : ${name}`, { testName: name, reason: 'devices not available' });
  }

  retriesScheduled(names: string[]): void {
    this.logger.info(`> retry tests  : ${names.join(' ')}`);
  }

  planFinished(summary: PlanRunSummary): void {
    const [verdict = '', ...details] = formatSummary(summary);
    const lines = [`> test summary : ${verdict}`.trimEnd(), ...details];

    for (const line of lines) {
      if (summary.exitCode === 0) {
        this.logger.info(line, { passes: summary.passes });
      } else {
        this.logger.warn(line, { passes: summary.passes });
      }
    }
  }
}
