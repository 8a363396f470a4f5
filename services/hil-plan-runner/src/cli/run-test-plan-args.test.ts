import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { parseRunTestPlanArgs } from './run-test-plan-args.js';
import { UsageError } from '../utils/errors.js';

function thrownBy(fn: () => unknown): UsageError | null {
  try {
    fn();
  } catch (error) {
    return error instanceof UsageError ? error : null;
  }
  return null;
}

const DEFAULTS = {
  testPlanFile: '/opt/hil/test-plan.yml',
  mpyRootDir: '/opt/micropython',
  dutPort: '/dev/ttyACM0',
  stubPort: '/dev/ttyACM1',
};

describe('parseRunTestPlanArgs', () => {
  it('falls back to the default ports and files', () => {
    expect(parseRunTestPlanArgs([], DEFAULTS)).toEqual({
      testNames: [],
      testPlanFile: '/opt/hil/test-plan.yml',
      mpyRootDir: '/opt/micropython',
      maxRetries: 0,
      devices: { mode: 'ports', dutPort: '/dev/ttyACM0', stubPort: '/dev/ttyACM1' },
      help: false,
    });
  });

  it('takes test names, ports and retries', () => {
    const args = parseRunTestPlanArgs(['basics', 'uart', '-d', '/dev/ttyUSB0', '--max-retries', '2'], DEFAULTS);

    expect(args.testNames).toEqual(['basics', 'uart']);
    expect(args.devices).toEqual({ mode: 'ports', dutPort: '/dev/ttyUSB0', stubPort: '/dev/ttyACM1' });
    expect(args.maxRetries).toBe(2);
  });

  it('selects devices from a devices file and board', () => {
    const args = parseRunTestPlanArgs(['--hil-devs', 'devs.yml', '-b', 'board-a', '--test-plan', 'plan.yml'], DEFAULTS);

    expect(args.devices).toEqual({ mode: 'hil', hilDevsFile: path.resolve('devs.yml'), board: 'board-a' });
    expect(args.testPlanFile).toBe(path.resolve('plan.yml'));
  });

  it('requires a board with a devices file', () => {
    expect(() => parseRunTestPlanArgs(['--hil-devs', 'devs.yml'], DEFAULTS)).toThrow(
      '--board is required when --hil-devs is provided'
    );
  });

  it('rejects ports with a devices file', () => {
    expect(() => parseRunTestPlanArgs(['--hil-devs', 'devs.yml', '-b', 'x', '-s', '/dev/ttyACM3'], DEFAULTS)).toThrow(
      '--dut-port and --stub-port are not supported when --hil-devs is provided'
    );
  });

  it('rejects a board without a devices file', () => {
    expect(() => parseRunTestPlanArgs(['-b', 'board-a'], DEFAULTS)).toThrow(
      '--hil-devs is required when --board is provided'
    );
  });

  it('reports bad retries and unknown options as usage errors', () => {
    expect(() => parseRunTestPlanArgs(['--max-retries', 'two'], DEFAULTS)).toThrow(UsageError);
    expect(() => parseRunTestPlanArgs(['--verbose'], DEFAULTS)).toThrow(UsageError);
    expect(thrownBy(() => parseRunTestPlanArgs(['--verbose'], DEFAULTS))?.exitCode).toBe(2);
  });
});
