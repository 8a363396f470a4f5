/**
 * run-test-plan command line parsing
 */

import * as path from 'path';
import { parseArgs } from 'node:util';
import { UsageError } from '../utils/errors.js';

export const RUN_TEST_PLAN_USAGE = `usage: run-test-plan [options] [test ...]

MicroPython test suites runner.

positional arguments:
  test                   test names to run (all tests when omitted)

options:
  --test-plan <path>     test plan file
  --hil-devs <path>      HIL devices file
  -b, --board <name>     test board name (only with --hil-devs)
  -d, --dut-port <port>  device under test port
  -s, --stub-port <port> stub device port
  --max-retries <n>      retries for failed tests (default 0)
  --mpy-root-dir <path>  root of the MicroPython tree
  -h, --help             show this help`;

export interface RunTestPlanDefaults {
  testPlanFile: string;
  mpyRootDir: string;
  dutPort: string;
  stubPort: string;
}

export type DeviceSelection =
  | { mode: 'hil'; hilDevsFile: string; board: string }
  | { mode: 'ports'; dutPort: string; stubPort: string };

export interface RunTestPlanArgs {
  testNames: string[];
  testPlanFile: string;
  mpyRootDir: string;
  maxRetries: number;
  devices: DeviceSelection;
  help: boolean;
}

function parseMaxRetries(value: string | undefined): number {
  if (value === undefined) return 0;
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`--max-retries: invalid int value: '${value}'`, {
      operation: 'parseRunTestPlanArgs',
    });
  }
  return parseInt(value, 10);
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'test-plan': { type: 'string' },
        'hil-devs': { type: 'string' },
        board: { type: 'string', short: 'b' },
        'dut-port': { type: 'string', short: 'd' },
        'stub-port': { type: 'string', short: 's' },
        'max-retries': { type: 'string' },
        'mpy-root-dir': { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error), {
      operation: 'parseRunTestPlanArgs',
    });
  }
}

/**
 * Parse and cross-validate the arguments. A devices file selects devices by
 * board and excludes explicit ports; without it the ports are used.
 */
export function parseRunTestPlanArgs(argv: string[], defaults: RunTestPlanDefaults): RunTestPlanArgs {
  const { values, positionals } = parseRawArgs(argv);
  const hilDevs = values['hil-devs'];
  const board = values.board;
  const dutPort = values['dut-port'];
  const stubPort = values['stub-port'];

  let devices: DeviceSelection;
  if (hilDevs !== undefined) {
    if (board === undefined) {
      throw new UsageError('--board is required when --hil-devs is provided', {
        operation: 'parseRunTestPlanArgs',
      });
    }
    if (dutPort !== undefined || stubPort !== undefined) {
      throw new UsageError(
        '--dut-port and --stub-port are not supported when --hil-devs is provided',
        { operation: 'parseRunTestPlanArgs' }
      );
    }
    devices = { mode: 'hil', hilDevsFile: path.resolve(hilDevs), board };
  } else {
    if (board !== undefined) {
      throw new UsageError('--hil-devs is required when --board is provided', {
        operation: 'parseRunTestPlanArgs',
      });
    }
    devices = {
      mode: 'ports',
      dutPort: dutPort ?? defaults.dutPort,
      stubPort: stubPort ?? defaults.stubPort,
    };
  }

  return {
    testNames: positionals,
    testPlanFile: path.resolve(values['test-plan'] ?? defaults.testPlanFile),
    mpyRootDir: path.resolve(values['mpy-root-dir'] ?? defaults.mpyRootDir),
    maxRetries: parseMaxRetries(values['max-retries']),
    devices,
    help: values.help ?? false,
  };
}
