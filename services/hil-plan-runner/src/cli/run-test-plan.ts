#!/usr/bin/env node
/**
 * run-test-plan
 *
 * Runs a MicroPython test plan either on boards picked from a HIL devices
 * file or on fixed serial ports.
 */

import 'dotenv/config';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { config } from '../config.js';
import { log } from '../utils/logger.js';
import { handleError } from '../utils/errors.js';
import { ProcessCommandRunner } from '../services/process/command-runner.js';
import { PowerController } from '../services/power/power-controller.js';
import { SwitchControl } from '../services/power/switch-control.js';
import { DeviceRegistry } from '../services/devices/device-registry.js';
import { systemSerialPorts } from '../services/devices/serial-ports.js';
import { loadTestPlan, selectTestCases } from '../services/test-plan/test-catalog.js';
import {
  HilCatalogResolver,
  StaticPortResolver,
  type DeviceResolver,
} from '../services/test-plan/device-resolver.js';
import { ResetSequencer } from '../services/test-plan/reset-sequencer.js';
import { TestInvoker } from '../services/test-plan/test-invoker.js';
import { LoggerPlanReporter } from '../services/test-plan/plan-reporter.js';
import { TestPlanRunner } from '../services/test-plan/execution-engine.js';
import {
  RUN_TEST_PLAN_USAGE,
  parseRunTestPlanArgs,
  type RunTestPlanArgs,
} from './run-test-plan-args.js';

const cliDir = path.dirname(fileURLToPath(import.meta.url));

async function main(argv: string[]): Promise<number> {
  const args = parseRunTestPlanArgs(argv, {
    testPlanFile: path.join(cliDir, 'test-plan.yml'),
    mpyRootDir: config.mpyRootDir ?? path.resolve(cliDir, '..', '..'),
    dutPort: config.ports.dut,
    stubPort: config.ports.stub,
  });

  if (args.help) {
    console.log(RUN_TEST_PLAN_USAGE);
    return 0;
  }

  const runner = new ProcessCommandRunner();
  const switches = new SwitchControl(new PowerController(runner));
  const reporter = new LoggerPlanReporter();

  const testCases = selectTestCases(await loadTestPlan(args.testPlanFile), args.testNames);
  const resolver = await createResolver(args, switches);

  reporter.planStarted({
    testPlanFile: path.relative(process.cwd(), args.testPlanFile),
    hilDevsFile:
      args.devices.mode === 'hil' ? path.relative(process.cwd(), args.devices.hilDevsFile) : undefined,
    board: args.devices.mode === 'hil' ? args.devices.board : undefined,
  });

  const planRunner = new TestPlanRunner({
    resolver,
    resetSequencer: new ResetSequencer(switches),
    invoker: new TestInvoker(runner, { mpyRootDir: args.mpyRootDir }),
    reporter,
  });

  const summary = await planRunner.run(testCases, args.maxRetries);
  return summary.exitCode;
}

async function createResolver(args: RunTestPlanArgs, switches: SwitchControl): Promise<DeviceResolver> {
  if (args.devices.mode === 'ports') {
    return new StaticPortResolver(args.devices.dutPort, args.devices.stubPort);
  }

  const registry = new DeviceRegistry(systemSerialPorts, switches);
  const records = await registry.loadDocument(args.devices.hilDevsFile);
  return new HilCatalogResolver(registry, records, args.devices.board);
}

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const failure = handleError(error);
    if (failure.exitCode === 2) {
      console.error(RUN_TEST_PLAN_USAGE);
      console.error(`run-test-plan: error: ${failure.message}`);
    } else {
      log.error(failure.message, failure, { issues: failure.context.issues });
    }
    process.exitCode = failure.exitCode;
  });
