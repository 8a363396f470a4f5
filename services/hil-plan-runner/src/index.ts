/**
 * HIL Plan Runner
 *
 * Hardware-in-the-loop test plan execution for MicroPython boards.
 */

export * from './types/hil-types.js';
export { config, getConfig, type Config } from './config.js';
export { log, type Logger, type LogMetadata } from './utils/logger.js';
export * from './utils/errors.js';
export { sleep, type Sleep } from './utils/sleep.js';

export {
  ProcessCommandRunner,
  type CommandRunner,
  type CommandOptions,
  type CommandResult,
} from './services/process/command-runner.js';

export {
  classifyPortLine,
  parseHubStatusOutput,
  findPortStatus,
  listHubPorts,
  findHubPortByDescription,
} from './services/power/hub-status-parser.js';
export { PowerController, type PowerControllerOptions } from './services/power/power-controller.js';
export { SwitchControl } from './services/power/switch-control.js';

export {
  systemSerialPorts,
  type SerialPortInfo,
  type SerialPortLister,
} from './services/devices/serial-ports.js';
export {
  DeviceRegistry,
  parseRegistryDocument,
  bindSerialAccess,
} from './services/devices/device-registry.js';
export * from './services/devices/device-query.js';

export * from './services/test-plan/test-catalog.js';
export * from './services/test-plan/device-resolver.js';
export * from './services/test-plan/reset-sequencer.js';
export * from './services/test-plan/test-invoker.js';
export { ResultTracker } from './services/test-plan/result-tracker.js';
export * from './services/test-plan/plan-reporter.js';
export * from './services/test-plan/execution-engine.js';
