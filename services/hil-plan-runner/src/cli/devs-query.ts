#!/usr/bin/env node
/**
 * devs-query
 *
 * Prints a field of the bench devices, e.g. the serial port of every
 * connected board of a kind:
 *
 *   devs-query address -f name=CY8CPROTO-062-4343W -y hil-devs.yml
 */

import 'dotenv/config';
import { log } from '../utils/logger.js';
import { handleError } from '../utils/errors.js';
import type { Device } from '../types/hil-types.js';
import { ProcessCommandRunner } from '../services/process/command-runner.js';
import { PowerController } from '../services/power/power-controller.js';
import { SwitchControl } from '../services/power/switch-control.js';
import { DeviceRegistry } from '../services/devices/device-registry.js';
import { systemSerialPorts } from '../services/devices/serial-ports.js';
import { queryDevices } from '../services/devices/device-query.js';
import { DEVS_QUERY_USAGE, parseDevsQueryArgs, type DevsQueryArgs } from './devs-query-args.js';

async function loadDevices(args: DevsQueryArgs): Promise<Device[]> {
  const registry = new DeviceRegistry(
    systemSerialPorts,
    new SwitchControl(new PowerController(new ProcessCommandRunner()))
  );

  if (args.devsYml === null) {
    return registry.scanSerial();
  }

  const devices = await registry.loadFile(args.devsYml);
  return args.includeNotConnected
    ? devices
    : devices.filter((device) => device.access !== null || device.switch !== null);
}

async function main(argv: string[]): Promise<number> {
  const args = parseDevsQueryArgs(argv);
  if (args.help) {
    console.log(DEVS_QUERY_USAGE);
    return 0;
  }

  const values = queryDevices(await loadDevices(args), args.field, args.filters);
  console.log(values.join(' '));
  return 0;
}

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const failure = handleError(error);
    if (failure.exitCode === 2) {
      console.error(DEVS_QUERY_USAGE);
      console.error(`devs-query: error: ${failure.message}`);
    } else {
      log.error(failure.message, failure, { issues: failure.context.issues });
    }
    process.exitCode = failure.exitCode;
  });
