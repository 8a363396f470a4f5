/**
 * devs-query command line parsing
 */

import * as path from 'path';
import { parseArgs } from 'node:util';
import { UsageError, isHilRunnerError } from '../utils/errors.js';
import {
  DEVICE_FIELD_NAMES,
  parseDeviceField,
  parseDeviceFilter,
  type DeviceField,
  type DeviceFilter,
} from '../services/devices/device-query.js';

export const DEVS_QUERY_USAGE = `usage: devs-query [options] <field>

Device query utility. Prints the field of every matching device.

positional arguments:
  field                    one of: ${DEVICE_FIELD_NAMES.join(', ')}

options:
  -f, --filter <k=v ...>   keep devices whose field k equals v (repeatable)
  -y, --devs-yml <path>    device YAML file (connected serial interfaces when omitted)
  --not-connected          include registry devices that are not connected
  -h, --help               show this help`;

export interface DevsQueryArgs {
  field: DeviceField;
  filters: DeviceFilter[];
  devsYml: string | null;
  includeNotConnected: boolean;
  help: boolean;
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        filter: { type: 'string', short: 'f', multiple: true },
        'devs-yml': { type: 'string', short: 'y' },
        'not-connected': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error), {
      operation: 'parseDevsQueryArgs',
    });
  }
}

/**
 * Field and filter names are checked here, before any device is loaded.
 * One --filter value may hold several space separated expressions.
 */
export function parseDevsQueryArgs(argv: string[]): DevsQueryArgs {
  const { values, positionals } = parseRawArgs(argv);
  const help = values.help ?? false;

  if (help) {
    return { field: 'uid', filters: [], devsYml: null, includeNotConnected: false, help };
  }

  if (positionals.length !== 1) {
    throw new UsageError('exactly one field to query is required', {
      operation: 'parseDevsQueryArgs',
    });
  }

  try {
    const field = parseDeviceField(positionals[0]);
    const filters = (values.filter ?? [])
      .flatMap((value) => value.split(/\s+/))
      .filter((expression) => expression.length > 0)
      .map(parseDeviceFilter);

    const devsYml = values['devs-yml'];
    return {
      field,
      filters,
      devsYml: devsYml === undefined ? null : path.resolve(devsYml),
      includeNotConnected: values['not-connected'] ?? false,
      help,
    };
  } catch (error) {
    if (isHilRunnerError(error)) {
      throw new UsageError(error.message, { operation: 'parseDevsQueryArgs' });
    }
    throw error;
  }
}
