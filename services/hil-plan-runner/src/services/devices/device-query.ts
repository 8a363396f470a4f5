/**
 * Device field queries
 *
 * Looks up a named field across a device list, optionally keeping only
 * devices whose fields match `field=value` filters. Field names come from
 * a fixed table and are checked when the query is built.
 */

import type { Device } from '../../types/hil-types.js';
import { ValidationError } from '../../utils/errors.js';

export type FieldValue = string | number;

export type FieldLookup = { found: true; value: FieldValue } | { found: false };

const NOT_FOUND: FieldLookup = { found: false };

function present(value: FieldValue | null | undefined): FieldLookup {
  return value === null || value === undefined ? NOT_FOUND : { found: true, value };
}

const DEVICE_FIELDS = {
  name: (device: Device) => present(device.name),
  uid: (device: Device) => present(device.uid),
  address: (device: Device) => present(device.access?.address),
  hub: (device: Device) => present(device.switch?.hub),
  port: (device: Device) => present(device.switch?.port),
} satisfies Record<string, (device: Device) => FieldLookup>;

export type DeviceField = keyof typeof DEVICE_FIELDS;

export const DEVICE_FIELD_NAMES: DeviceField[] = Object.keys(DEVICE_FIELDS).filter(isDeviceField).sort();

export interface DeviceFilter {
  field: DeviceField;
  value: string;
}

function isDeviceField(name: string): name is DeviceField {
  return Object.prototype.hasOwnProperty.call(DEVICE_FIELDS, name);
}

export function parseDeviceField(name: string): DeviceField {
  if (!isDeviceField(name)) {
    throw new ValidationError(
      `Unknown device field "${name}" (choose from ${DEVICE_FIELD_NAMES.join(', ')})`,
      [],
      { operation: 'parseDeviceField' }
    );
  }
  return name;
}

/**
 * Parse `field=value`. The value may itself contain '='.
 */
export function parseDeviceFilter(expression: string): DeviceFilter {
  const separator = expression.indexOf('=');
  if (separator < 0) {
    throw new ValidationError("Filter must be in format 'attribute=value'", [expression], {
      operation: 'parseDeviceFilter',
    });
  }
  return {
    field: parseDeviceField(expression.slice(0, separator)),
    value: expression.slice(separator + 1),
  };
}

export function getDeviceField(device: Device, field: DeviceField): FieldLookup {
  return DEVICE_FIELDS[field](device);
}

function matchesFilter(device: Device, filter: DeviceFilter): boolean {
  const lookup = getDeviceField(device, filter.field);
  return lookup.found && String(lookup.value) === filter.value;
}

/**
 * Field values of the devices that pass every filter. Devices with the
 * field missing or empty contribute nothing.
 */
export function queryDevices(
  devices: Device[],
  field: DeviceField,
  filters: DeviceFilter[] = []
): FieldValue[] {
  const values: FieldValue[] = [];

  for (const device of devices) {
    if (!filters.every((filter) => matchesFilter(device, filter))) continue;

    const lookup = getDeviceField(device, field);
    if (lookup.found && lookup.value !== '') {
      values.push(lookup.value);
    }
  }

  return values;
}
