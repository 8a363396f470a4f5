import { describe, it, expect } from 'vitest';
import type { Device } from '../../types/hil-types.js';
import {
  DEVICE_FIELD_NAMES,
  getDeviceField,
  parseDeviceField,
  parseDeviceFilter,
  queryDevices,
} from './device-query.js';
import { ValidationError } from '../../utils/errors.js';

function device(name: string, uid: string, address: string | null, port: number | null = null): Device {
  return {
    name,
    uid,
    features: new Set<string>(),
    access: address === null ? null : { address },
    switch: port === null ? null : { hub: '1-1', port },
  };
}

const DEVICES = [
  device('board-a', 'AAAA0001', '/dev/ttyACM0', 2),
  device('board-a', 'AAAA0002', null),
  device('board-b', 'BBBB0001', '/dev/ttyACM1', 3),
];

describe('parseDeviceField', () => {
  it('accepts the known field names', () => {
    expect(DEVICE_FIELD_NAMES).toEqual(['address', 'hub', 'name', 'port', 'uid']);
    expect(parseDeviceField('address')).toBe('address');
  });

  it('rejects other names', () => {
    expect(() => parseDeviceField('serial')).toThrow(
      'Unknown device field "serial" (choose from address, hub, name, port, uid)'
    );
  });
});

describe('parseDeviceFilter', () => {
  it('splits at the first equals sign', () => {
    expect(parseDeviceFilter('name=a=b')).toEqual({ field: 'name', value: 'a=b' });
  });

  it('requires an equals sign', () => {
    expect(() => parseDeviceFilter('name')).toThrow(ValidationError);
  });
});

describe('getDeviceField', () => {
  it('reports missing bindings as not found', () => {
    expect(getDeviceField(DEVICES[1], 'address')).toEqual({ found: false });
    expect(getDeviceField(DEVICES[0], 'port')).toEqual({ found: true, value: 2 });
  });
});

describe('queryDevices', () => {
  it('returns the field of every device with a value', () => {
    expect(queryDevices(DEVICES, 'uid')).toEqual(['AAAA0001', 'AAAA0002', 'BBBB0001']);
    expect(queryDevices(DEVICES, 'address')).toEqual(['/dev/ttyACM0', '/dev/ttyACM1']);
  });

  it('keeps devices matching every filter', () => {
    expect(queryDevices(DEVICES, 'address', [parseDeviceFilter('name=board-a')])).toEqual(['/dev/ttyACM0']);
    expect(
      queryDevices(DEVICES, 'uid', [parseDeviceFilter('name=board-b'), parseDeviceFilter('port=3')])
    ).toEqual(['BBBB0001']);
    expect(queryDevices(DEVICES, 'uid', [parseDeviceFilter('port=7')])).toEqual([]);
  });
});
