import { describe, it, expect } from 'vitest';
import { HilCatalogResolver, StaticPortResolver } from './device-resolver.js';
import { DeviceRegistry } from '../devices/device-registry.js';
import { PowerController } from '../power/power-controller.js';
import { SwitchControl } from '../power/switch-control.js';
import { FakeCommandRunner, fakeSerialPorts, testCase } from '../../testing/fakes.js';
import type { DeviceRecord } from '../../types/hil-types.js';
import type { SerialPortInfo } from '../devices/serial-ports.js';

const RECORDS: DeviceRecord[] = [
  { name: 'board-a', uid: 'A-OFFLINE', features: ['0.4.0'] },
  { name: 'board-a', uid: 'A-1', features: ['0.4.0'] },
  { name: 'board-a', uid: 'A-2', features: [] },
  { name: 'board-b', uid: 'B-1', features: [] },
];

function resolver(ports: SerialPortInfo[], board = 'board-a'): HilCatalogResolver {
  const registry = new DeviceRegistry(
    fakeSerialPorts(ports),
    new SwitchControl(new PowerController(new FakeCommandRunner()))
  );
  return new HilCatalogResolver(registry, RECORDS, board);
}

const PORTS: SerialPortInfo[] = [
  { path: '/dev/ttyACM0', serialNumber: 'A-1' },
  { path: '/dev/ttyACM1', serialNumber: 'A-2' },
  { path: '/dev/ttyACM2', serialNumber: 'B-1' },
];

describe('HilCatalogResolver', () => {
  it('picks the first connected device of the board', async () => {
    const { dut, stub } = await resolver(PORTS).resolve(
      testCase({ name: 't', dutRequirements: [{ board: 'board-a' }] })
    );

    expect(dut?.uid).toBe('A-1');
    expect(stub).toBeNull();
  });

  it('honours the required version', async () => {
    const { dut } = await resolver(PORTS.slice(1)).resolve(
      testCase({ name: 't', dutRequirements: [{ board: 'board-a', version: '0.4.0' }] })
    );

    expect(dut).toBeNull();
  });

  it('ignores requirements for other boards', async () => {
    const { dut } = await resolver(PORTS, 'board-c').resolve(
      testCase({ name: 't', dutRequirements: [{ board: 'board-a' }] })
    );

    expect(dut).toBeNull();
  });

  it('picks a stub on another port for a multi test', async () => {
    const { dut, stub } = await resolver(PORTS).resolve(
      testCase({ name: 't', type: 'multi', dutRequirements: [{ board: 'board-a' }] })
    );

    expect(dut?.access?.address).toBe('/dev/ttyACM0');
    expect(stub?.access?.address).toBe('/dev/ttyACM1');
  });

  it('reads the stub requirements of a multi_stub test', async () => {
    const { stub } = await resolver(PORTS).resolve(
      testCase({
        name: 't',
        type: 'multi_stub',
        stubScript: 'tx.py',
        dutRequirements: [{ board: 'board-a' }],
        stubRequirements: [{ board: 'board-b' }],
      })
    );

    expect(stub).toBeNull();
  });
});

describe('StaticPortResolver', () => {
  it('returns the fixed ports for every test', async () => {
    const { dut, stub } = await new StaticPortResolver('/dev/ttyUSB0', '/dev/ttyUSB1').resolve(
      testCase({ name: 't' })
    );

    expect(dut?.access).toEqual({ address: '/dev/ttyUSB0' });
    expect(stub?.access).toEqual({ address: '/dev/ttyUSB1' });
    expect(dut?.switch).toBeNull();
  });
});
