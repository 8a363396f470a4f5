/**
 * Device resolution strategies
 *
 * A resolver turns the device requirements of a test case into the devices
 * the test runs on. The strategy is chosen once per run.
 */

import type {
  Device,
  DeviceRecord,
  DeviceRole,
  ResolvedDevices,
  TestCase,
} from '../../types/hil-types.js';
import type { DeviceRegistry } from '../devices/device-registry.js';
import { requiresMultipleDevices, supportedDevices } from './test-catalog.js';

export interface DeviceResolver {
  resolve(testCase: TestCase): Promise<ResolvedDevices>;
}

/**
 * Picks devices from the bench registry for one board. The registry is
 * bound against live hardware on every call.
 */
export class HilCatalogResolver implements DeviceResolver {
  constructor(
    private readonly registry: DeviceRegistry,
    private readonly records: DeviceRecord[],
    private readonly board: string
  ) {}

  async resolve(testCase: TestCase): Promise<ResolvedDevices> {
    const devices = await this.registry.load(this.records);

    const dut = this.candidates(devices, testCase, 'dut').find((device) => device.access) ?? null;
    if (!dut?.access) {
      return { dut, stub: null };
    }

    if (!requiresMultipleDevices(testCase)) {
      return { dut, stub: null };
    }

    const dutAddress = dut.access.address;
    const stub =
      this.candidates(devices, testCase, 'stub').find(
        (device) => device.access !== null && device.access.address !== dutAddress
      ) ?? null;

    return { dut, stub };
  }

  /**
   * Registry devices satisfying the role's requirements for this board, in
   * requirement order
   */
  private candidates(devices: Device[], testCase: TestCase, role: DeviceRole): Device[] {
    return supportedDevices(testCase, role, this.board).flatMap((requirement) =>
      devices.filter(
        (device) =>
          device.name === requirement.board &&
          (requirement.version === undefined || device.features.has(requirement.version))
      )
    );
  }
}

/**
 * Runs every test on fixed serial ports, without power switches
 */
export class StaticPortResolver implements DeviceResolver {
  private readonly devices: ResolvedDevices;

  constructor(dutPort: string, stubPort: string | null) {
    this.devices = {
      dut: portDevice('dut', dutPort),
      stub: stubPort ? portDevice('stub', stubPort) : null,
    };
  }

  async resolve(_testCase: TestCase): Promise<ResolvedDevices> {
    return this.devices;
  }
}

function portDevice(name: string, address: string): Device {
  return {
    name,
    uid: '',
    features: new Set<string>(),
    access: { address },
    switch: null,
  };
}
