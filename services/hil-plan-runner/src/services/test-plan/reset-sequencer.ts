/**
 * Reset Sequencer
 *
 * Power cycles switchable devices before a test and waits for them to come
 * back. The wait is bounded and never fails the test: once the polls run
 * out the test proceeds anyway.
 */

import type { Device, PortStatus, SwitchRef } from '../../types/hil-types.js';
import type { SwitchControl } from '../power/switch-control.js';
import { config } from '../../config.js';
import { log, type Logger } from '../../utils/logger.js';
import { sleep, type Sleep } from '../../utils/sleep.js';

export interface ResetOptions {
  /** Waits between status reads before giving up */
  pollAttempts: number;
  pollIntervalMs: number;
  /** Boot time granted after the port is back, converged or not */
  settleDelayMs: number;
}

export interface ResetReport {
  device: string;
  status: PortStatus;
  polls: number;
}

export class ResetSequencer {
  private readonly options: ResetOptions;

  constructor(
    private readonly switches: SwitchControl,
    options: Partial<ResetOptions> = {},
    private readonly wait: Sleep = sleep,
    private readonly logger: Logger = log.child({ service: 'reset-sequencer' })
  ) {
    this.options = { ...config.reset, ...options };
  }

  /**
   * Reset each device that has a bound switch, in the given order
   */
  async resetDevices(devices: Array<Device | null>): Promise<ResetReport[]> {
    const reports: ResetReport[] = [];
    for (const device of devices) {
      if (device?.switch) {
        reports.push(await this.resetDevice(device, device.switch));
      }
    }
    return reports;
  }

  private async resetDevice(device: Device, ref: SwitchRef): Promise<ResetReport> {
    this.logger.info('Switchable device performing power cycle', {
      device: device.name,
      hub: ref.hub,
      port: ref.port,
    });
    await this.switches.reset(ref);

    let status: PortStatus = 'unknown';
    let polls = 0;

    if (ref.port !== null) {
      status = await this.switches.status(ref);
      while (status !== 'on_connected' && polls < this.options.pollAttempts) {
        await this.wait(this.options.pollIntervalMs);
        polls++;
        status = await this.switches.status(ref);
      }

      if (status !== 'on_connected') {
        this.logger.warn('Device did not report connected after power cycle', {
          device: device.name,
          hub: ref.hub,
          port: ref.port,
          status,
        });
      }
    }

    await this.wait(this.options.settleDelayMs);

    return { device: device.name, status, polls };
  }
}
