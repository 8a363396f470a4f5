/**
 * Switch Control
 *
 * Device-level power switch operations on top of the power controller.
 */

import type { PortStatus, SwitchRef } from '../../types/hil-types.js';
import type { PowerController } from './power-controller.js';

export class SwitchControl {
  constructor(private readonly controller: PowerController) {}

  async on(ref: SwitchRef): Promise<void> {
    await this.controller.runAction('on', ref.hub, ref.port);
  }

  async off(ref: SwitchRef): Promise<void> {
    await this.controller.runAction('off', ref.hub, ref.port);
  }

  async reset(ref: SwitchRef): Promise<void> {
    await this.controller.runAction('cycle', ref.hub, ref.port);
  }

  /**
   * Port status; a hub-wide ref has no single status
   */
  async status(ref: SwitchRef): Promise<PortStatus> {
    if (ref.port === null) return 'unknown';
    return this.controller.getStatus(ref.hub, ref.port);
  }

  /**
   * Power cycle every hub seen in the topology, once per hub.
   * Daisy-chained or USB 3.0 duplicated hubs may still be cycled twice.
   */
  async resetAll(): Promise<string[]> {
    const hubs = [...new Set((await this.controller.scanHubsPorts()).map(({ hub }) => hub))];
    for (const hub of hubs) {
      await this.controller.runAction('cycle', hub, null);
    }
    return hubs;
  }

  async scan(): Promise<SwitchRef[]> {
    const hubPorts = await this.controller.scanHubsPorts();
    return hubPorts.map(({ hub, port }) => ({ hub, port }));
  }

  /**
   * Switch feeding the device whose description contains the uid
   */
  async bindByUid(uid: string): Promise<SwitchRef | null> {
    if (!uid) return null;
    const match = await this.controller.getHubPortByDesc(uid);
    return match ? { hub: match.hub, port: match.port } : null;
  }
}
