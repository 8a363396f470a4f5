/**
 * Device Registry
 *
 * Loads the bench device list and binds each declared device to the serial
 * interface and power switch it is currently reachable through. Bindings are
 * made against live hardware on every load; nothing is cached.
 */

import { z } from 'zod';
import * as yaml from 'js-yaml';
import type { Device, DeviceRecord, SerialAccess } from '../../types/hil-types.js';
import type { SerialPortInfo, SerialPortLister } from './serial-ports.js';
import type { SwitchControl } from '../power/switch-control.js';
import { readYamlDocument } from '../../utils/yaml-document.js';
import { ValidationError } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';

const logger = log.child({ service: 'device-registry' });

// Read under the failsafe schema: every scalar is a string, an empty one is null
const TextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const DeviceRecordSchema = z.object({
  name: TextSchema,
  uid: TextSchema,
  features: z.array(z.string()).nullish().transform((value) => value ?? []),
});

const RegistryDocumentSchema = z.array(DeviceRecordSchema);

export function parseRegistryDocument(document: unknown, source = 'registry'): DeviceRecord[] {
  const parsed = RegistryDocumentSchema.safeParse(document ?? []);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ValidationError(`Invalid device registry "${source}"`, issues, {
      operation: 'parseRegistryDocument',
      path: source,
    });
  }
  return parsed.data;
}

export class DeviceRegistry {
  constructor(
    private readonly serialPorts: SerialPortLister,
    private readonly switches: SwitchControl
  ) {}

  async loadFile(filePath: string): Promise<Device[]> {
    return this.load(await this.loadDocument(filePath));
  }

  async loadDocument(filePath: string): Promise<DeviceRecord[]> {
    const document = await readYamlDocument(filePath, 'Device registry', yaml.FAILSAFE_SCHEMA);
    return parseRegistryDocument(document, filePath);
  }

  /**
   * One device per record, in document order, with the uid kept as given
   */
  async load(records: DeviceRecord[]): Promise<Device[]> {
    const ports = await this.serialPorts.list();
    const devices: Device[] = [];

    for (const record of records) {
      const device: Device = {
        name: record.name,
        uid: record.uid,
        features: new Set(record.features),
        access: bindSerialAccess(record.uid, ports),
        switch: await this.switches.bindByUid(record.uid),
      };

      logger.debug('Device bound', {
        name: device.name,
        uid: device.uid,
        address: device.access?.address ?? null,
        hub: device.switch?.hub,
        port: device.switch?.port ?? null,
      });

      devices.push(device);
    }

    return devices;
  }

  /**
   * Serial interfaces seen as devices: the serial number stands in for
   * both name and uid. Interfaces without a serial number are skipped.
   */
  async scanSerial(): Promise<Device[]> {
    const ports = await this.serialPorts.list();
    return ports
      .filter((p): p is SerialPortInfo & { serialNumber: string } => Boolean(p.serialNumber))
      .map((p) => ({
        name: p.serialNumber,
        uid: p.serialNumber,
        features: new Set<string>(),
        access: { address: p.path },
        switch: null,
      }));
  }
}

export function bindSerialAccess(uid: string, ports: SerialPortInfo[]): SerialAccess | null {
  if (!uid) return null;
  const port = ports.find((p) => p.serialNumber === uid);
  return port ? { address: port.path } : null;
}
