import { SerialPort } from 'serialport';

export interface SerialPortInfo {
  path: string;
  serialNumber?: string;
}

export interface SerialPortLister {
  list(): Promise<SerialPortInfo[]>;
}

/**
 * Serial interfaces currently enumerated by the operating system
 */
export const systemSerialPorts: SerialPortLister = {
  async list(): Promise<SerialPortInfo[]> {
    const ports = await SerialPort.list();
    return ports.map((p) => ({
      path: p.path,
      serialNumber: p.serialNumber,
    }));
  },
};
