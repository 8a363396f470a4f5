import { describe, it, expect } from 'vitest';
import {
  classifyPortLine,
  findHubPortByDescription,
  findPortStatus,
  listHubPorts,
  parseHubStatusOutput,
} from './hub-status-parser.js';

const STATUS_OUTPUT = [
  'Current status for hub 2-1 [0bda:0411 Generic USB3.2 Hub, USB 3.20, 4 ports, ppps]',
  '  Port 3: 0263 power 5gbps U3 enable connect [0bda:8153 Realtek USB 10/100/1000 LAN]',
  'Current status for hub 1-1.3 [0bda:5411 Generic USB2.1 Hub, USB 2.10, 4 ports, ppps]',
  '  Port 1: 0100 off',
  '  Port 3: 0103 power enable connect [04b4:f155 Cypress Semiconductor KitProg3 CMSIS-DAP 0F1104F3012D2400]',
].join('\n');

const SEARCH_OUTPUT = [
  'Current status for hub 2-1 [0bda:0411 Generic USB3.2 Hub, USB 3.20, 4 ports, ppps]',
  '  Port 2: 02a0 power 5gbps Rx.Detect',
  'Current status for hub 1-1 [0bda:5411 Generic USB2.1 Hub, USB 2.10, 4 ports, ppps]',
  '  Port 2: 0103 power enable connect [04b4:f155 Cypress Semiconductor KitProg3 CMSIS-DAP 1106035A012D2400]',
].join('\n');

describe('classifyPortLine', () => {
  it('classifies the port states', () => {
    expect(classifyPortLine('Port 1: 0100 off')).toBe('off');
    expect(classifyPortLine('Port 2: 0103 power enable connect [x]')).toBe('on_connected');
    expect(classifyPortLine('Port 2: 02a0 power 5gbps Rx.Detect')).toBe('on');
    expect(classifyPortLine('Port 4: 0000')).toBe('unknown');
  });
});

describe('findPortStatus', () => {
  it('reads each port of the sample output', () => {
    expect(findPortStatus(STATUS_OUTPUT, '2-1', 3)).toBe('on_connected');
    expect(findPortStatus(STATUS_OUTPUT, '1-1.3', 1)).toBe('off');
    expect(findPortStatus(STATUS_OUTPUT, '1-1.3', 3)).toBe('on_connected');
  });

  it('returns unknown for a port without a line', () => {
    expect(findPortStatus(STATUS_OUTPUT, '1-1.3', 2)).toBe('unknown');
    expect(findPortStatus('', '2-1', 3)).toBe('unknown');
  });
});

describe('parseHubStatusOutput', () => {
  it('drops port lines seen before any hub header', () => {
    const output = ['Port 1: 0100 off', 'Current status for hub 3 [x]', '  Port 2: 0100 off'].join('\n');
    expect(parseHubStatusOutput(output)).toEqual([
      { hub: '3', port: 2, status: 'off', line: 'Port 2: 0100 off' },
    ]);
  });
});

describe('listHubPorts', () => {
  it('lists every pair in output order', () => {
    expect(listHubPorts(STATUS_OUTPUT)).toEqual([
      { hub: '2-1', port: 3 },
      { hub: '1-1.3', port: 1 },
      { hub: '1-1.3', port: 3 },
    ]);
  });

  it('keeps duplicated pairs', () => {
    const output = `${SEARCH_OUTPUT}\n${SEARCH_OUTPUT}`;
    expect(listHubPorts(output)).toHaveLength(4);
    expect(listHubPorts(output)).toEqual(listHubPorts(output));
  });
});

describe('findHubPortByDescription', () => {
  it('finds the hub and port of the matching line', () => {
    expect(findHubPortByDescription(SEARCH_OUTPUT, '1106035A012D2400')).toEqual({ hub: '1-1', port: 2 });
  });

  it('returns null when nothing matches', () => {
    expect(findHubPortByDescription(SEARCH_OUTPUT, 'FFFFFFFF')).toBeNull();
  });
});
