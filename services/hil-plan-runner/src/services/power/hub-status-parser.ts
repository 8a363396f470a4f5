/**
 * uhubctl output parser
 *
 * The tool reports its topology as hub header lines followed by one line
 * per port:
 *
 *   Current status for hub 2-1 [0bda:0411 Generic USB3.2 Hub, USB 3.20, 4 ports, ppps]
 *     Port 2: 02a0 power 5gbps Rx.Detect
 *   Current status for hub 1-1 [0bda:5411 Generic USB2.1 Hub, USB 2.10, 4 ports, ppps]
 *     Port 2: 0103 power enable connect [04b4:f155 Cypress Semiconductor KitProg3 CMSIS-DAP 1106035A012D2400]
 *
 * A port line belongs to the closest hub header above it. Port lines seen
 * before any header are dropped. Duplicated ports (USB 3.0/2.0 duality)
 * are reported as they appear.
 */

import type { HubPort, HubPortObservation, PortStatus } from '../../types/hil-types.js';

const HUB_HEADER_PREFIX = 'Current status for hub';
const HUB_PATTERN = /hub (\S+)/;
const PORT_PATTERN = /Port (\d+):/;

function matchHub(line: string): string | null {
  if (!line.startsWith(HUB_HEADER_PREFIX)) return null;
  const match = HUB_PATTERN.exec(line);
  return match ? match[1] : null;
}

function matchPort(line: string): number | null {
  if (!line.startsWith('Port')) return null;
  const match = PORT_PATTERN.exec(line);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Classify a single port line
 */
export function classifyPortLine(line: string): PortStatus {
  if (line.includes(' off')) {
    return 'off';
  }
  if (line.includes(' power') && line.includes('enable connect')) {
    return 'on_connected';
  }
  if (line.includes(' power')) {
    return 'on';
  }
  return 'unknown';
}

/**
 * Single forward pass over the tool output, tracking the current hub
 */
export function parseHubStatusOutput(output: string): HubPortObservation[] {
  const observations: HubPortObservation[] = [];
  let currentHub: string | null = null;

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const hub = matchHub(line);
    if (hub !== null) {
      currentHub = hub;
      continue;
    }

    const port = matchPort(line);
    if (port !== null && currentHub !== null) {
      observations.push({
        hub: currentHub,
        port,
        status: classifyPortLine(line),
        line,
      });
    }
  }

  return observations;
}

export function findPortStatus(output: string, hub: string, port: number): PortStatus {
  const observation = parseHubStatusOutput(output).find(
    (o) => o.hub === hub && o.port === port
  );
  return observation ? observation.status : 'unknown';
}

export function listHubPorts(output: string): HubPort[] {
  return parseHubStatusOutput(output).map(({ hub, port }) => ({ hub, port }));
}

export function findHubPortByDescription(output: string, description: string): HubPort | null {
  const observation = parseHubStatusOutput(output).find((o) => o.line.includes(description));
  return observation ? { hub: observation.hub, port: observation.port } : null;
}
