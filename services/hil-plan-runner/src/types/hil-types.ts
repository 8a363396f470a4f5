/**
 * HIL (Hardware-in-the-Loop) Test Plan Type Definitions
 *
 * Devices and their bindings, power switch topology, test cases and
 * execution state shared across the runner.
 */

// ============================================================================
// POWER SWITCH TYPES
// ============================================================================

/**
 * Actions understood by the power-control tool
 */
export type PowerAction = 'on' | 'off' | 'cycle' | 'toggle';

/**
 * Port power state as reported by the power-control tool
 */
export type PortStatus = 'off' | 'on' | 'on_connected' | 'unknown';

/**
 * A hub location plus a port number on that hub
 */
export interface HubPort {
  hub: string;
  port: number;
}

/**
 * One port line of the power-control tool output
 */
export interface HubPortObservation extends HubPort {
  status: PortStatus;
  /** Trimmed source line, used for description matching */
  line: string;
}

/**
 * Address of a switchable power port. A null port addresses every port
 * on the hub.
 */
export interface SwitchRef {
  hub: string;
  port: number | null;
}

// ============================================================================
// DEVICE TYPES
// ============================================================================

/**
 * Serial endpoint bound to a device
 */
export interface SerialAccess {
  /** Serial path, e.g. /dev/ttyACM0 */
  address: string;
}

/**
 * Device entry as declared in the registry document
 */
export interface DeviceRecord {
  name: string;
  uid: string;
  features: string[];
}

/**
 * Registry device with its live bindings. A device with neither binding
 * is not currently connected.
 */
export interface Device {
  name: string;
  /** Hardware serial number */
  uid: string;
  features: ReadonlySet<string>;
  access: SerialAccess | null;
  switch: SwitchRef | null;
}

// ============================================================================
// TEST PLAN TYPES
// ============================================================================

export const TEST_TYPES = ['single', 'single_post_delay', 'multi', 'multi_stub', 'custom'] as const;

export type TestType = (typeof TEST_TYPES)[number];

export type DeviceRole = 'dut' | 'stub';

export interface DeviceRequirement {
  board: string;
  version?: string;
}

export interface TestCase {
  name: string;
  type: TestType;
  /** Scripts or directories, relative to the test tool directory */
  scripts: string[];
  excludes: string[];
  postTestDelayMs: number;
  stubScript: string | null;
  postStubDelayMs: number;
  dutRequirements: DeviceRequirement[];
  stubRequirements: DeviceRequirement[];
  /** Extra arguments for custom scripts */
  customArgs: string[];
}

/**
 * Devices picked for one test. A null entry means no device was found for
 * the role.
 */
export interface ResolvedDevices {
  dut: Device | null;
  stub: Device | null;
}

// ============================================================================
// RESULT TYPES
// ============================================================================

export interface PlanRunSummary {
  passed: string[];
  failed: string[];
  skipped: string[];
  /** Number of passes over the catalog, the first one included */
  passes: number;
  exitCode: 0 | 1;
}
