/**
 * HIL Plan Runner - Configuration
 *
 * Centralized configuration management with environment variable support
 */

import { z } from 'zod';

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logFile: z.string().optional(),

  serviceName: z.string().default('hil-plan-runner'),
  version: z.string().default('0.1.0'),

  // USB power switch control tool
  powerControl: z.object({
    command: z.string().min(1).default('uhubctl'),
  }),

  // Interpreter for the test tools and custom scripts
  python: z.object({
    command: z.string().min(1).default('python'),
  }),

  // Test tool tree; CLI falls back to a path relative to itself when unset
  mpyRootDir: z.string().optional(),

  // Power-cycle readiness wait
  reset: z.object({
    pollAttempts: z.number().int().nonnegative().default(5),
    pollIntervalMs: z.number().int().nonnegative().default(1000),
    settleDelayMs: z.number().int().nonnegative().default(2000),
  }),

  // Static port mode
  ports: z.object({
    dut: z.string().min(1).default('/dev/ttyACM0'),
    stub: z.string().min(1).default('/dev/ttyACM1'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function optionalInt(value: string | undefined, fallback: number): number {
  return value === undefined || value === '' ? fallback : parseInt(value, 10);
}

function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV || 'development',
    logLevel: process.env.LOG_LEVEL || 'info',
    logFile: process.env.LOG_FILE || undefined,

    serviceName: process.env.HIL_SERVICE_NAME || 'hil-plan-runner',
    version: process.env.HIL_VERSION || '0.1.0',

    powerControl: {
      command: process.env.UHUBCTL_PATH || 'uhubctl',
    },

    python: {
      command: process.env.PYTHON_PATH || 'python',
    },

    mpyRootDir: process.env.MPY_ROOT_DIR || undefined,

    reset: {
      pollAttempts: optionalInt(process.env.RESET_POLL_ATTEMPTS, 5),
      pollIntervalMs: optionalInt(process.env.RESET_POLL_INTERVAL_MS, 1000),
      settleDelayMs: optionalInt(process.env.RESET_SETTLE_DELAY_MS, 2000),
    },

    ports: {
      dut: process.env.DEFAULT_DUT_PORT || '/dev/ttyACM0',
      stub: process.env.DEFAULT_STUB_PORT || '/dev/ttyACM1',
    },
  };

  return ConfigSchema.parse(rawConfig);
}

export const config = loadConfig();

export function getConfig(): Config {
  return config;
}
