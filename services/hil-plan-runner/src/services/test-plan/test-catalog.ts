/**
 * Test Catalog
 *
 * Parses the test plan document into typed test cases. Each entry looks
 * like:
 *
 *   - name: <test name>
 *     type: <single | single_post_delay | multi | multi_stub | custom>  # required for multi and custom
 *     test:
 *       script: <script or directory, or a list of them>
 *       exclude: <script, or a list of them>
 *       device:
 *         - board: <board name>
 *           version: <version>   # optional
 *       post_test_delay_ms: <delay between scripts>
 *       args: <extra arguments, custom only>
 *     stub:
 *       script: <script run on the stub device>
 *       device:
 *         - board: <board name>
 *       post_stub_delay_ms: <delay after the stub is started>
 */

import { z } from 'zod';
import * as yaml from 'js-yaml';
import {
  TEST_TYPES,
  type DeviceRequirement,
  type DeviceRole,
  type TestCase,
  type TestType,
} from '../../types/hil-types.js';
import { readYamlDocument } from '../../utils/yaml-document.js';
import { ValidationError } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';

const logger = log.child({ service: 'test-catalog' });

// Plan files are read under the failsafe schema, so scalars arrive as the
// text written; numbers only come from callers building plans in code
const TextSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

const ScalarOrListSchema = z
  .union([TextSchema, z.array(TextSchema)])
  .nullish()
  .transform((value) => (value == null ? [] : Array.isArray(value) ? value : [value]));

const DelaySchema = z
  .union([
    z.number().int().nonnegative(),
    z
      .string()
      .regex(/^\d+$/, 'Expected a non-negative integer')
      .transform((value) => parseInt(value, 10)),
  ])
  .default(0);

const DeviceRequirementSchema = z.object({
  board: TextSchema,
  version: TextSchema.optional(),
});

const TestPlanEntrySchema = z.object({
  name: TextSchema,
  type: z.enum(TEST_TYPES).optional(),
  test: z
    .object({
      script: ScalarOrListSchema,
      exclude: ScalarOrListSchema,
      device: z.array(DeviceRequirementSchema).default([]),
      post_test_delay_ms: DelaySchema,
      args: z.array(TextSchema).default([]),
    })
    .default({}),
  stub: z
    .object({
      script: TextSchema.optional(),
      device: z.array(DeviceRequirementSchema).default([]),
      post_stub_delay_ms: DelaySchema,
    })
    .default({}),
});

const TestPlanDocumentSchema = z.array(TestPlanEntrySchema);

export interface ImplicitTypeFields {
  stubScript: string | null;
  postTestDelayMs: number;
}

/**
 * Type of a test that does not declare one. multi and custom tests must
 * always be declared.
 */
export function inferTestType(fields: ImplicitTypeFields): TestType {
  if (fields.stubScript !== null) {
    return 'multi_stub';
  }
  return fields.postTestDelayMs > 0 ? 'single_post_delay' : 'single';
}

export function parseTestPlan(document: unknown, source = 'test plan'): TestCase[] {
  const parsed = TestPlanDocumentSchema.safeParse(document ?? []);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ValidationError(`Invalid test plan "${source}"`, issues, {
      operation: 'parseTestPlan',
      path: source,
    });
  }

  return parsed.data.map((entry): TestCase => {
    const stubScript = entry.stub.script ?? null;
    const postTestDelayMs = entry.test.post_test_delay_ms;
    const type = entry.type ?? inferTestType({ stubScript, postTestDelayMs });

    if (type === 'multi_stub' && stubScript === null) {
      throw new ValidationError(`Test "${entry.name}" is multi_stub but has no stub.script`, [], {
        operation: 'parseTestPlan',
        path: source,
      });
    }

    return {
      name: entry.name,
      type,
      scripts: entry.test.script,
      excludes: entry.test.exclude,
      postTestDelayMs,
      stubScript,
      postStubDelayMs: entry.stub.post_stub_delay_ms,
      dutRequirements: entry.test.device,
      stubRequirements: entry.stub.device,
      customArgs: entry.test.args,
    };
  });
}

export async function loadTestPlan(filePath: string): Promise<TestCase[]> {
  const document = await readYamlDocument(filePath, 'Test plan', yaml.FAILSAFE_SCHEMA);
  return parseTestPlan(document, filePath);
}

/**
 * Tests to run: all of them when no names are given, otherwise the named
 * ones in the order they were asked for
 */
export function selectTestCases(testCases: TestCase[], names: string[] = []): TestCase[] {
  if (names.length === 0) {
    return testCases;
  }

  const selected: TestCase[] = [];
  for (const name of names) {
    const matches = testCases.filter((testCase) => testCase.name === name);
    if (matches.length === 0) {
      logger.warn(`Test "${name}" is not in the test plan`);
    }
    selected.push(...matches);
  }
  return selected;
}

export function requiresMultipleDevices(testCase: TestCase): boolean {
  return testCase.type === 'multi' || testCase.type === 'multi_stub';
}

/**
 * Requirement entries of a role that target the board. multi tests run the
 * same kind of board on both ends, so the stub role reads the DUT list.
 */
export function supportedDevices(
  testCase: TestCase,
  role: DeviceRole,
  board: string,
  version?: string
): DeviceRequirement[] {
  const requirements =
    role === 'dut' || testCase.type === 'multi'
      ? testCase.dutRequirements
      : testCase.stubRequirements;

  return requirements.filter(
    (requirement) =>
      requirement.board === board && (version === undefined || requirement.version === version)
  );
}
