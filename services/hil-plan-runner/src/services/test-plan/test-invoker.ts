/**
 * Test Invoker
 *
 * Runs one test case through the MicroPython test tools:
 *
 * - single:            run-tests.py on the DUT, all scripts in one call
 * - single_post_delay: run-tests.py once per script, with a pause in between
 * - multi_stub:        stub script on the stub board via mpremote, then single
 * - multi:             run-multitests.py across both boards
 * - custom:            each script on its own, given the DUT port
 *
 * Script paths are relative to the tests directory of the MicroPython tree,
 * which is also the working directory of every tool.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { TestCase } from '../../types/hil-types.js';
import type { CommandRunner } from '../process/command-runner.js';
import { config } from '../../config.js';
import { log, type Logger } from '../../utils/logger.js';
import { sleep, type Sleep } from '../../utils/sleep.js';
import { InternalError } from '../../utils/errors.js';

export interface TestPorts {
  dut: string;
  stub: string | null;
}

export interface TestInvokerOptions {
  /** Root of the MicroPython source tree */
  mpyRootDir: string;
  pythonCommand?: string;
  logger?: Logger;
}

export class TestInvoker {
  private readonly testsDir: string;
  private readonly mpremotePath: string;
  private readonly python: string;
  private readonly logger: Logger;

  constructor(
    private readonly runner: CommandRunner,
    options: TestInvokerOptions,
    private readonly wait: Sleep = sleep
  ) {
    this.testsDir = path.join(options.mpyRootDir, 'tests');
    this.mpremotePath = path.join(options.mpyRootDir, 'tools', 'mpremote', 'mpremote.py');
    this.python = options.pythonCommand ?? config.python.command;
    this.logger = options.logger ?? log.child({ service: 'test-invoker' });
  }

  /**
   * Run the test and return its exit code, 0 meaning pass
   */
  async invoke(testCase: TestCase, ports: TestPorts): Promise<number> {
    switch (testCase.type) {
      case 'single':
        return this.runSingle(testCase, ports.dut);
      case 'single_post_delay':
        return this.runSinglePostDelay(testCase, ports.dut);
      case 'multi_stub':
        return this.runMultiStub(testCase, ports.dut, this.requireStub(testCase, ports));
      case 'multi':
        return this.runMulti(testCase, ports.dut, this.requireStub(testCase, ports));
      case 'custom':
        return this.runCustom(testCase, ports.dut);
    }
  }

  private requireStub(testCase: TestCase, ports: TestPorts): string {
    if (ports.stub === null) {
      throw new InternalError(`Test "${testCase.name}" needs a stub port`, {
        operation: 'invoke',
        testName: testCase.name,
      });
    }
    return ports.stub;
  }

  private async runSingle(testCase: TestCase, dutPort: string): Promise<number> {
    const testArgs: string[] = [];
    for (const script of testCase.scripts) {
      if (await this.isDirectory(script)) {
        testArgs.push('-d');
      }
      testArgs.push(script);
    }

    const excludeArgs = testCase.excludes.flatMap((excluded) => ['-e', excluded]);

    return this.runTestsCommand(dutPort, [...testArgs, ...excludeArgs]);
  }

  private async runSinglePostDelay(testCase: TestCase, dutPort: string): Promise<number> {
    const excluded = new Set(testCase.excludes);
    const scripts = (await this.expandScripts(testCase.scripts)).filter((s) => !excluded.has(s));

    for (const script of scripts) {
      const exitCode = await this.runTestsCommand(dutPort, [script]);
      if (exitCode !== 0) {
        return exitCode;
      }
      await this.wait(testCase.postTestDelayMs);
    }

    return 0;
  }

  private async runMultiStub(testCase: TestCase, dutPort: string, stubPort: string): Promise<number> {
    const stubScript = testCase.stubScript ?? '';
    const stubResult = await this.runner.run(
      this.python,
      [this.mpremotePath, 'connect', stubPort, 'run', '--no-follow', stubScript],
      { cwd: this.testsDir }
    );
    if (stubResult.exitCode !== 0) {
      this.logger.warn('Stub script failed', {
        testName: testCase.name,
        stubScript,
        exitCode: stubResult.exitCode,
      });
      return stubResult.exitCode;
    }

    await this.wait(testCase.postStubDelayMs);

    return this.runSingle(testCase, dutPort);
  }

  private async runMulti(testCase: TestCase, dutPort: string, stubPort: string): Promise<number> {
    const scripts = await this.expandScripts(testCase.scripts);
    const result = await this.runner.run(
      this.python,
      ['run-multitests.py', '-t', dutPort, '-t', stubPort, ...scripts],
      { cwd: this.testsDir }
    );
    return result.exitCode;
  }

  /**
   * Custom scripts talk to the board on their own, usually through mpremote.
   * All of them run even after a failure.
   */
  private async runCustom(testCase: TestCase, dutPort: string): Promise<number> {
    let exitCode = 0;
    for (const script of testCase.scripts) {
      const result = await this.runner.run(this.python, [script, dutPort, ...testCase.customArgs], {
        cwd: this.testsDir,
      });
      if (result.exitCode !== 0) {
        exitCode = 1;
      }
    }
    return exitCode;
  }

  /**
   * run-tests.py on the DUT. A failing run also prints and clears the
   * failure artifacts the tool leaves behind.
   */
  private async runTestsCommand(dutPort: string, args: string[]): Promise<number> {
    const result = await this.runner.run(
      this.python,
      ['run-tests.py', '-t', `port:${dutPort}`, ...args],
      { cwd: this.testsDir }
    );

    if (result.exitCode !== 0) {
      await this.runner.run(this.python, ['run-tests.py', '--print-failures'], { cwd: this.testsDir });
      await this.runner.run(this.python, ['run-tests.py', '--clean-failures'], { cwd: this.testsDir });
    }

    return result.exitCode;
  }

  /**
   * Replace directories by the .py files below them, sorted by path
   */
  private async expandScripts(scripts: string[]): Promise<string[]> {
    const expanded: string[] = [];
    for (const script of scripts) {
      if (await this.isDirectory(script)) {
        expanded.push(...(await this.listPythonFiles(script)));
      } else {
        expanded.push(script);
      }
    }
    return expanded;
  }

  private async listPythonFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(path.join(this.testsDir, dir), { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      const relative = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.listPythonFiles(relative)));
      } else if (entry.name.endsWith('.py')) {
        files.push(relative);
      }
    }

    return files.sort();
  }

  private async isDirectory(script: string): Promise<boolean> {
    try {
      return (await fs.stat(path.join(this.testsDir, script))).isDirectory();
    } catch {
      return false;
    }
  }
}
