/**
 * Command Runner
 *
 * Spawns the external tools (power switch control, test runners, custom
 * scripts) and waits for them to exit. Every call blocks its caller until
 * the process is gone; nothing runs in parallel.
 */

import { spawn, type ChildProcess } from 'child_process';
import { v4 as uuidv4 } from 'uuid';
import { log as rootLogger } from '../../utils/logger.js';
import { ToolInvocationError, handleError } from '../../utils/errors.js';

const logger = rootLogger.child({ service: 'command-runner' });

export interface CommandOptions {
  cwd?: string;
  /**
   * Collect stdout/stderr instead of passing them through to the terminal.
   * Test tools inherit the terminal so their report reaches the user.
   */
  captureOutput?: boolean;
}

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  /** -1 when the process could not be started or was killed by a signal */
  exitCode: number;
  duration: number;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

/**
 * CommandRunner backed by child_process.spawn
 */
export class ProcessCommandRunner implements CommandRunner {
  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const jobId = uuidv4();
    const startTime = Date.now();

    logger.debug(`Executing ${command} ${args.join(' ')}`, { jobId, cwd: options.cwd });

    try {
      const result = await this.runProcess(command, args, options, startTime);
      logger.debug('Command finished', {
        jobId,
        exitCode: result.exitCode,
        duration: result.duration,
      });
      return result;
    } catch (error) {
      const failure = handleError(error);
      logger.error('Command could not be executed', failure, { jobId, command });

      return {
        success: false,
        stdout: '',
        stderr: failure.message,
        exitCode: -1,
        duration: Date.now() - startTime,
      };
    }
  }

  private runProcess(
    command: string,
    args: string[],
    options: CommandOptions,
    startTime: number
  ): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const proc: ChildProcess = spawn(command, args, {
        cwd: options.cwd,
        stdio: options.captureOutput ? ['ignore', 'pipe', 'pipe'] : 'inherit',
      });

      // decode across chunk boundaries
      proc.stdout?.setEncoding('utf8');
      proc.stderr?.setEncoding('utf8');

      proc.stdout?.on('data', (data: string) => {
        stdout += data;
      });

      proc.stderr?.on('data', (data: string) => {
        stderr += data;
      });

      proc.on('close', (code: number | null) => {
        if (settled) return;
        settled = true;
        const exitCode = code ?? -1;

        resolve({
          success: exitCode === 0,
          stdout,
          stderr,
          exitCode,
          duration: Date.now() - startTime,
        });
      });

      proc.on('error', (error: Error) => {
        if (settled) return;
        settled = true;
        reject(new ToolInvocationError(command, error.message, { operation: 'spawn', args }));
      });
    });
  }
}
