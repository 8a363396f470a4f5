/**
 * Power Controller
 *
 * Wraps the uhubctl command line tool to switch USB hub port power and to
 * read back the port topology. Only the subset needed for device reset and
 * discovery is implemented. See https://github.com/mvp/uhubctl for the
 * tool itself.
 *
 * Every query runs the tool and parses the output it returned; no output
 * is kept between calls. The hub hardware is still a single resource, so
 * callers issue one call at a time.
 */

import type { CommandRunner } from '../process/command-runner.js';
import type { HubPort, PortStatus, PowerAction } from '../../types/hil-types.js';
import { config } from '../../config.js';
import { log, type Logger } from '../../utils/logger.js';
import { findHubPortByDescription, findPortStatus, listHubPorts } from './hub-status-parser.js';

const NO_DEVICES_MESSAGE = 'No compatible devices detected!';

export interface PowerControllerOptions {
  /** Tool executable, defaults to the configured uhubctl path */
  command?: string;
  logger?: Logger;
}

export class PowerController {
  private readonly runner: CommandRunner;
  private readonly command: string;
  private readonly logger: Logger;

  constructor(runner: CommandRunner, options: PowerControllerOptions = {}) {
    this.runner = runner;
    this.command = options.command ?? config.powerControl.command;
    this.logger = options.logger ?? log.child({ service: 'power-controller' });
  }

  /**
   * Run an action on a hub port.
   *
   * A null port applies the action to every port of the hub. A null hub
   * applies it to every hub, in which case the port must be given.
   */
  async runAction(action: PowerAction, hub: string | null, port: number | null): Promise<void> {
    const args = ['--action', action];
    if (hub !== null) {
      args.push('--location', hub);
    }
    if (port !== null) {
      args.push('--port', String(port));
    }

    await this.invoke(args);
  }

  async getStatus(hub: string, port: number): Promise<PortStatus> {
    const output = await this.invoke(['--location', hub, '--port', String(port)]);
    return findPortStatus(output, hub, port);
  }

  /**
   * All (hub, port) pairs reported by the tool, in output order
   */
  async scanHubsPorts(): Promise<HubPort[]> {
    const output = await this.invoke([]);
    return listHubPorts(output);
  }

  /**
   * Hub and port of the first port line containing the given text, e.g. a
   * device serial number in the attached device description
   */
  async getHubPortByDesc(description: string): Promise<HubPort | null> {
    const output = await this.invoke(['--search', description]);
    return findHubPortByDescription(output, description);
  }

  /**
   * Run the tool and return its stdout. Failures yield an empty output: an
   * absent or unsupported hub is a normal condition on a bench.
   */
  private async invoke(args: string[]): Promise<string> {
    const result = await this.runner.run(this.command, args, { captureOutput: true });

    if (result.exitCode !== 0) {
      if (result.stderr.includes(NO_DEVICES_MESSAGE)) {
        this.logger.debug('No compatible hubs detected', { args });
      } else {
        this.logger.warn(`${this.command} command failed`, {
          args,
          exitCode: result.exitCode,
          stderr: result.stderr.trim(),
        });
      }
      return '';
    }

    return result.stdout;
  }
}
