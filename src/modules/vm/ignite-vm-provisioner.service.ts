import { Inject, Injectable, LoggerService } from '@nestjs/common';
import { PROVISION_CONFIG } from '../../infra/config/env.config';
import type { ProvisionApiConfig } from '../../infra/config/env.config';
import {
  IgniteAction,
  IpNotFoundError,
  ProvisionerError,
  describeError,
} from '../../infra/contracts/provision-errors';
import { APP_LOGGER } from '../../infra/logging/logging.module';
import { COMMAND_RUNNER, CommandResult, describeExit } from './command-runner';
import type { CommandRunner } from './command-runner';
import { findNodeIpInListing } from './ignite-ps-parser';
import { VmProvisioner } from './vm-provisioner.port';

/**
 * VmProvisioner backed by the Ignite CLI.
 * Invocations go through sudo unless IGNITE_USE_SUDO=false.
 */
@Injectable()
export class IgniteVmProvisionerService implements VmProvisioner {
  constructor(
    @Inject(PROVISION_CONFIG) private readonly config: ProvisionApiConfig,
    @Inject(COMMAND_RUNNER) private readonly runner: CommandRunner,
    @Inject(APP_LOGGER) private readonly logger: LoggerService,
  ) {}

  async create(manifestPath: string): Promise<void> {
    const result = await this.ignite('run', ['run', '--config', manifestPath]);
    if (result.exitCode !== 0) {
      const message =
        `Error running ignite: ${describeExit(result)}\n` +
        `Stdout: ${result.stdout}\nStderr: ${result.stderr}`;
      this.logger.error(`Failed to run ignite: ${message}`);
      throw this.failure('run', message, result);
    }
  }

  async listRunning(): Promise<string> {
    const result = await this.ignite('ps', ['ps']);
    if (result.exitCode !== 0) {
      throw this.failure(
        'ps',
        `error running ignite ps: ${describeExit(result)}\nStderr: ${result.stderr}`,
        result,
      );
    }
    return result.stdout;
  }

  findNodeIp(nodeName: string, listing: string): string {
    const ip = findNodeIpInListing(nodeName, listing);
    if (ip === undefined) throw new IpNotFoundError(nodeName);
    return ip;
  }

  async stop(name: string): Promise<void> {
    await this.vmCommand('stop', name);
  }

  async remove(name: string): Promise<void> {
    await this.vmCommand('rm', name);
  }

  private async vmCommand(action: 'stop' | 'rm', name: string): Promise<void> {
    const result = await this.ignite(action, ['vm', action, name]);
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw this.failure(
        action,
        stderr ? `${describeExit(result)}: ${stderr}` : describeExit(result),
        result,
      );
    }
  }

  /** Runs `[sudo] ignite <args>`; a launch failure becomes a ProvisionerError. */
  private async ignite(action: IgniteAction, args: string[]): Promise<CommandResult> {
    const { binary, useSudo } = this.config.ignite;
    const command = useSudo ? 'sudo' : binary;
    const argv = useSudo ? [binary, ...args] : args;
    try {
      return await this.runner.run(command, argv);
    } catch (err) {
      throw new ProvisionerError(`failed to start ${command}: ${describeError(err)}`, {
        action,
        cause: err,
      });
    }
  }

  private failure(action: IgniteAction, message: string, result: CommandResult): ProvisionerError {
    return new ProvisionerError(message, {
      action,
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode,
    });
  }
}
