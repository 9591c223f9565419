import { Injectable } from '@nestjs/common';
import { spawn } from 'child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** Null when the process was terminated by a signal. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Port for launching an external process and collecting its output.
 * Resolves on exit whatever the exit code; rejects only when the process cannot be started.
 */
export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
}

export const COMMAND_RUNNER = 'CommandRunner' as const;

/** Runs commands with child_process.spawn, no shell and no timeout. */
@Injectable()
export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { shell: false, stdio: ['ignore', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', reject);

      child.on('close', (exitCode, signal) => {
        resolve({ stdout, stderr, exitCode, signal });
      });
    });
  }
}

/** How a process ended, e.g. `exit status 1`. */
export function describeExit(result: CommandResult): string {
  if (result.exitCode !== null) return `exit status ${result.exitCode}`;
  return `signal: ${result.signal ?? 'unknown'}`;
}
