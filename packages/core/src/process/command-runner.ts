import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { CommandSpec } from '@devtasks/shared';
import { EXIT_COMMAND_NOT_FOUND } from '@devtasks/shared';
import { createLogger, type Logger } from '../logger.js';

export type OutputStream = 'stdout' | 'stderr';

export type OutputListener = (line: string, stream: OutputStream) => void;

export interface RunOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Collect stdout into the result instead of passing it through */
  capture?: boolean;
  /** Receive output line by line instead of inheriting stdio */
  onOutput?: OutputListener;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
}

export interface CommandRunner {
  run(command: CommandSpec, options: RunOptions): Promise<CommandResult>;
}

/** Exit code a shell would report for a process killed by a signal. */
export function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : 1;
}

function forwardLines(stream: Readable, name: OutputStream, listener: OutputListener): void {
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  lines.on('line', (line) => listener(line, name));
}

/**
 * Runs programs as child processes, without a shell. Exit codes are passed
 * through unchanged.
 */
export class ProcessCommandRunner implements CommandRunner {
  private readonly log: Logger;

  constructor(log: Logger = createLogger('command-runner')) {
    this.log = log;
  }

  run(command: CommandSpec, options: RunOptions): Promise<CommandResult> {
    const { capture = false, onOutput } = options;
    const piped = capture || onOutput !== undefined;

    this.log.debug({ program: command.program, args: command.args, cwd: options.cwd }, 'Spawning');

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command.program, command.args, {
        cwd: options.cwd,
        env: options.env,
        stdio: piped ? ['inherit', 'pipe', onOutput ? 'pipe' : 'inherit'] : 'inherit',
        windowsHide: true,
      });

      let stdout = '';

      if (child.stdout) {
        if (capture) {
          child.stdout.setEncoding('utf-8');
          child.stdout.on('data', (chunk: string) => {
            stdout += chunk;
          });
        } else if (onOutput) {
          forwardLines(child.stdout, 'stdout', onOutput);
        }
      }
      if (child.stderr && onOutput) {
        forwardLines(child.stderr, 'stderr', onOutput);
      }

      child.once('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'ENOENT') {
          this.log.error({ program: command.program }, 'Program not found');
          resolve({ exitCode: EXIT_COMMAND_NOT_FOUND, stdout });
          return;
        }
        reject(err);
      });

      child.once('close', (code, signal) => {
        if (code !== null) {
          resolve({ exitCode: code, stdout });
        } else if (signal !== null) {
          this.log.warn({ program: command.program, signal }, 'Process terminated by signal');
          resolve({ exitCode: signalExitCode(signal), stdout });
        } else {
          resolve({ exitCode: 1, stdout });
        }
      });
    });
  }
}
