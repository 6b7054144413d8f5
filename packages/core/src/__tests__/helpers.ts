import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import type { CommandSpec } from '@devtasks/shared';
import type { CommandResult, CommandRunner, RunOptions } from '../process/command-runner.js';

export interface RecordedCall {
  command: CommandSpec;
  options: RunOptions;
}

type Handler = (command: CommandSpec, options: RunOptions) => CommandResult | Promise<CommandResult>;

/** Program name without directory or .exe, e.g. /w/.venv/bin/flake8 -> flake8 */
export function programName(command: CommandSpec): string {
  return basename(command.program.replace(/\\/g, '/')).replace(/\.exe$/, '');
}

/**
 * In-process stand-in for the process runner. Every call is recorded;
 * unmatched commands succeed with empty output.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly handlers: Array<{ matches: (command: CommandSpec) => boolean; handle: Handler }> = [];

  when(matches: (command: CommandSpec) => boolean, handle: Handler): this {
    this.handlers.push({ matches, handle });
    return this;
  }

  whenProgram(name: string, handle: Handler): this {
    return this.when((command) => programName(command) === name, handle);
  }

  async run(command: CommandSpec, options: RunOptions): Promise<CommandResult> {
    this.calls.push({ command, options });
    const handler = this.handlers.find((candidate) => candidate.matches(command));
    return handler ? handler.handle(command, options) : { exitCode: 0, stdout: '' };
  }

  programs(): string[] {
    return this.calls.map((call) => programName(call.command));
  }
}

export function createTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `${prefix}-`));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
