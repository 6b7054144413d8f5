import type { CommandSpec, PlatformKind, TaskName } from '@devtasks/shared';
import type { CommandResult, CommandRunner, OutputListener } from '../process/command-runner.js';

/** A tool invocation as it appears in a generated wrapper script */
export interface ScriptCommand {
  command: CommandSpec;
  useEnvironment: boolean;
  /** Entry appended to PYTHONPATH for this command */
  searchPath?: string;
}

export interface ScriptSpec {
  task: TaskName;
  description: string;
  venvDir: string;
  commands: ScriptCommand[];
}

export interface AdapterRunOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Environment to run inside of; omit to run with the host tools */
  venvPath?: string;
  searchPath?: string;
  capture?: boolean;
  onOutput?: OutputListener;
}

/**
 * Everything that differs between a POSIX host and a Windows host.
 * Task definitions never branch on the platform themselves.
 */
export interface PlatformAdapter {
  readonly kind: PlatformKind;
  readonly pathDelimiter: string;
  readonly scriptDir: string;
  readonly scriptExtension: string;

  environmentPath(projectRoot: string, venvDir: string): string;
  binDir(venvPath: string): string;
  executable(venvPath: string, name: string): string;
  interpreterCommand(version: string): CommandSpec;
  /** Interpreter found on PATH, for scripts run under a CI-provided Python */
  defaultInterpreter(): CommandSpec;

  isActive(env: NodeJS.ProcessEnv, venvPath: string): boolean;
  activate(env: NodeJS.ProcessEnv, venvPath: string): NodeJS.ProcessEnv;
  prepareEnvironment(env: NodeJS.ProcessEnv, venvPath: string): NodeJS.ProcessEnv;
  extendSearchPath(current: string | undefined, entry: string): string;

  runCommand(runner: CommandRunner, command: CommandSpec, options: AdapterRunOptions): Promise<CommandResult>;
  renderScript(script: ScriptSpec): string;
}

export abstract class BasePlatformAdapter implements PlatformAdapter {
  abstract readonly kind: PlatformKind;
  abstract readonly pathDelimiter: string;
  abstract readonly scriptDir: string;
  abstract readonly scriptExtension: string;

  abstract environmentPath(projectRoot: string, venvDir: string): string;
  abstract binDir(venvPath: string): string;
  abstract executable(venvPath: string, name: string): string;
  abstract interpreterCommand(version: string): CommandSpec;
  abstract defaultInterpreter(): CommandSpec;
  abstract renderScript(script: ScriptSpec): string;

  /** Key of the search-path variable as it appears in env */
  protected abstract pathKey(env: NodeJS.ProcessEnv): string;

  /** Canonical form of a directory path, for comparisons */
  protected abstract canonicalDir(dir: string): string;

  isActive(env: NodeJS.ProcessEnv, venvPath: string): boolean {
    const active = env['VIRTUAL_ENV'];
    if (!active) return false;
    return this.canonicalDir(active) === this.canonicalDir(venvPath);
  }

  activate(env: NodeJS.ProcessEnv, venvPath: string): NodeJS.ProcessEnv {
    const next: NodeJS.ProcessEnv = { ...env };
    const key = this.pathKey(next);
    const bin = this.binDir(venvPath);
    const current = next[key];

    next[key] = current ? `${bin}${this.pathDelimiter}${current}` : bin;
    next['VIRTUAL_ENV'] = venvPath;
    delete next['PYTHONHOME'];

    return next;
  }

  prepareEnvironment(env: NodeJS.ProcessEnv, venvPath: string): NodeJS.ProcessEnv {
    return this.isActive(env, venvPath) ? env : this.activate(env, venvPath);
  }

  extendSearchPath(current: string | undefined, entry: string): string {
    return current ? `${current}${this.pathDelimiter}${entry}` : entry;
  }

  runCommand(runner: CommandRunner, command: CommandSpec, options: AdapterRunOptions): Promise<CommandResult> {
    const { venvPath, searchPath } = options;

    let env = venvPath ? this.prepareEnvironment(options.env, venvPath) : options.env;
    if (searchPath) {
      env = { ...env, PYTHONPATH: this.extendSearchPath(env['PYTHONPATH'], searchPath) };
    }

    const resolved: CommandSpec = venvPath
      ? { program: this.executable(venvPath, command.program), args: command.args }
      : command;

    return runner.run(resolved, {
      cwd: options.cwd,
      env,
      capture: options.capture,
      onOutput: options.onOutput,
    });
  }
}
