import { resolve } from 'node:path';
import {
  createLogger,
  detectPlatform,
  loadPipelineConfig,
  loadRuntimeSettings,
  withPythonOverride,
} from '@devtasks/core';
import type { CommandRunner, Database, Logger, PlatformAdapter, RuntimeSettings } from '@devtasks/core';
import type { PipelineConfig } from '@devtasks/shared';

/** Everything the CLI touches outside its own process state */
export interface CliDeps {
  env: NodeJS.ProcessEnv;
  cwd: string;
  runner: CommandRunner;
  /** Host adapter; detected from env when omitted */
  adapter?: PlatformAdapter;
  openHistory: (dbPath: string) => Database;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliState {
  exitCode: number;
}

export interface Cli {
  deps: CliDeps;
  state: CliState;
}

export type GlobalOptions = {
  cwd?: string;
  config?: string;
};

export interface ProjectSettings {
  root: string;
  settings: RuntimeSettings;
  log: Logger;
}

export interface ProjectContext extends ProjectSettings {
  config: PipelineConfig;
  configSource: string | null;
  adapter: PlatformAdapter;
}

export function loadSettings(deps: CliDeps, options: GlobalOptions): ProjectSettings {
  const root = resolve(deps.cwd, options.cwd ?? '.');
  const settings = loadRuntimeSettings(deps.env, root);
  return { root, settings, log: createLogger('cli', settings.logLevel) };
}

export async function loadConfig(
  project: ProjectSettings,
  options: GlobalOptions,
): Promise<{ config: PipelineConfig; source: string | null }> {
  const { config, source } = await loadPipelineConfig(project.root, options.config ?? project.settings.configPath);
  return { config: withPythonOverride(config, project.settings.pythonVersion), source };
}

/**
 * Resolve the project root, settings, config and host adapter for commands
 * that run tasks.
 */
export async function loadProject(deps: CliDeps, options: GlobalOptions): Promise<ProjectContext> {
  const project = loadSettings(deps, options);
  const adapter = deps.adapter ?? detectPlatform(deps.env);
  const { config, source } = await loadConfig(project, options);

  project.log.debug({ root: project.root, config: source, platform: adapter.kind }, 'Project loaded');
  return { ...project, config, configSource: source, adapter };
}

/**
 * Write to the run history unless it is disabled. A history failure never
 * changes the exit code of the run.
 */
export function recordHistory(deps: CliDeps, project: ProjectSettings, record: (db: Database) => void): void {
  if (!project.settings.historyEnabled) return;
  try {
    record(deps.openHistory(project.settings.historyDbPath));
  } catch (err) {
    project.log.warn({ err, path: project.settings.historyDbPath }, 'Could not record run history');
  }
}
