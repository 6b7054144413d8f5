import type { CommandSpec, ProjectLayout, TaskName } from '@devtasks/shared';
import type { EnvironmentHandle } from '../environment/environment.js';
import type { Logger } from '../logger.js';
import type { PlatformAdapter } from '../platform/adapter.js';
import type { CommandRunner, OutputListener } from '../process/command-runner.js';

/** What a task needs to know to list its steps */
export interface StepContext {
  projectRoot: string;
  layout: ProjectLayout;
  environment: EnvironmentHandle;
  adapter: PlatformAdapter;
  /** Host interpreter that creates the environment */
  interpreter: CommandSpec;
  upgradeDependencies: boolean;
}

/** Everything a running step may touch; no ambient process state */
export interface TaskContext extends StepContext {
  runner: CommandRunner;
  env: NodeJS.ProcessEnv;
  log: Logger;
  onOutput?: OutputListener;
}

export interface CommandStep {
  kind: 'command';
  label: string;
  command: CommandSpec;
  /** Resolve the program inside the environment and run it activated */
  useEnvironment: boolean;
  /** Entry appended to PYTHONPATH */
  searchPath?: string;
}

export interface InternalStepResult {
  ok: boolean;
  message: string;
}

export interface InternalStep {
  kind: 'internal';
  label: string;
  run(context: TaskContext): Promise<InternalStepResult>;
}

export type TaskStep = CommandStep | InternalStep;

export interface TaskDefinition {
  name: TaskName;
  description: string;
  requiresEnvironment: boolean;
  steps(context: StepContext): TaskStep[];
}
