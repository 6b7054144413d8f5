import { join } from 'node:path';
import type { ProjectLayout, StepOutcome, TaskName, TaskOutcome } from '@devtasks/shared';
import { EXIT_STEP_FAILED } from '@devtasks/shared';
import { environmentExists, type EnvironmentHandle } from '../environment/environment.js';
import { createLogger, type Logger } from '../logger.js';
import type { PlatformAdapter } from '../platform/adapter.js';
import type { CommandRunner, OutputListener } from '../process/command-runner.js';
import { getTask } from './catalog.js';
import type { CommandStep, TaskContext, TaskStep } from './types.js';

export interface TaskRunnerOptions {
  projectRoot: string;
  layout: ProjectLayout;
  environment: EnvironmentHandle;
  adapter: PlatformAdapter;
  runner: CommandRunner;
  /** Base environment variables; the runner never reads process.env itself */
  env: NodeJS.ProcessEnv;
  upgradeDependencies?: boolean;
  log?: Logger;
  onOutput?: OutputListener;
}

interface StepResult {
  exitCode: number;
  message?: string;
}

/**
 * Runs catalog tasks step by step. The first failing step fails the task
 * and every later step is skipped.
 */
export class TaskRunner {
  private readonly options: TaskRunnerOptions;
  private readonly log: Logger;

  constructor(options: TaskRunnerOptions) {
    this.options = options;
    this.log = options.log ?? createLogger('task-runner');
  }

  get environment(): EnvironmentHandle {
    return this.options.environment;
  }

  async run(name: TaskName | string): Promise<TaskOutcome> {
    const definition = getTask(name);
    const taskLog = this.log.child({ task: definition.name });
    const context = this.createContext(taskLog);
    const startTime = Date.now();

    const steps = definition.steps(context);
    const outcomes: StepOutcome[] = [];

    if (definition.requiresEnvironment && !(await this.environmentReady())) {
      const message = `environment not found at ${context.environment.path}; run create_venv first`;
      taskLog.error({ environment: context.environment.path }, 'Environment missing');
      return {
        task: definition.name,
        status: 'failed',
        exitCode: EXIT_STEP_FAILED,
        durationMs: Date.now() - startTime,
        steps: steps.map((step): StepOutcome => ({ label: step.label, status: 'skipped', exitCode: null })),
        failedStep: 'precondition',
        message,
      };
    }

    taskLog.info({ steps: steps.length }, 'Task started');

    let failure: { step: string; exitCode: number; message?: string } | null = null;

    for (const step of steps) {
      if (failure) {
        outcomes.push({ label: step.label, status: 'skipped', exitCode: null });
        continue;
      }

      const result = await this.runStep(step, context, taskLog);
      if (result.exitCode === 0) {
        outcomes.push({ label: step.label, status: 'passed', exitCode: 0, message: result.message });
      } else {
        outcomes.push({ label: step.label, status: 'failed', exitCode: result.exitCode, message: result.message });
        failure = { step: step.label, exitCode: result.exitCode, message: result.message };
      }
    }

    const durationMs = Date.now() - startTime;

    if (failure) {
      taskLog.error({ step: failure.step, exitCode: failure.exitCode, durationMs }, 'Task failed');
      return {
        task: definition.name,
        status: 'failed',
        exitCode: failure.exitCode,
        durationMs,
        steps: outcomes,
        failedStep: failure.step,
        message: failure.message,
      };
    }

    taskLog.info({ durationMs }, 'Task passed');
    return { task: definition.name, status: 'passed', exitCode: 0, durationMs, steps: outcomes };
  }

  private createContext(log: Logger): TaskContext {
    const { projectRoot, layout, environment, adapter, runner, env, onOutput } = this.options;
    return {
      projectRoot,
      layout,
      environment,
      adapter,
      runner,
      env,
      log,
      onOutput,
      interpreter: adapter.interpreterCommand(environment.pythonVersion),
      upgradeDependencies: this.options.upgradeDependencies ?? false,
    };
  }

  private async environmentReady(): Promise<boolean> {
    const { adapter, env, environment } = this.options;
    if (adapter.isActive(env, environment.path)) return true;
    return environmentExists(environment, adapter);
  }

  private async runStep(step: TaskStep, context: TaskContext, taskLog: Logger): Promise<StepResult> {
    const stepLog = taskLog.child({ step: step.label });

    try {
      if (step.kind === 'command') {
        return await this.runCommandStep(step, context, stepLog);
      }

      const result = await step.run(context);
      if (result.ok) {
        stepLog.debug({ detail: result.message }, 'Step passed');
        return { exitCode: 0, message: result.message };
      }
      stepLog.error({ detail: result.message }, 'Step failed');
      return { exitCode: EXIT_STEP_FAILED, message: result.message };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      stepLog.error({ err }, 'Step threw');
      return { exitCode: EXIT_STEP_FAILED, message };
    }
  }

  private async runCommandStep(step: CommandStep, context: TaskContext, stepLog: Logger): Promise<StepResult> {
    const venvPath = step.useEnvironment ? context.environment.path : undefined;
    if (venvPath && !context.adapter.isActive(context.env, venvPath)) {
      stepLog.debug({ environment: venvPath }, 'Activating environment');
    }

    stepLog.debug({ program: step.command.program, args: step.command.args }, 'Running command');

    const result = await context.adapter.runCommand(context.runner, step.command, {
      cwd: context.projectRoot,
      env: context.env,
      venvPath,
      searchPath: step.searchPath ? join(context.projectRoot, step.searchPath) : undefined,
      onOutput: context.onOutput,
    });

    if (result.exitCode !== 0) {
      return { exitCode: result.exitCode, message: `${step.command.program} exited with code ${result.exitCode}` };
    }
    return { exitCode: 0 };
  }
}
