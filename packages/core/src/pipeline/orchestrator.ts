import { PIPELINE_TASK_ORDER } from '@devtasks/shared';
import type { EntryReport, MatrixEntry, PipelineConfig, PipelineReport, TaskName, TaskOutcome } from '@devtasks/shared';
import { resolveEnvironment } from '../environment/environment.js';
import { createLogger, type Logger } from '../logger.js';
import type { PlatformAdapter } from '../platform/adapter.js';
import type { CommandRunner, OutputStream } from '../process/command-runner.js';
import { TaskRunner } from '../tasks/task-runner.js';
import { expandMatrix, layoutForEntry } from './matrix.js';
import { Semaphore } from './semaphore.js';

export type EntryOutputListener = (entryId: string, line: string, stream: OutputStream) => void;

export interface PipelineOptions {
  projectRoot: string;
  config: PipelineConfig;
  /** Adapter of the host; entries for the other platform are skipped */
  adapter: PlatformAdapter;
  runner: CommandRunner;
  env: NodeJS.ProcessEnv;
  includeBuild?: boolean;
  maxParallel?: number;
  failFast?: boolean;
  log?: Logger;
  onOutput?: EntryOutputListener;
}

/**
 * Runs the fixed task order once per matrix entry the host can run.
 * Entries are independent: each has its own environment and report path.
 */
export class PipelineOrchestrator {
  private readonly options: PipelineOptions;
  private readonly log: Logger;

  constructor(options: PipelineOptions) {
    this.options = options;
    this.log = options.log ?? createLogger('pipeline');
  }

  taskOrder(): TaskName[] {
    const includeBuild = this.options.includeBuild ?? this.options.config.pipeline.includeBuild;
    return includeBuild ? [...PIPELINE_TASK_ORDER, 'build_package'] : [...PIPELINE_TASK_ORDER];
  }

  async run(): Promise<PipelineReport> {
    const { config, adapter } = this.options;
    const maxParallel = this.options.maxParallel ?? config.matrix.maxParallel;
    const failFast = this.options.failFast ?? config.matrix.failFast;
    const startedAt = new Date().toISOString();

    const entries = expandMatrix(config.matrix);
    const semaphore = new Semaphore(maxParallel);
    let failureSeen = false;

    this.log.info(
      { entries: entries.map((entry) => entry.id), host: adapter.kind, maxParallel, failFast },
      'Pipeline started',
    );

    const reports = await Promise.all(
      entries.map((entry): Promise<EntryReport> => {
        if (entry.platform !== adapter.kind) {
          this.log.info({ entry: entry.id }, 'Skipping entry for another platform');
          const skipped: EntryReport = {
            entry,
            status: 'skipped',
            tasks: [],
            reason: `requires a ${entry.platform} host`,
          };
          return Promise.resolve(skipped);
        }

        return semaphore.run(async (): Promise<EntryReport> => {
          if (failFast && failureSeen) {
            return { entry, status: 'cancelled', tasks: [], reason: 'an earlier entry failed' };
          }
          const report = await this.runEntry(entry);
          if (report.status === 'failed') failureSeen = true;
          return report;
        });
      }),
    );

    const ran = reports.filter((report) => report.status !== 'skipped');
    const success = ran.length > 0 && ran.every((report) => report.status === 'passed');
    const finishedAt = new Date().toISOString();

    this.log.info(
      {
        success,
        passed: reports.filter((r) => r.status === 'passed').length,
        failed: reports.filter((r) => r.status === 'failed').length,
        skipped: reports.filter((r) => r.status === 'skipped').length,
        cancelled: reports.filter((r) => r.status === 'cancelled').length,
      },
      'Pipeline finished',
    );

    return { startedAt, finishedAt, success, entries: reports };
  }

  private async runEntry(entry: MatrixEntry): Promise<EntryReport> {
    const { projectRoot, config, adapter, runner, env, onOutput } = this.options;
    const entryLog = this.log.child({ entry: entry.id });
    const layout = layoutForEntry(config.project, entry);

    const taskRunner = new TaskRunner({
      projectRoot,
      layout,
      environment: resolveEnvironment(projectRoot, layout.venvDir, entry.python, adapter),
      adapter,
      runner,
      env,
      upgradeDependencies: config.dependencies.upgrade,
      log: entryLog,
      onOutput: onOutput ? (line, stream) => onOutput(entry.id, line, stream) : undefined,
    });

    const tasks: TaskOutcome[] = [];
    for (const task of this.taskOrder()) {
      const outcome = await taskRunner.run(task);
      tasks.push(outcome);
      if (outcome.status === 'failed') {
        entryLog.error({ task, exitCode: outcome.exitCode }, 'Entry failed');
        return { entry, status: 'failed', tasks };
      }
    }

    entryLog.info('Entry passed');
    return { entry, status: 'passed', tasks };
  }
}

/** Exit code for a finished pipeline: the first failing task's code. */
export function pipelineExitCode(report: PipelineReport): number {
  if (report.success) return 0;
  for (const entry of report.entries) {
    const failed = entry.tasks.find((task) => task.status === 'failed');
    if (failed) return failed.exitCode;
  }
  return 1;
}
