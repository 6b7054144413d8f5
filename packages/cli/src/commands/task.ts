import type { Command } from 'commander';
import { listTasks, recordTaskRun, resolveEnvironment, TaskRunner } from '@devtasks/core';
import type { TaskName } from '@devtasks/shared';
import { loadProject, recordHistory, type Cli, type GlobalOptions } from '../context.js';
import { formatTaskOutcome } from '../output.js';

async function runTask(cli: Cli, name: TaskName, options: GlobalOptions): Promise<number> {
  const { deps } = cli;
  const project = await loadProject(deps, options);
  const { root, config, adapter } = project;

  const runner = new TaskRunner({
    projectRoot: root,
    layout: config.project,
    environment: resolveEnvironment(root, config.project.venvDir, config.python.version, adapter),
    adapter,
    runner: deps.runner,
    env: deps.env,
    upgradeDependencies: config.dependencies.upgrade,
    log: project.log,
  });

  const startedAt = new Date().toISOString();
  const outcome = await runner.run(name);
  const finishedAt = new Date().toISOString();

  recordHistory(deps, project, (db) => {
    recordTaskRun(db, outcome, adapter.kind, startedAt, finishedAt);
  });

  deps.stdout(formatTaskOutcome(outcome));
  return outcome.exitCode;
}

/** One subcommand per catalog task; none take options of their own. */
export function registerTaskCommands(program: Command, cli: Cli): void {
  for (const task of listTasks()) {
    program
      .command(task.name)
      .description(task.description)
      .action(async (_options: object, command: Command) => {
        cli.state.exitCode = await runTask(cli, task.name, command.optsWithGlobals<GlobalOptions>());
      });
  }
}
