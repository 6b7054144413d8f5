import type { Command } from 'commander';
import { DevtasksError, getRun, getRunSteps, listRuns } from '@devtasks/core';
import { EXIT_USAGE } from '@devtasks/shared';
import { loadSettings, type Cli, type GlobalOptions } from '../context.js';
import { formatRunDetail, formatRuns } from '../output.js';
import { parsePositiveInt } from './pipeline.js';

interface HistoryOptions {
  limit: number;
  run?: string;
}

export function registerHistoryCommand(program: Command, cli: Cli): void {
  program
    .command('history')
    .description('Show recent task and pipeline runs')
    .option('--limit <n>', 'number of runs to show', parsePositiveInt, 20)
    .option('--run <id>', 'show the task outcomes of one run')
    .action((options: HistoryOptions, command: Command) => {
      const { deps } = cli;
      const project = loadSettings(deps, command.optsWithGlobals<GlobalOptions>());

      if (!project.settings.historyEnabled) {
        deps.stdout('Run history is disabled (DEVTASKS_HISTORY=false)\n');
        return;
      }

      const db = deps.openHistory(project.settings.historyDbPath);

      if (options.run !== undefined) {
        const run = getRun(db, options.run);
        if (!run) {
          throw new DevtasksError(`No recorded run with id "${options.run}"`, EXIT_USAGE);
        }
        deps.stdout(formatRunDetail(run, getRunSteps(db, run.id)));
        return;
      }

      deps.stdout(formatRuns(listRuns(db, options.limit)));
    });
}
