import type { Command } from 'commander';
import { listTasks } from '@devtasks/core';
import type { Cli } from '../context.js';
import { formatTaskList } from '../output.js';

export function registerTasksCommand(program: Command, cli: Cli): void {
  program
    .command('tasks')
    .description('List the available tasks')
    .action(() => {
      cli.deps.stdout(formatTaskList(listTasks()));
    });
}
