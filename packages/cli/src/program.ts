import { Command, CommanderError } from 'commander';
import { DevtasksError } from '@devtasks/core';
import { EXIT_USAGE } from '@devtasks/shared';
import type { Cli, CliDeps, CliState } from './context.js';
import { registerGenerateCommand } from './commands/generate.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerPipelineCommand } from './commands/pipeline.js';
import { registerTaskCommands } from './commands/task.js';
import { registerTasksCommand } from './commands/tasks.js';

/**
 * Build the command tree. Subcommands inherit exitOverride and the output
 * configuration, so nothing in here calls process.exit.
 */
export function createProgram(deps: CliDeps, state: CliState): Command {
  const program = new Command('devtasks')
    .description('Cross-platform runner for the Python SDK development pipeline')
    .option('--cwd <dir>', 'project root (default: current directory)')
    .option('--config <file>', 'config file (default: devtasks.yml in the project root)')
    .exitOverride()
    .configureOutput({
      writeOut: deps.stdout,
      writeErr: deps.stderr,
    });

  const cli: Cli = { deps, state };
  registerTaskCommands(program, cli);
  registerPipelineCommand(program, cli);
  registerTasksCommand(program, cli);
  registerHistoryCommand(program, cli);
  registerGenerateCommand(program, cli);

  return program;
}

/**
 * Run the CLI and resolve with the process exit code. Tool failures come
 * back as their exit code; runner errors print their message first.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const state: CliState = { exitCode: 0 };
  const program = createProgram(deps, state);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return state.exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander has already printed its own message
      return err.code === 'commander.unknownCommand' ? EXIT_USAGE : err.exitCode;
    }
    if (err instanceof DevtasksError) {
      deps.stderr(`devtasks: ${err.message}\n`);
      return err.exitCode;
    }
    throw err;
  }
}
