import { InvalidArgumentError, type Command } from 'commander';
import { PipelineOrchestrator, pipelineExitCode, recordPipelineRun } from '@devtasks/core';
import type { EntryOutputListener } from '@devtasks/core';
import { loadProject, recordHistory, type Cli, type GlobalOptions } from '../context.js';
import { formatPipelineReport } from '../output.js';

interface PipelineCommandOptions {
  parallel?: number;
  build?: boolean;
  failFast: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function registerPipelineCommand(program: Command, cli: Cli): void {
  program
    .command('pipeline')
    .description('Run create_venv, install_dependencies, lint, typecheck and test_unit for each matrix entry of this host')
    .option('--parallel <n>', 'matrix entries to run at once', parsePositiveInt)
    .option('--build', 'append build_package to the task order')
    .option('--no-fail-fast', 'keep running entries after one fails')
    .action(async (options: PipelineCommandOptions, command: Command) => {
      const { deps } = cli;
      const project = await loadProject(deps, command.optsWithGlobals<GlobalOptions>());
      const maxParallel = options.parallel ?? project.config.matrix.maxParallel;

      // Interleaved output from parallel entries is tagged line by line
      const onOutput: EntryOutputListener | undefined =
        maxParallel > 1
          ? (entryId, line, stream) => (stream === 'stdout' ? deps.stdout : deps.stderr)(`[${entryId}] ${line}\n`)
          : undefined;

      const orchestrator = new PipelineOrchestrator({
        projectRoot: project.root,
        config: project.config,
        adapter: project.adapter,
        runner: deps.runner,
        env: deps.env,
        includeBuild: options.build ? true : undefined,
        maxParallel,
        failFast: command.getOptionValueSource('failFast') === 'cli' ? options.failFast : undefined,
        log: project.log,
        onOutput,
      });

      const report = await orchestrator.run();
      const exitCode = pipelineExitCode(report);

      recordHistory(deps, project, (db) => {
        recordPipelineRun(db, report, project.adapter.kind, exitCode);
      });

      deps.stdout(formatPipelineReport(report));
      cli.state.exitCode = exitCode;
    });
}
