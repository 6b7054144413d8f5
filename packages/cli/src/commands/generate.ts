import { relative, resolve } from 'node:path';
import type { Command } from 'commander';
import { generateCiFiles } from '@devtasks/core';
import { loadConfig, loadSettings, type Cli, type GlobalOptions } from '../context.js';

export function registerGenerateCommand(program: Command, cli: Cli): void {
  program
    .command('generate')
    .description('Write the CI wrapper scripts and workflow files')
    .option('--out-dir <dir>', 'directory to write into (default: project root)')
    .action(async (options: { outDir?: string }, command: Command) => {
      const { deps } = cli;
      const globals = command.optsWithGlobals<GlobalOptions>();
      const project = loadSettings(deps, globals);
      const { config } = await loadConfig(project, globals);

      const outDir = options.outDir ? resolve(project.root, options.outDir) : project.root;
      const written = await generateCiFiles(outDir, config);

      project.log.info({ outDir, files: written.length }, 'CI files generated');
      deps.stdout(written.map((path) => `${relative(outDir, path)}\n`).join(''));
    });
}
