import { chmod, mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { PipelineConfig, TaskName } from '@devtasks/shared';
import type { PlatformAdapter, ScriptCommand, ScriptSpec } from '../platform/adapter.js';
import { PosixAdapter } from '../platform/posix.js';
import { WindowsAdapter } from '../platform/windows.js';
import { expandMatrix } from '../pipeline/matrix.js';
import { listTasks } from '../tasks/catalog.js';
import type { StepContext, TaskDefinition } from '../tasks/types.js';
import { renderWorkflow } from './workflow.js';

/**
 * Describe a task as a standalone script. Paths stay relative to the
 * repository root and the interpreter is whatever the CI job put on PATH.
 * In-process steps have no script form and are left out.
 */
export function buildScriptSpec(task: TaskDefinition, config: PipelineConfig, adapter: PlatformAdapter): ScriptSpec {
  const layout = config.project;
  const context: StepContext = {
    projectRoot: '.',
    layout,
    environment: {
      path: adapter.environmentPath('.', layout.venvDir),
      pythonVersion: config.python.version,
    },
    adapter,
    interpreter: adapter.defaultInterpreter(),
    upgradeDependencies: config.dependencies.upgrade,
  };

  const commands: ScriptCommand[] = [];
  for (const step of task.steps(context)) {
    if (step.kind !== 'command') continue;
    commands.push({ command: step.command, useEnvironment: step.useEnvironment, searchPath: step.searchPath });
  }

  return { task: task.name, description: task.description, venvDir: layout.venvDir, commands };
}

export function scriptPath(adapter: PlatformAdapter, task: TaskName): string {
  return join('ci', adapter.scriptDir, `${task}${adapter.scriptExtension}`);
}

export interface GeneratedFile {
  path: string;
  content: string;
  executable: boolean;
}

/**
 * Every wrapper script for both platforms, plus one workflow per platform
 * that the matrix targets.
 */
export function renderCiFiles(config: PipelineConfig): GeneratedFile[] {
  const adapters: PlatformAdapter[] = [new PosixAdapter(), new WindowsAdapter()];
  const platforms = new Set(expandMatrix(config.matrix).map((entry) => entry.platform));
  const files: GeneratedFile[] = [];

  for (const adapter of adapters) {
    for (const task of listTasks()) {
      files.push({
        path: scriptPath(adapter, task.name),
        content: adapter.renderScript(buildScriptSpec(task, config, adapter)),
        executable: adapter.kind === 'posix',
      });
    }

    if (platforms.has(adapter.kind)) {
      files.push({
        path: join('.github', 'workflows', `ci_${adapter.scriptDir}.yml`),
        content: renderWorkflow(config, adapter),
        executable: false,
      });
    }
  }

  return files;
}

/** Write the generated files under outDir and return their paths. */
export async function generateCiFiles(outDir: string, config: PipelineConfig): Promise<string[]> {
  const written: string[] = [];

  for (const file of renderCiFiles(config)) {
    const target = join(outDir, file.path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, file.content, 'utf-8');
    if (file.executable) {
      await chmod(target, 0o755);
    }
    written.push(target);
  }

  return written;
}
