import { rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { TASK_NAMES } from '@devtasks/shared';
import type { TaskName } from '@devtasks/shared';
import { UnknownTaskError } from '../errors.js';
import { mergeLockFiles, readLockFile } from '../lockfile/lockfile.js';
import { diffInstalled, formatSyncDiff, isInSync, parseFreeze } from '../lockfile/sync.js';
import { readJunitSummary } from '../report/junit.js';
import type { InternalStep, StepContext, TaskContext, TaskDefinition } from './types.js';

function lockFilePaths(context: StepContext): string[] {
  return [
    join(context.projectRoot, context.layout.runtimeLockFile),
    join(context.projectRoot, context.layout.devLockFile),
  ];
}

const validateLockFiles: InternalStep = {
  kind: 'internal',
  label: 'validate lock files',
  async run(context) {
    const files = await Promise.all(lockFilePaths(context).map(readLockFile));
    const merged = mergeLockFiles(files);
    return { ok: true, message: `${merged.size} pinned packages` };
  },
};

const verifyInstalledSet: InternalStep = {
  kind: 'internal',
  label: 'verify installed set',
  async run(context: TaskContext) {
    const result = await context.adapter.runCommand(
      context.runner,
      { program: 'python', args: ['-m', 'pip', 'freeze'] },
      { cwd: context.projectRoot, env: context.env, venvPath: context.environment.path, capture: true },
    );
    if (result.exitCode !== 0) {
      return { ok: false, message: `pip freeze exited with code ${result.exitCode}` };
    }

    const files = await Promise.all(lockFilePaths(context).map(readLockFile));
    const diff = diffInstalled(mergeLockFiles(files), parseFreeze(result.stdout));
    if (!isInSync(diff)) {
      return { ok: false, message: `environment does not match the lock files: ${formatSyncDiff(diff)}` };
    }
    return { ok: true, message: 'environment matches the lock files' };
  },
};

const removeStaleReport: InternalStep = {
  kind: 'internal',
  label: 'remove stale test report',
  async run(context) {
    await rm(join(context.projectRoot, context.layout.testReport), { force: true });
    return { ok: true, message: 'removed' };
  },
};

const readTestReport: InternalStep = {
  kind: 'internal',
  label: 'read test report',
  async run(context) {
    const summary = await readJunitSummary(join(context.projectRoot, context.layout.testReport));
    context.log.info({ ...summary }, 'Test report');
    return {
      ok: true,
      message: `${summary.tests} tests: ${summary.passed} passed, ${summary.failures} failed, ${summary.errors} errors, ${summary.skipped} skipped`,
    };
  },
};

const requireManifest: InternalStep = {
  kind: 'internal',
  label: 'check manifest',
  async run(context) {
    const path = join(context.projectRoot, context.layout.manifest);
    const stats = await stat(path).catch(() => null);
    if (stats?.isFile()) return { ok: true, message: path };
    return { ok: false, message: `project manifest not found: ${path}` };
  },
};

function upgradeFlag(context: StepContext): string[] {
  return context.upgradeDependencies ? ['--upgrade'] : [];
}

const definitions: Record<TaskName, TaskDefinition> = {
  create_venv: {
    name: 'create_venv',
    description: 'Create a fresh virtual environment and install pip-tools into it',
    requiresEnvironment: false,
    steps: (context) => [
      {
        kind: 'command',
        label: 'create environment',
        command: {
          program: context.interpreter.program,
          args: [...context.interpreter.args, '-m', 'venv', '--clear', context.environment.path],
        },
        useEnvironment: false,
      },
      {
        kind: 'command',
        label: 'install pip-tools',
        command: { program: 'pip', args: ['install', 'pip-tools'] },
        useEnvironment: true,
      },
    ],
  },

  install_dependencies: {
    name: 'install_dependencies',
    description: 'Install exactly the locked runtime and development dependencies',
    requiresEnvironment: true,
    steps: (context) => [
      validateLockFiles,
      {
        kind: 'command',
        label: 'sync environment',
        command: {
          program: 'pip-sync',
          args: [context.layout.runtimeLockFile, context.layout.devLockFile],
        },
        useEnvironment: true,
      },
      verifyInstalledSet,
    ],
  },

  update_dependencies: {
    name: 'update_dependencies',
    description: 'Regenerate the runtime and development lock files from the manifest',
    requiresEnvironment: true,
    steps: (context) => [
      {
        kind: 'command',
        label: 'lock runtime dependencies',
        command: {
          program: 'pip-compile',
          args: [...upgradeFlag(context), `--output-file=${context.layout.runtimeLockFile}`, context.layout.manifest],
        },
        useEnvironment: true,
      },
      {
        kind: 'command',
        label: 'lock development dependencies',
        command: {
          program: 'pip-compile',
          args: [
            ...upgradeFlag(context),
            '--extra=dev',
            `--output-file=${context.layout.devLockFile}`,
            context.layout.manifest,
          ],
        },
        useEnvironment: true,
      },
      validateLockFiles,
    ],
  },

  lint: {
    name: 'lint',
    description: 'Check code style with flake8',
    requiresEnvironment: true,
    steps: (context) => [
      {
        kind: 'command',
        label: 'flake8',
        command: { program: 'flake8', args: [...context.layout.lintPaths] },
        useEnvironment: true,
      },
    ],
  },

  typecheck: {
    name: 'typecheck',
    description: 'Type-check the source and test trees with mypy',
    requiresEnvironment: true,
    steps: (context) => [
      {
        kind: 'command',
        label: 'mypy',
        command: { program: 'python', args: ['-m', 'mypy', ...context.layout.typecheckPaths] },
        useEnvironment: true,
      },
    ],
  },

  test_unit: {
    name: 'test_unit',
    description: 'Run the unit tests and write a JUnit XML report',
    requiresEnvironment: true,
    steps: (context) => [
      removeStaleReport,
      {
        kind: 'command',
        label: 'pytest',
        command: {
          program: 'pytest',
          args: [`--junit-xml=${context.layout.testReport}`, context.layout.testPath],
        },
        useEnvironment: true,
        searchPath: context.layout.importPath,
      },
      readTestReport,
    ],
  },

  build_package: {
    name: 'build_package',
    description: 'Build source and wheel distributions',
    requiresEnvironment: true,
    steps: (context) => [
      requireManifest,
      {
        kind: 'command',
        label: 'build',
        command: { program: 'python', args: ['-m', 'build', '--outdir', context.layout.distDir] },
        useEnvironment: true,
      },
    ],
  },
};

const taskNames: readonly string[] = TASK_NAMES;

export function isTaskName(name: string): name is TaskName {
  return taskNames.includes(name);
}

export function getTask(name: string): TaskDefinition {
  if (!isTaskName(name)) throw new UnknownTaskError(name);
  return definitions[name];
}

export function listTasks(): TaskDefinition[] {
  return TASK_NAMES.map((name) => definitions[name]);
}
