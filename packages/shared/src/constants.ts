import type { ProjectLayout, TaskName } from './types.js';

/** Every task, in catalog order */
export const TASK_NAMES = [
  'create_venv',
  'install_dependencies',
  'update_dependencies',
  'lint',
  'typecheck',
  'test_unit',
  'build_package',
] as const satisfies readonly TaskName[];

/** Order the orchestrator runs tasks in for each matrix entry */
export const PIPELINE_TASK_ORDER: readonly TaskName[] = [
  'create_venv',
  'install_dependencies',
  'lint',
  'typecheck',
  'test_unit',
];

export const DEFAULT_LAYOUT: ProjectLayout = {
  manifest: 'pyproject.toml',
  venvDir: '.venv',
  runtimeLockFile: 'requirements.txt',
  devLockFile: 'dev-requirements.txt',
  lintPaths: ['src'],
  typecheckPaths: ['src', 'unit_test'],
  testPath: 'unit_test',
  importPath: 'src',
  testReport: 'test-results.xml',
  distDir: 'dist',
};

export const DEFAULT_PYTHON_VERSION = '3.11';

/** Config file names looked up in the project root, in order */
export const CONFIG_FILE_NAMES = ['devtasks.yml', 'devtasks.yaml'];

/** History database, relative to the project root */
export const DEFAULT_HISTORY_DB = '.devtasks/history.db';

/** Packages pip-sync never installs or removes */
export const SYNC_IGNORED_PACKAGES = [
  'pip',
  'pip-tools',
  'setuptools',
  'wheel',
  'pkg-resources',
  'distribute',
];

/** Exit code used when a program cannot be found */
export const EXIT_COMMAND_NOT_FOUND = 127;

/** Exit code for failed in-process steps and unmet preconditions */
export const EXIT_STEP_FAILED = 1;

/** Exit code for usage errors: unknown task, unsupported host */
export const EXIT_USAGE = 2;

/** Exit code for configuration errors (EX_CONFIG) */
export const EXIT_CONFIG = 78;

export const DEFAULT_PULL_REQUEST_TYPES = ['opened', 'reopened', 'synchronize'];
