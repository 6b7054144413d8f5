/** The fixed set of pipeline tasks */
export type TaskName =
  | 'create_venv'
  | 'install_dependencies'
  | 'update_dependencies'
  | 'lint'
  | 'typecheck'
  | 'test_unit'
  | 'build_package';

export type PlatformKind = 'posix' | 'windows';

/** Repository-relative paths the tasks operate on */
export interface ProjectLayout {
  manifest: string;
  venvDir: string;
  runtimeLockFile: string;
  devLockFile: string;
  lintPaths: string[];
  typecheckPaths: string[];
  testPath: string;
  importPath: string;
  testReport: string;
  distDir: string;
}

/** A program and its arguments, run without a shell */
export interface CommandSpec {
  program: string;
  args: string[];
}

export type StepStatus = 'passed' | 'failed' | 'skipped';

export interface StepOutcome {
  label: string;
  status: StepStatus;
  exitCode: number | null;
  message?: string;
}

export type TaskStatus = 'passed' | 'failed';

/** Result of running one task to completion or to its first failure */
export interface TaskOutcome {
  task: TaskName;
  status: TaskStatus;
  exitCode: number;
  durationMs: number;
  steps: StepOutcome[];
  failedStep?: string;
  message?: string;
}

/** One cell of the OS x interpreter matrix */
export interface MatrixEntry {
  id: string;
  os: string;
  platform: PlatformKind;
  python: string;
}

export type EntryStatus = 'passed' | 'failed' | 'skipped' | 'cancelled';

export interface EntryReport {
  entry: MatrixEntry;
  status: EntryStatus;
  tasks: TaskOutcome[];
  reason?: string;
}

export interface PipelineReport {
  startedAt: string;
  finishedAt: string;
  success: boolean;
  entries: EntryReport[];
}

/** Counts read back from a JUnit XML report */
export interface TestReportSummary {
  tests: number;
  failures: number;
  errors: number;
  skipped: number;
  passed: number;
}

export type RunKind = 'task' | 'pipeline';

/** A stored CLI run */
export interface RunRecord {
  id: string;
  kind: RunKind;
  label: string;
  platform: PlatformKind;
  success: boolean;
  exitCode: number;
  startedAt: string;
  finishedAt: string;
}

/** A stored task result belonging to a run */
export interface RunStepRecord {
  runId: string;
  entryId: string | null;
  task: TaskName;
  status: TaskStatus | 'skipped';
  exitCode: number | null;
  durationMs: number | null;
  failedStep: string | null;
}
