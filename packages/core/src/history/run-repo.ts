import type Database from 'better-sqlite3';
import type {
  PipelineReport,
  PlatformKind,
  RunKind,
  RunRecord,
  RunStepRecord,
  TaskName,
  TaskOutcome,
} from '@devtasks/shared';
import { TASK_NAMES } from '@devtasks/shared';

interface RunRow {
  id: string;
  kind: string;
  label: string;
  platform: string;
  success: number;
  exit_code: number;
  started_at: string;
  finished_at: string;
}

interface RunStepRow {
  run_id: string;
  entry_id: string | null;
  task: string;
  status: string;
  exit_code: number | null;
  duration_ms: number | null;
  failed_step: string | null;
}

interface NewRun {
  kind: RunKind;
  label: string;
  platform: PlatformKind;
  success: boolean;
  exitCode: number;
  startedAt: string;
  finishedAt: string;
}

interface NewStep {
  entryId: string | null;
  outcome: TaskOutcome;
}

const taskNames: readonly string[] = TASK_NAMES;

function toTaskName(value: string): TaskName {
  const name = TASK_NAMES.find((task) => task === value);
  if (!name) throw new Error(`Unknown task in history: ${value}`);
  return name;
}

function rowToRun(row: RunRow): RunRecord {
  return {
    id: row.id,
    kind: row.kind === 'pipeline' ? 'pipeline' : 'task',
    label: row.label,
    platform: row.platform === 'windows' ? 'windows' : 'posix',
    success: row.success === 1,
    exitCode: row.exit_code,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

function rowToStep(row: RunStepRow): RunStepRecord {
  const status = row.status === 'passed' || row.status === 'failed' ? row.status : 'skipped';
  return {
    runId: row.run_id,
    entryId: row.entry_id,
    task: toTaskName(row.task),
    status,
    exitCode: row.exit_code,
    durationMs: row.duration_ms,
    failedStep: row.failed_step,
  };
}

function insertRun(db: Database.Database, run: NewRun, steps: NewStep[]): RunRecord {
  const insert = db.transaction((): RunRow => {
    const row = db
      .prepare<[string, string, string, number, number, string, string], RunRow>(
        `INSERT INTO runs (kind, label, platform, success, exit_code, started_at, finished_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         RETURNING *`,
      )
      .get(run.kind, run.label, run.platform, run.success ? 1 : 0, run.exitCode, run.startedAt, run.finishedAt);
    if (!row) throw new Error('Failed to insert run');

    const insertStep = db.prepare<[string, string | null, string, string, number | null, number | null, string | null]>(
      `INSERT INTO run_steps (run_id, entry_id, task, status, exit_code, duration_ms, failed_step)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );
    for (const { entryId, outcome } of steps) {
      insertStep.run(
        row.id,
        entryId,
        outcome.task,
        outcome.status,
        outcome.exitCode,
        outcome.durationMs,
        outcome.failedStep ?? null,
      );
    }

    return row;
  });

  return rowToRun(insert());
}

/**
 * Record a single task invocation.
 */
export function recordTaskRun(
  db: Database.Database,
  outcome: TaskOutcome,
  platform: PlatformKind,
  startedAt: string,
  finishedAt: string,
): RunRecord {
  return insertRun(
    db,
    {
      kind: 'task',
      label: outcome.task,
      platform,
      success: outcome.status === 'passed',
      exitCode: outcome.exitCode,
      startedAt,
      finishedAt,
    },
    [{ entryId: null, outcome }],
  );
}

/**
 * Record a pipeline run with every task outcome of every entry that ran.
 */
export function recordPipelineRun(
  db: Database.Database,
  report: PipelineReport,
  platform: PlatformKind,
  exitCode: number,
): RunRecord {
  const steps: NewStep[] = report.entries.flatMap((entry) =>
    entry.tasks.map((outcome) => ({ entryId: entry.entry.id, outcome })),
  );

  return insertRun(
    db,
    {
      kind: 'pipeline',
      label: report.entries.map((entry) => entry.entry.id).join(','),
      platform,
      success: report.success,
      exitCode,
      startedAt: report.startedAt,
      finishedAt: report.finishedAt,
    },
    steps,
  );
}

/**
 * Most recent runs first.
 */
export function listRuns(db: Database.Database, limit = 20): RunRecord[] {
  const rows = db
    .prepare<[number], RunRow>(`SELECT * FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ?`)
    .all(limit);
  return rows.map(rowToRun);
}

export function getRun(db: Database.Database, runId: string): RunRecord | undefined {
  const row = db.prepare<[string], RunRow>(`SELECT * FROM runs WHERE id = ?`).get(runId);
  return row ? rowToRun(row) : undefined;
}

/**
 * Task outcomes of one run, in the order they were recorded.
 */
export function getRunSteps(db: Database.Database, runId: string): RunStepRecord[] {
  const rows = db
    .prepare<[string], RunStepRow>(
      `SELECT run_id, entry_id, task, status, exit_code, duration_ms, failed_step
       FROM run_steps WHERE run_id = ? ORDER BY id ASC`,
    )
    .all(runId);
  return rows.filter((row) => taskNames.includes(row.task)).map(rowToStep);
}
