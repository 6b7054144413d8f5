import type { EntryReport, PipelineReport, RunRecord, RunStepRecord, TaskOutcome } from '@devtasks/shared';
import type { TaskDefinition } from '@devtasks/core';

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatTaskOutcome(outcome: TaskOutcome): string {
  if (outcome.status === 'passed') {
    return `${outcome.task} passed in ${formatDuration(outcome.durationMs)}\n`;
  }
  const detail = outcome.message ? `: ${outcome.message}` : '';
  return `${outcome.task} failed at ${outcome.failedStep ?? 'unknown step'} with exit code ${outcome.exitCode}${detail}\n`;
}

function formatEntry(report: EntryReport): string {
  switch (report.status) {
    case 'passed':
      return `${report.entry.id}: passed (${report.tasks.length} tasks)`;
    case 'failed': {
      const failed = report.tasks.find((task) => task.status === 'failed');
      return failed
        ? `${report.entry.id}: failed at ${failed.task} with exit code ${failed.exitCode}`
        : `${report.entry.id}: failed`;
    }
    default:
      return `${report.entry.id}: ${report.status} (${report.reason ?? 'no reason given'})`;
  }
}

export function formatPipelineReport(report: PipelineReport): string {
  const count = (status: EntryReport['status']): number =>
    report.entries.filter((entry) => entry.status === status).length;

  const lines = report.entries.map(formatEntry);
  lines.push(
    `pipeline ${report.success ? 'passed' : 'failed'}: ` +
      `${count('passed')} passed, ${count('failed')} failed, ${count('skipped')} skipped, ${count('cancelled')} cancelled`,
  );
  return lines.join('\n') + '\n';
}

export function formatTaskList(tasks: TaskDefinition[]): string {
  const width = Math.max(...tasks.map((task) => task.name.length)) + 2;
  return tasks.map((task) => `${task.name.padEnd(width)}${task.description}\n`).join('');
}

function formatRun(run: RunRecord): string {
  return `${run.id}  ${run.startedAt}  ${run.kind.padEnd(8)}  ${run.success ? 'passed' : 'failed'}  exit ${String(run.exitCode).padEnd(3)}  ${run.label}\n`;
}

export function formatRuns(runs: RunRecord[]): string {
  if (runs.length === 0) return 'No runs recorded\n';
  return runs.map(formatRun).join('');
}

function formatStep(step: RunStepRecord): string {
  const prefix = step.entryId ? `[${step.entryId}] ` : '';
  switch (step.status) {
    case 'passed':
      return step.durationMs === null
        ? `${prefix}${step.task}: passed`
        : `${prefix}${step.task}: passed in ${formatDuration(step.durationMs)}`;
    case 'failed':
      return `${prefix}${step.task}: failed at ${step.failedStep ?? 'unknown step'} with exit code ${step.exitCode ?? 'unknown'}`;
    default:
      return `${prefix}${step.task}: ${step.status}`;
  }
}

/** One run followed by its recorded task outcomes, indented */
export function formatRunDetail(run: RunRecord, steps: RunStepRecord[]): string {
  if (steps.length === 0) return `${formatRun(run)}  no tasks ran\n`;
  return formatRun(run) + steps.map((step) => `  ${formatStep(step)}\n`).join('');
}
