export { createProgram, runCli } from './program.js';
export type { Cli, CliDeps, CliState, GlobalOptions } from './context.js';
export { formatPipelineReport, formatRunDetail, formatRuns, formatTaskList, formatTaskOutcome } from './output.js';
