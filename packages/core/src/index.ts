export * from './errors.js';
export * from './logger.js';
export * from './config.js';
export * from './platform/adapter.js';
export * from './platform/posix.js';
export * from './platform/windows.js';
export * from './platform/detect.js';
export * from './process/command-runner.js';
export * from './environment/environment.js';
export * from './lockfile/lockfile.js';
export * from './lockfile/sync.js';
export * from './report/junit.js';
export * from './tasks/types.js';
export * from './tasks/catalog.js';
export * from './tasks/task-runner.js';
export * from './pipeline/matrix.js';
export * from './pipeline/semaphore.js';
export * from './pipeline/orchestrator.js';
export * from './render/scripts.js';
export * from './render/workflow.js';
export * from './history/connection.js';
export * from './history/migrations.js';
export * from './history/run-repo.js';
