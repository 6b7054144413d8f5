import { closeAll, openHistoryDb, ProcessCommandRunner } from '@devtasks/core';
import { runCli } from './program.js';

runCli(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
  runner: new ProcessCommandRunner(),
  openHistory: openHistoryDb,
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
})
  .then((code) => {
    closeAll();
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    closeAll();
    process.stderr.write(`devtasks: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exitCode = 1;
  });
