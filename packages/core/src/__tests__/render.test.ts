import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'yaml';
import { pipelineConfigSchema } from '@devtasks/shared';
import { PosixAdapter } from '../platform/posix.js';
import { WindowsAdapter } from '../platform/windows.js';
import { getTask } from '../tasks/catalog.js';
import { buildScriptSpec, generateCiFiles, renderCiFiles, scriptPath } from '../render/scripts.js';
import { renderWorkflow } from '../render/workflow.js';
import { createTempDir, removeTempDir } from './helpers.js';

const posix = new PosixAdapter();
const windows = new WindowsAdapter();
const defaults = pipelineConfigSchema.parse({});

function renderTask(adapter: PosixAdapter | WindowsAdapter, task: string): string {
  return adapter.renderScript(buildScriptSpec(getTask(task), defaults, adapter));
}

describe('wrapper scripts', () => {
  it('renders a POSIX script that activates the environment only when needed', () => {
    expect(renderTask(posix, 'lint')).toBe(
      [
        '#!/bin/bash',
        '# Check code style with flake8',
        '# Generated by devtasks. Do not edit by hand.',
        'set -e',
        '',
        'if [ "$VIRTUAL_ENV" != "$PWD/.venv" ]; then',
        '  . .venv/bin/activate',
        'fi',
        'flake8 src',
        '',
      ].join('\n'),
    );
  });

  it('creates the environment with the interpreter on PATH before activating it', () => {
    expect(renderTask(posix, 'create_venv')).toBe(
      [
        '#!/bin/bash',
        '# Create a fresh virtual environment and install pip-tools into it',
        '# Generated by devtasks. Do not edit by hand.',
        'set -e',
        '',
        'python3 -m venv --clear .venv',
        'if [ "$VIRTUAL_ENV" != "$PWD/.venv" ]; then',
        '  . .venv/bin/activate',
        'fi',
        'pip install pip-tools',
        '',
      ].join('\n'),
    );
  });

  it('sets the import path for the unit tests', () => {
    expect(renderTask(posix, 'test_unit').split('\n').slice(8)).toEqual([
      'PYTHONPATH="$PYTHONPATH:src" pytest --junit-xml=test-results.xml unit_test',
      '',
    ]);
  });

  it('renders a Windows batch script with CRLF endings and per-command exit checks', () => {
    expect(renderTask(windows, 'test_unit')).toBe(
      [
        '@echo off',
        'rem Run the unit tests and write a JUnit XML report',
        'rem Generated by devtasks. Do not edit by hand.',
        '',
        'if /i not "%VIRTUAL_ENV%"=="%CD%\\.venv" call .venv\\Scripts\\activate.bat',
        'set "PYTHONPATH=%PYTHONPATH%;src"',
        'pytest --junit-xml=test-results.xml unit_test || exit /b',
        '',
      ].join('\r\n'),
    );
  });

  it('activates unless the project environment itself is active', () => {
    const config = pipelineConfigSchema.parse({ project: { venvDir: 'envs/dev/' } });

    const sh = posix.renderScript(buildScriptSpec(getTask('lint'), config, posix)).split('\n');
    expect(sh.slice(5, 8)).toEqual([
      'if [ "$VIRTUAL_ENV" != "$PWD/envs/dev" ]; then',
      '  . envs/dev/bin/activate',
      'fi',
    ]);

    const cmd = windows.renderScript(buildScriptSpec(getTask('lint'), config, windows)).split('\r\n');
    expect(cmd[4]).toBe('if /i not "%VIRTUAL_ENV%"=="%CD%\\envs\\dev" call envs\\dev\\Scripts\\activate.bat');
  });

  it('escapes shell metacharacters in the compared path', () => {
    const config = pipelineConfigSchema.parse({ project: { venvDir: 'env$HOME' } });
    const sh = posix.renderScript(buildScriptSpec(getTask('lint'), config, posix)).split('\n');

    expect(sh[5]).toBe('if [ "$VIRTUAL_ENV" != "$PWD/env\\$HOME" ]; then');
  });

  it('uses the same tool invocations on both platforms', () => {
    for (const task of ['install_dependencies', 'update_dependencies', 'lint', 'typecheck', 'test_unit', 'build_package']) {
      const left = buildScriptSpec(getTask(task), defaults, posix).commands;
      const right = buildScriptSpec(getTask(task), defaults, windows).commands;
      expect(left).toEqual(right);
    }
  });

  it('leaves in-process checks out of scripts', () => {
    const spec = buildScriptSpec(getTask('install_dependencies'), defaults, posix);
    expect(spec.commands.map((command) => command.command.program)).toEqual(['pip-sync']);
  });

  it('places scripts by platform', () => {
    expect(scriptPath(posix, 'lint')).toBe(join('ci', 'linux', 'lint.sh'));
    expect(scriptPath(windows, 'lint')).toBe(join('ci', 'win32', 'lint.cmd'));
  });
});

describe('renderWorkflow', () => {
  it('runs the Windows scripts across the Windows labels', () => {
    const config = pipelineConfigSchema.parse({
      matrix: {
        os: ['ubuntu-latest', 'windows-latest'],
        python: ['3.10', '3.11'],
        exclude: [{ os: 'windows-latest', python: '3.10' }, { os: 'ubuntu-latest', python: '3.11' }],
      },
    });

    const workflow = parse(renderWorkflow(config, windows));

    expect(workflow.name).toBe('Build-Test-Lint (win32)');
    expect(workflow.on).toEqual({ pull_request: { types: ['opened', 'reopened', 'synchronize'] } });
    expect(workflow.jobs.build['runs-on']).toBe('${{ matrix.os }}');
    expect(workflow.jobs.build.strategy).toEqual({
      'fail-fast': true,
      matrix: {
        os: ['windows-latest'],
        'python-version': ['3.10', '3.11'],
        exclude: [{ os: 'windows-latest', 'python-version': '3.10' }],
      },
    });
    expect(workflow.jobs.build.steps.map((step: { run?: string }) => step.run ?? null)).toEqual([
      null,
      null,
      '.\\ci\\win32\\create_venv.cmd\n.\\ci\\win32\\install_dependencies.cmd\n',
      '.\\ci\\win32\\lint.cmd',
      '.\\ci\\win32\\test_unit.cmd',
      '.\\ci\\win32\\typecheck.cmd',
    ]);
  });

  it('adds the build step when the pipeline includes it', () => {
    const config = pipelineConfigSchema.parse({ pipeline: { includeBuild: true } });
    const workflow = parse(renderWorkflow(config, posix));

    expect(workflow.jobs.build.strategy.matrix).toEqual({ os: ['ubuntu-latest'], 'python-version': ['3.11'] });
    expect(workflow.jobs.build.steps.at(-1)).toEqual({ name: 'Build package', run: './ci/linux/build_package.sh' });
  });
});

describe('CI files', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir('devtasks-render');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('renders scripts for both platforms and workflows for targeted ones', () => {
    const paths = renderCiFiles(defaults).map((file) => file.path);

    expect(paths).toHaveLength(15);
    expect(paths).toContain(join('ci', 'linux', 'create_venv.sh'));
    expect(paths).toContain(join('ci', 'win32', 'build_package.cmd'));
    expect(paths).toContain(join('.github', 'workflows', 'ci_linux.yml'));
    expect(paths).not.toContain(join('.github', 'workflows', 'ci_win32.yml'));
  });

  it('writes files and marks POSIX scripts executable', async () => {
    const written = await generateCiFiles(dir, defaults);

    expect(written).toHaveLength(15);
    const lint = join(dir, 'ci', 'linux', 'lint.sh');
    expect(readFileSync(lint, 'utf-8')).toBe(renderTask(posix, 'lint'));
    expect(statSync(lint).mode & 0o111).toBe(0o111);
  });
});
