import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';

const { mockSpawn } = vi.hoisted(() => ({ mockSpawn: vi.fn() }));

vi.mock('node:child_process', () => ({ spawn: mockSpawn }));

import { ProcessCommandRunner, signalExitCode } from '../process/command-runner.js';

class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('ProcessCommandRunner', () => {
  let child: FakeChild;

  beforeEach(() => {
    child = new FakeChild();
    mockSpawn.mockReset();
    mockSpawn.mockReturnValue(child);
  });

  it('spawns the program without a shell and inherits stdio', async () => {
    const runner = new ProcessCommandRunner();
    const result = runner.run({ program: 'flake8', args: ['src'] }, { cwd: '/work/app', env: { PATH: '/usr/bin' } });

    child.emit('close', 0, null);

    expect(await result).toEqual({ exitCode: 0, stdout: '' });
    expect(mockSpawn).toHaveBeenCalledWith('flake8', ['src'], {
      cwd: '/work/app',
      env: { PATH: '/usr/bin' },
      stdio: 'inherit',
      windowsHide: true,
    });
  });

  it('passes the exit code through', async () => {
    const result = new ProcessCommandRunner().run({ program: 'pytest', args: [] }, { cwd: '/work', env: {} });
    child.emit('close', 4, null);
    expect((await result).exitCode).toBe(4);
  });

  it('reports a missing program as 127', async () => {
    const result = new ProcessCommandRunner().run({ program: 'python3.99', args: [] }, { cwd: '/work', env: {} });
    child.emit('error', Object.assign(new Error('spawn python3.99 ENOENT'), { code: 'ENOENT' }));
    expect((await result).exitCode).toBe(127);
  });

  it('rejects on other spawn errors', async () => {
    const result = new ProcessCommandRunner().run({ program: 'pytest', args: [] }, { cwd: '/work', env: {} });
    child.emit('error', Object.assign(new Error('spawn EACCES'), { code: 'EACCES' }));
    await expect(result).rejects.toThrow('spawn EACCES');
  });

  it('maps a terminating signal to 128 plus its number', async () => {
    const result = new ProcessCommandRunner().run({ program: 'pytest', args: [] }, { cwd: '/work', env: {} });
    child.emit('close', null, 'SIGTERM');
    expect((await result).exitCode).toBe(143);
    expect(signalExitCode('SIGKILL')).toBe(137);
  });

  it('captures stdout when asked', async () => {
    const result = new ProcessCommandRunner().run(
      { program: 'python', args: ['-m', 'pip', 'freeze'] },
      { cwd: '/work', env: {}, capture: true },
    );

    child.stdout.end('pika==1.3.2\npytest==8.0.0\n');
    await nextTick();
    child.emit('close', 0, null);

    expect(await result).toEqual({ exitCode: 0, stdout: 'pika==1.3.2\npytest==8.0.0\n' });
    expect(mockSpawn.mock.calls[0]?.[2]).toMatchObject({ stdio: ['inherit', 'pipe', 'inherit'] });
  });

  it('forwards output line by line', async () => {
    const lines: Array<[string, string]> = [];
    const result = new ProcessCommandRunner().run(
      { program: 'flake8', args: ['src'] },
      { cwd: '/work', env: {}, onOutput: (line, stream) => lines.push([line, stream]) },
    );

    child.stdout.end('src/a.py:1:1: F401\nsrc/b.py:2:1: E302\n');
    child.stderr.end('warning\n');
    await nextTick();
    await nextTick();
    child.emit('close', 1, null);

    expect((await result).exitCode).toBe(1);
    expect(lines.filter(([, stream]) => stream === 'stdout')).toEqual([
      ['src/a.py:1:1: F401', 'stdout'],
      ['src/b.py:2:1: E302', 'stdout'],
    ]);
    expect(lines.filter(([, stream]) => stream === 'stderr')).toEqual([['warning', 'stderr']]);
    expect(mockSpawn.mock.calls[0]?.[2]).toMatchObject({ stdio: ['inherit', 'pipe', 'pipe'] });
  });
});
