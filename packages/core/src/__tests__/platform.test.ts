import { describe, it, expect } from 'vitest';
import { PosixAdapter, quotePosix } from '../platform/posix.js';
import { WindowsAdapter, quoteCmd } from '../platform/windows.js';
import { createPlatformAdapter, detectPlatform, detectPlatformKind, platformForRunner } from '../platform/detect.js';
import { UnsupportedPlatformError } from '../errors.js';
import { FakeCommandRunner } from './helpers.js';

describe('detectPlatformKind', () => {
  it('prefers OSTYPE over the node platform', () => {
    expect(detectPlatformKind({ OSTYPE: 'linux-gnu' }, 'win32')).toBe('posix');
    expect(detectPlatformKind({ OSTYPE: 'darwin23' }, 'linux')).toBe('posix');
    expect(detectPlatformKind({ OSTYPE: 'msys' }, 'linux')).toBe('windows');
    expect(detectPlatformKind({ OSTYPE: 'cygwin' }, 'linux')).toBe('windows');
  });

  it('falls back to the node platform when OSTYPE is unset', () => {
    expect(detectPlatformKind({}, 'win32')).toBe('windows');
    expect(detectPlatformKind({}, 'linux')).toBe('posix');
    expect(detectPlatformKind({}, 'darwin')).toBe('posix');
  });

  it('rejects an unrecognized OSTYPE', () => {
    expect(() => detectPlatformKind({ OSTYPE: 'haiku' }, 'linux')).toThrow(UnsupportedPlatformError);
    expect(() => detectPlatformKind({ OSTYPE: 'haiku' }, 'linux')).toThrow(
      'Unsupported platform "OSTYPE=haiku": expected a POSIX shell host or Windows',
    );
  });

  it('rejects an unrecognized node platform', () => {
    try {
      detectPlatformKind({}, 'android');
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(UnsupportedPlatformError);
      if (err instanceof UnsupportedPlatformError) {
        expect(err.detected).toBe('android');
        expect(err.exitCode).toBe(2);
      }
    }
  });
});

describe('adapter selection', () => {
  it('creates the adapter for each kind', () => {
    expect(createPlatformAdapter('posix')).toBeInstanceOf(PosixAdapter);
    expect(createPlatformAdapter('windows')).toBeInstanceOf(WindowsAdapter);
    expect(detectPlatform({ OSTYPE: 'msys' }).kind).toBe('windows');
  });

  it('maps CI runner labels to platforms', () => {
    expect(platformForRunner('ubuntu-latest')).toBe('posix');
    expect(platformForRunner('macos-14')).toBe('posix');
    expect(platformForRunner('windows-2022')).toBe('windows');
  });
});

describe('PosixAdapter', () => {
  const adapter = new PosixAdapter();

  it('resolves executables under bin/', () => {
    expect(adapter.environmentPath('/work/app', '.venv')).toBe('/work/app/.venv');
    expect(adapter.executable('/work/app/.venv', 'flake8')).toBe('/work/app/.venv/bin/flake8');
    expect(adapter.interpreterCommand('3.11')).toEqual({ program: 'python3.11', args: [] });
  });

  it('activates by prepending bin to PATH without mutating the input', () => {
    const env = { PATH: '/usr/bin', PYTHONHOME: '/opt/python', HOME: '/home/dev' };
    const activated = adapter.activate(env, '/work/app/.venv');

    expect(activated).toEqual({
      PATH: '/work/app/.venv/bin:/usr/bin',
      VIRTUAL_ENV: '/work/app/.venv',
      HOME: '/home/dev',
    });
    expect(env.PATH).toBe('/usr/bin');
    expect(env.PYTHONHOME).toBe('/opt/python');
  });

  it('sets PATH to bin when PATH is empty', () => {
    expect(adapter.activate({}, '/v')).toEqual({ PATH: '/v/bin', VIRTUAL_ENV: '/v' });
  });

  it('treats an already active environment as active', () => {
    expect(adapter.isActive({ VIRTUAL_ENV: '/work/app/.venv/' }, '/work/app/.venv')).toBe(true);
    expect(adapter.isActive({ VIRTUAL_ENV: '/work/other' }, '/work/app/.venv')).toBe(false);
    expect(adapter.isActive({}, '/work/app/.venv')).toBe(false);

    const env = { PATH: '/usr/bin', VIRTUAL_ENV: '/work/app/.venv' };
    expect(adapter.prepareEnvironment(env, '/work/app/.venv')).toBe(env);
  });

  it('extends the module search path with a colon', () => {
    expect(adapter.extendSearchPath(undefined, 'src')).toBe('src');
    expect(adapter.extendSearchPath('/opt/lib', 'src')).toBe('/opt/lib:src');
  });

  it('runs a command inside the environment', async () => {
    const runner = new FakeCommandRunner();
    await adapter.runCommand(runner, { program: 'pytest', args: ['unit_test'] }, {
      cwd: '/work/app',
      env: { PATH: '/usr/bin', PYTHONPATH: '/opt/lib' },
      venvPath: '/work/app/.venv',
      searchPath: '/work/app/src',
    });

    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0]?.command).toEqual({ program: '/work/app/.venv/bin/pytest', args: ['unit_test'] });
    expect(runner.calls[0]?.options.env).toEqual({
      PATH: '/work/app/.venv/bin:/usr/bin',
      VIRTUAL_ENV: '/work/app/.venv',
      PYTHONPATH: '/opt/lib:/work/app/src',
    });
  });

  it('runs host commands unchanged', async () => {
    const runner = new FakeCommandRunner();
    const env = { PATH: '/usr/bin' };
    await adapter.runCommand(runner, { program: 'python3.11', args: ['-V'] }, { cwd: '/work', env });

    expect(runner.calls[0]?.command).toEqual({ program: 'python3.11', args: ['-V'] });
    expect(runner.calls[0]?.options.env).toBe(env);
  });

  it('quotes only arguments that need it', () => {
    expect(quotePosix('--junit-xml=test-results.xml')).toBe('--junit-xml=test-results.xml');
    expect(quotePosix('my dir')).toBe("'my dir'");
    expect(quotePosix("it's")).toBe("'it'\\''s'");
  });
});

describe('WindowsAdapter', () => {
  const adapter = new WindowsAdapter();

  it('resolves executables under Scripts\\ with .exe', () => {
    expect(adapter.environmentPath('C:\\work\\app', '.venv')).toBe('C:\\work\\app\\.venv');
    expect(adapter.executable('C:\\work\\app\\.venv', 'flake8')).toBe('C:\\work\\app\\.venv\\Scripts\\flake8.exe');
    expect(adapter.interpreterCommand('3.11')).toEqual({ program: 'py', args: ['-3.11'] });
  });

  it('keeps the existing spelling of the Path key', () => {
    const activated = adapter.activate({ Path: 'C:\\Windows' }, 'C:\\work\\.venv');
    expect(activated).toEqual({ Path: 'C:\\work\\.venv\\Scripts;C:\\Windows', VIRTUAL_ENV: 'C:\\work\\.venv' });

    const upper = adapter.activate({ PATH: 'C:\\Windows' }, 'C:\\work\\.venv');
    expect(upper['PATH']).toBe('C:\\work\\.venv\\Scripts;C:\\Windows');
    expect(upper['Path']).toBeUndefined();
  });

  it('compares environment paths case-insensitively', () => {
    expect(adapter.isActive({ VIRTUAL_ENV: 'c:\\WORK\\.VENV\\' }, 'C:\\work\\.venv')).toBe(true);
    expect(adapter.isActive({ VIRTUAL_ENV: 'C:\\other' }, 'C:\\work\\.venv')).toBe(false);
  });

  it('extends the module search path with a semicolon', () => {
    expect(adapter.extendSearchPath('C:\\lib', 'src')).toBe('C:\\lib;src');
  });

  it('quotes arguments for cmd', () => {
    expect(quoteCmd('.venv\\Scripts\\activate.bat')).toBe('.venv\\Scripts\\activate.bat');
    expect(quoteCmd('my dir')).toBe('"my dir"');
    expect(quoteCmd('say "hi"')).toBe('"say ""hi"""');
  });
});
