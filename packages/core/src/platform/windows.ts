import { win32 } from 'node:path';
import type { CommandSpec } from '@devtasks/shared';
import { BasePlatformAdapter, type ScriptSpec } from './adapter.js';

const SAFE_ARG = /^[A-Za-z0-9_@+=:,.\\/-]+$/;

export function quoteCmd(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `"${arg.replace(/"/g, '""')}"`;
}

function commandLine(command: CommandSpec): string {
  return [command.program, ...command.args].map(quoteCmd).join(' ');
}

/** Absolute environment path for an `if /i` comparison; scripts run from the project root */
function targetEnvironment(venvDir: string): string {
  return `%CD%\\${win32.normalize(venvDir).replace(/\\+$/, '')}`;
}

/** Windows: Scripts\ layout, `;` separator, the py launcher, batch scripts. */
export class WindowsAdapter extends BasePlatformAdapter {
  readonly kind = 'windows' as const;
  readonly pathDelimiter = ';';
  readonly scriptDir = 'win32';
  readonly scriptExtension = '.cmd';

  environmentPath(projectRoot: string, venvDir: string): string {
    return win32.join(projectRoot, venvDir);
  }

  binDir(venvPath: string): string {
    return win32.join(venvPath, 'Scripts');
  }

  executable(venvPath: string, name: string): string {
    return win32.join(this.binDir(venvPath), `${name}.exe`);
  }

  interpreterCommand(version: string): CommandSpec {
    return { program: 'py', args: [`-${version}`] };
  }

  defaultInterpreter(): CommandSpec {
    return { program: 'python', args: [] };
  }

  // Windows env keys are case-insensitive; keep whichever spelling exists.
  protected pathKey(env: NodeJS.ProcessEnv): string {
    return Object.keys(env).find((key) => key.toUpperCase() === 'PATH') ?? 'Path';
  }

  protected canonicalDir(dir: string): string {
    const normalized = win32.normalize(dir).toLowerCase();
    return /^[a-z]:\\$/.test(normalized) ? normalized : normalized.replace(/\\+$/, '');
  }

  renderScript(script: ScriptSpec): string {
    const lines = [
      '@echo off',
      `rem ${script.description}`,
      'rem Generated by devtasks. Do not edit by hand.',
      '',
    ];

    let activated = false;
    for (const { command, useEnvironment, searchPath } of script.commands) {
      if (useEnvironment && !activated) {
        const activate = win32.join(script.venvDir, 'Scripts', 'activate.bat');
        lines.push(`if /i not "%VIRTUAL_ENV%"=="${targetEnvironment(script.venvDir)}" call ${quoteCmd(activate)}`);
        activated = true;
      }
      if (searchPath) {
        lines.push(`set "PYTHONPATH=%PYTHONPATH%;${win32.normalize(searchPath)}"`);
      }
      lines.push(`${commandLine(command)} || exit /b`);
    }

    return lines.join('\r\n') + '\r\n';
  }
}
