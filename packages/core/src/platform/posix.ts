import { posix } from 'node:path';
import type { CommandSpec } from '@devtasks/shared';
import { BasePlatformAdapter, type ScriptSpec } from './adapter.js';

const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function quotePosix(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

function commandLine(command: CommandSpec): string {
  return [command.program, ...command.args].map(quotePosix).join(' ');
}

/** Absolute environment path as a double-quoted shell word; scripts run from the project root */
function targetEnvironment(venvDir: string): string {
  const dir = posix.normalize(venvDir).replace(/\/+$/, '');
  return `"$PWD/${dir.replace(/["$`\\]/g, '\\$&')}"`;
}

/** Linux, macOS and the BSDs: bin/ layout, `:` separator, bash scripts. */
export class PosixAdapter extends BasePlatformAdapter {
  readonly kind = 'posix' as const;
  readonly pathDelimiter = ':';
  readonly scriptDir = 'linux';
  readonly scriptExtension = '.sh';

  environmentPath(projectRoot: string, venvDir: string): string {
    return posix.join(projectRoot, venvDir);
  }

  binDir(venvPath: string): string {
    return posix.join(venvPath, 'bin');
  }

  executable(venvPath: string, name: string): string {
    return posix.join(this.binDir(venvPath), name);
  }

  interpreterCommand(version: string): CommandSpec {
    return { program: `python${version}`, args: [] };
  }

  defaultInterpreter(): CommandSpec {
    return { program: 'python3', args: [] };
  }

  protected pathKey(): string {
    return 'PATH';
  }

  protected canonicalDir(dir: string): string {
    const normalized = posix.normalize(dir);
    return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized;
  }

  renderScript(script: ScriptSpec): string {
    const lines = [
      '#!/bin/bash',
      `# ${script.description}`,
      '# Generated by devtasks. Do not edit by hand.',
      'set -e',
      '',
    ];

    let activated = false;
    for (const { command, useEnvironment, searchPath } of script.commands) {
      if (useEnvironment && !activated) {
        lines.push(
          `if [ "$VIRTUAL_ENV" != ${targetEnvironment(script.venvDir)} ]; then`,
          `  . ${quotePosix(posix.join(script.venvDir, 'bin', 'activate'))}`,
          'fi',
        );
        activated = true;
      }
      const prefix = searchPath ? `PYTHONPATH="$PYTHONPATH:${searchPath}" ` : '';
      lines.push(`${prefix}${commandLine(command)}`);
    }

    return lines.join('\n') + '\n';
  }
}
