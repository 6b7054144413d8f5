import { readFile } from 'node:fs/promises';
import { normalizePackageName } from '@devtasks/shared';
import { LockFileError } from '../errors.js';

/** One pinned requirement from a lock file */
export interface LockEntry {
  name: string;
  normalizedName: string;
  version: string | null;
  url: string | null;
  extras: string[];
  marker: string | null;
  line: number;
}

export interface LockFile {
  path: string;
  entries: LockEntry[];
}

/** pip options that may appear in a compiled lock file and carry no requirement */
const IGNORED_OPTIONS = new Set([
  '--index-url',
  '-i',
  '--extra-index-url',
  '--trusted-host',
  '--find-links',
  '-f',
  '--no-index',
  '--prefer-binary',
  '--only-binary',
  '--no-binary',
  '--pre',
  '--hash',
]);

const INCLUDE_OPTIONS = new Set(['-r', '--requirement', '-c', '--constraint']);
const EDITABLE_OPTIONS = new Set(['-e', '--editable']);

const NAME = '[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?';
const PINNED_RE = new RegExp(`^(${NAME})\\s*(?:\\[([^\\]]*)\\])?\\s*(===?)\\s*([^\\s,;]+)$`);
const DIRECT_RE = new RegExp(`^(${NAME})\\s*(?:\\[([^\\]]*)\\])?\\s*@\\s*(\\S+)$`);

interface LogicalLine {
  text: string;
  line: number;
}

/** Join backslash continuations, drop comments and blank lines. */
function logicalLines(text: string): LogicalLine[] {
  const physical = text.split(/\r?\n/);
  const result: LogicalLine[] = [];

  let buffer = '';
  let startLine = 0;

  for (let i = 0; i < physical.length; i++) {
    const raw = physical[i] ?? '';
    if (buffer === '') startLine = i + 1;

    const withoutComment = raw.replace(/(^|\s)#.*$/, '$1');
    if (withoutComment.trimEnd().endsWith('\\')) {
      buffer += withoutComment.trimEnd().slice(0, -1) + ' ';
      continue;
    }

    buffer += withoutComment;
    const trimmed = buffer.trim();
    if (trimmed) result.push({ text: trimmed, line: startLine });
    buffer = '';
  }

  const rest = buffer.trim();
  if (rest) result.push({ text: rest, line: startLine });

  return result;
}

function parseExtras(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((extra) => extra.trim())
    .filter((extra) => extra.length > 0);
}

function parseRequirement(text: string, path: string, line: number): LockEntry {
  // Hashes trail the requirement: "pkg==1.0 --hash=sha256:..."
  const requirement = text.split(/\s+--hash[=\s]/)[0]?.trim() ?? '';

  const semicolon = requirement.indexOf(';');
  const spec = (semicolon >= 0 ? requirement.slice(0, semicolon) : requirement).trim();
  const marker = semicolon >= 0 ? requirement.slice(semicolon + 1).trim() || null : null;

  const pinned = PINNED_RE.exec(spec);
  if (pinned) {
    const [, name = '', extras, , version = ''] = pinned;
    if (version.includes('*')) {
      throw new LockFileError(path, `"${spec}" uses a wildcard, not an exact version`, line);
    }
    return {
      name,
      normalizedName: normalizePackageName(name),
      version,
      url: null,
      extras: parseExtras(extras),
      marker,
      line,
    };
  }

  const direct = DIRECT_RE.exec(spec);
  if (direct) {
    const [, name = '', extras, url = ''] = direct;
    return {
      name,
      normalizedName: normalizePackageName(name),
      version: null,
      url,
      extras: parseExtras(extras),
      marker,
      line,
    };
  }

  throw new LockFileError(path, `"${spec}" is not pinned to an exact version`, line);
}

/**
 * Parse the text of a compiled lock file. Every requirement must be pinned
 * with == (or ===) or be a direct URL reference.
 */
export function parseLockFile(text: string, path: string): LockFile {
  const entries: LockEntry[] = [];

  for (const { text: content, line } of logicalLines(text)) {
    if (content.startsWith('-')) {
      const option = content.split(/[\s=]/, 1)[0] ?? content;
      if (INCLUDE_OPTIONS.has(option)) {
        throw new LockFileError(path, `"${option}" includes are not allowed in a lock file`, line);
      }
      if (EDITABLE_OPTIONS.has(option)) {
        throw new LockFileError(path, 'editable requirements are not pinned', line);
      }
      if (!IGNORED_OPTIONS.has(option)) {
        throw new LockFileError(path, `unsupported option "${option}"`, line);
      }
      continue;
    }

    entries.push(parseRequirement(content, path, line));
  }

  return { path, entries };
}

export async function readLockFile(path: string): Promise<LockFile> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new LockFileError(path, 'lock file not found');
    }
    throw err;
  }
  return parseLockFile(text, path);
}

export function describeEntry(entry: Pick<LockEntry, 'name' | 'version' | 'url'>): string {
  if (entry.url) return `${entry.name} @ ${entry.url}`;
  return `${entry.name}==${entry.version ?? '?'}`;
}

/**
 * Union of several lock files keyed by normalized name. The same package
 * pinned two different ways is an error.
 */
export function mergeLockFiles(files: LockFile[]): Map<string, LockEntry> {
  const merged = new Map<string, LockEntry>();
  const origin = new Map<string, string>();

  for (const file of files) {
    for (const entry of file.entries) {
      const existing = merged.get(entry.normalizedName);
      if (!existing) {
        merged.set(entry.normalizedName, entry);
        origin.set(entry.normalizedName, file.path);
        continue;
      }
      if (existing.version !== entry.version || existing.url !== entry.url) {
        throw new LockFileError(
          file.path,
          `${describeEntry(entry)} conflicts with ${describeEntry(existing)} from ${origin.get(entry.normalizedName) ?? 'another lock file'}`,
          entry.line,
        );
      }
    }
  }

  return merged;
}
