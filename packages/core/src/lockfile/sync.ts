import { normalizePackageName, SYNC_IGNORED_PACKAGES } from '@devtasks/shared';
import { describeEntry, type LockEntry } from './lockfile.js';

/** A distribution reported by `pip freeze` */
export interface InstalledPackage {
  name: string;
  version: string | null;
  url: string | null;
}

export interface VersionMismatch {
  name: string;
  expected: string;
  installed: string;
}

export interface SyncDiff {
  missing: string[];
  extra: string[];
  mismatched: VersionMismatch[];
}

const FREEZE_PINNED_RE = /^([A-Za-z0-9][A-Za-z0-9._-]*)\s*===?\s*(\S+)$/;
const FREEZE_DIRECT_RE = /^([A-Za-z0-9][A-Za-z0-9._-]*)\s*@\s*(\S+)$/;

const IGNORED = new Set(SYNC_IGNORED_PACKAGES.map(normalizePackageName));

/**
 * Parse `pip freeze` output into a map keyed by normalized name.
 * Editable installs and pip's own comment lines are skipped.
 */
export function parseFreeze(output: string): Map<string, InstalledPackage> {
  const installed = new Map<string, InstalledPackage>();

  for (const raw of output.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#') || line.startsWith('-e ') || line.startsWith('--editable')) continue;

    const pinned = FREEZE_PINNED_RE.exec(line);
    if (pinned) {
      const [, name = '', version = ''] = pinned;
      installed.set(normalizePackageName(name), { name, version, url: null });
      continue;
    }

    const direct = FREEZE_DIRECT_RE.exec(line);
    if (direct) {
      const [, name = '', url = ''] = direct;
      installed.set(normalizePackageName(name), { name, version: null, url });
    }
  }

  return installed;
}

function describeInstalled(pkg: InstalledPackage): string {
  return pkg.url ? `${pkg.name} @ ${pkg.url}` : `${pkg.name}==${pkg.version ?? '?'}`;
}

/**
 * Compare the installed set with the lock union. Requirements with an
 * environment marker may be absent, since the marker may exclude this host.
 */
export function diffInstalled(
  expected: Map<string, LockEntry>,
  installed: Map<string, InstalledPackage>,
): SyncDiff {
  const missing: string[] = [];
  const extra: string[] = [];
  const mismatched: VersionMismatch[] = [];

  for (const [key, entry] of expected) {
    if (IGNORED.has(key)) continue;

    const actual = installed.get(key);
    if (!actual) {
      if (!entry.marker) missing.push(describeEntry(entry));
      continue;
    }

    const sameVersion = entry.version !== null && entry.version === actual.version;
    const sameUrl = entry.url !== null && entry.url === actual.url;
    if (!sameVersion && !sameUrl) {
      mismatched.push({ name: entry.name, expected: describeEntry(entry), installed: describeInstalled(actual) });
    }
  }

  for (const [key, pkg] of installed) {
    if (IGNORED.has(key) || expected.has(key)) continue;
    extra.push(describeInstalled(pkg));
  }

  missing.sort();
  extra.sort();
  mismatched.sort((a, b) => a.name.localeCompare(b.name));

  return { missing, extra, mismatched };
}

export function isInSync(diff: SyncDiff): boolean {
  return diff.missing.length === 0 && diff.extra.length === 0 && diff.mismatched.length === 0;
}

export function formatSyncDiff(diff: SyncDiff): string {
  const parts: string[] = [];
  if (diff.missing.length > 0) parts.push(`missing: ${diff.missing.join(', ')}`);
  if (diff.extra.length > 0) parts.push(`not in lock files: ${diff.extra.join(', ')}`);
  if (diff.mismatched.length > 0) {
    parts.push(`wrong version: ${diff.mismatched.map((m) => `${m.installed} (want ${m.expected})`).join(', ')}`);
  }
  return parts.join('; ');
}
