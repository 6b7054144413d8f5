import type { PlatformKind } from '@devtasks/shared';
import { UnsupportedPlatformError } from '../errors.js';
import type { PlatformAdapter } from './adapter.js';
import { PosixAdapter } from './posix.js';
import { WindowsAdapter } from './windows.js';

const POSIX_OSTYPES = ['linux', 'darwin', 'freebsd', 'openbsd', 'netbsd', 'solaris'];
const WINDOWS_OSTYPES = ['msys', 'cygwin', 'win32'];

const POSIX_PLATFORMS: readonly string[] = ['linux', 'darwin', 'freebsd', 'openbsd', 'netbsd', 'sunos', 'aix'];

/**
 * Decide the platform kind. OSTYPE (as exported by bash and MSYS) wins over
 * the Node platform; an unrecognized value is an error, never a silent
 * fallback.
 */
export function detectPlatformKind(env: NodeJS.ProcessEnv, platform: string = process.platform): PlatformKind {
  const ostype = env['OSTYPE'];

  if (ostype) {
    const value = ostype.toLowerCase();
    if (POSIX_OSTYPES.some((prefix) => value.startsWith(prefix))) return 'posix';
    if (WINDOWS_OSTYPES.some((prefix) => value.startsWith(prefix))) return 'windows';
    throw new UnsupportedPlatformError(`OSTYPE=${ostype}`);
  }

  if (platform === 'win32') return 'windows';
  if (POSIX_PLATFORMS.includes(platform)) return 'posix';
  throw new UnsupportedPlatformError(platform);
}

export function createPlatformAdapter(kind: PlatformKind): PlatformAdapter {
  return kind === 'windows' ? new WindowsAdapter() : new PosixAdapter();
}

/** Select the adapter for this host. Call once at startup. */
export function detectPlatform(env: NodeJS.ProcessEnv, platform: string = process.platform): PlatformAdapter {
  return createPlatformAdapter(detectPlatformKind(env, platform));
}

/** Platform kind a CI runner label provides. */
export function platformForRunner(os: string): PlatformKind {
  return os.toLowerCase().startsWith('windows') ? 'windows' : 'posix';
}
