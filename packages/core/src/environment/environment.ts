import { stat } from 'node:fs/promises';
import type { PlatformAdapter } from '../platform/adapter.js';

/** Explicit reference to an isolated interpreter environment */
export interface EnvironmentHandle {
  path: string;
  pythonVersion: string;
}

export function resolveEnvironment(
  projectRoot: string,
  venvDir: string,
  pythonVersion: string,
  adapter: PlatformAdapter,
): EnvironmentHandle {
  return {
    path: adapter.environmentPath(projectRoot, venvDir),
    pythonVersion,
  };
}

/**
 * An environment exists once its interpreter does.
 */
export async function environmentExists(handle: EnvironmentHandle, adapter: PlatformAdapter): Promise<boolean> {
  try {
    const stats = await stat(adapter.executable(handle.path, 'python'));
    return stats.isFile();
  } catch {
    return false;
  }
}
