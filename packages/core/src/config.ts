import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import {
  CONFIG_FILE_NAMES,
  DEFAULT_HISTORY_DB,
  envConfigSchema,
  pipelineConfigSchema,
} from '@devtasks/shared';
import type { EnvConfig, LogLevel, PipelineConfig } from '@devtasks/shared';
import { ConfigError } from './errors.js';

/** Settings resolved from the process environment */
export interface RuntimeSettings {
  logLevel: LogLevel;
  configPath?: string;
  pythonVersion?: string;
  historyEnabled: boolean;
  historyDbPath: string;
}

export interface LoadedConfig {
  config: PipelineConfig;
  /** File the config was read from, or null when defaults were used */
  source: string | null;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read DEVTASKS_* variables. Relative database paths resolve against the
 * project root.
 */
export function loadRuntimeSettings(env: NodeJS.ProcessEnv, projectRoot: string): RuntimeSettings {
  const parsed = envConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment', formatIssues(parsed.error));
  }

  const values: EnvConfig = parsed.data;
  const dbPath = values.DEVTASKS_HISTORY_DB ?? DEFAULT_HISTORY_DB;

  return {
    logLevel: values.DEVTASKS_LOG_LEVEL,
    configPath: values.DEVTASKS_CONFIG,
    pythonVersion: values.DEVTASKS_PYTHON_VERSION,
    historyEnabled: values.DEVTASKS_HISTORY === 'true',
    historyDbPath: isAbsolute(dbPath) ? dbPath : join(projectRoot, dbPath),
  };
}

/**
 * Validate a parsed config document. Throws ConfigError listing every issue.
 */
export function parsePipelineConfig(document: unknown, source: string): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid config in ${source}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

async function readConfigFile(path: string): Promise<PipelineConfig> {
  const raw = await readFile(path, 'utf-8');

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse ${path}: ${message}`);
  }

  return parsePipelineConfig(document, path);
}

/**
 * Load devtasks.yml from the project root, or from an explicit path.
 * An explicit path must exist; the default names are optional.
 */
export async function loadPipelineConfig(projectRoot: string, explicitPath?: string): Promise<LoadedConfig> {
  if (explicitPath) {
    const path = isAbsolute(explicitPath) ? explicitPath : join(projectRoot, explicitPath);
    try {
      return { config: await readConfigFile(path), source: path };
    } catch (err) {
      if (isMissingFile(err)) {
        throw new ConfigError(`Config file not found: ${path}`);
      }
      throw err;
    }
  }

  for (const name of CONFIG_FILE_NAMES) {
    const path = join(projectRoot, name);
    try {
      return { config: await readConfigFile(path), source: path };
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }
  }

  return { config: parsePipelineConfig({}, 'defaults'), source: null };
}

/** Apply the DEVTASKS_PYTHON_VERSION override. */
export function withPythonOverride(config: PipelineConfig, version?: string): PipelineConfig {
  if (!version) return config;
  return { ...config, python: { ...config.python, version } };
}
