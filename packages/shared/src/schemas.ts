import { z } from 'zod';
import {
  DEFAULT_LAYOUT,
  DEFAULT_PULL_REQUEST_TYPES,
  DEFAULT_PYTHON_VERSION,
} from './constants.js';

const relativePathSchema = z
  .string()
  .min(1, 'Path must not be empty')
  .refine((p) => !/^([a-zA-Z]:)?[\\/]/.test(p), 'Path must be relative to the project root');

const pythonVersionSchema = z
  .string()
  .regex(/^\d+\.\d+$/, 'Python version must look like 3.11');

const runnerLabelSchema = z
  .string()
  .regex(/^(ubuntu|macos|windows)-/, 'OS must be an ubuntu-*, macos-* or windows-* runner label');

export const projectLayoutSchema = z.object({
  manifest: relativePathSchema.default(DEFAULT_LAYOUT.manifest),
  venvDir: relativePathSchema.default(DEFAULT_LAYOUT.venvDir),
  runtimeLockFile: relativePathSchema.default(DEFAULT_LAYOUT.runtimeLockFile),
  devLockFile: relativePathSchema.default(DEFAULT_LAYOUT.devLockFile),
  lintPaths: z.array(relativePathSchema).min(1).default(DEFAULT_LAYOUT.lintPaths),
  typecheckPaths: z.array(relativePathSchema).min(1).default(DEFAULT_LAYOUT.typecheckPaths),
  testPath: relativePathSchema.default(DEFAULT_LAYOUT.testPath),
  importPath: relativePathSchema.default(DEFAULT_LAYOUT.importPath),
  testReport: relativePathSchema.default(DEFAULT_LAYOUT.testReport),
  distDir: relativePathSchema.default(DEFAULT_LAYOUT.distDir),
});

export const matrixSchema = z.object({
  os: z.array(runnerLabelSchema).min(1).default(['ubuntu-latest']),
  python: z.array(pythonVersionSchema).min(1).default([DEFAULT_PYTHON_VERSION]),
  exclude: z
    .array(z.object({ os: runnerLabelSchema.optional(), python: pythonVersionSchema.optional() }))
    .default([]),
  failFast: z.boolean().default(true),
  maxParallel: z.number().int().min(1).max(32).default(1),
});

export const pipelineConfigSchema = z.object({
  project: projectLayoutSchema.default({}),
  python: z
    .object({
      version: pythonVersionSchema.default(DEFAULT_PYTHON_VERSION),
    })
    .default({}),
  dependencies: z
    .object({
      upgrade: z.boolean().default(false),
    })
    .default({}),
  matrix: matrixSchema.default({}),
  pipeline: z
    .object({
      includeBuild: z.boolean().default(false),
    })
    .default({}),
  triggers: z
    .object({
      pullRequest: z.array(z.string().min(1)).min(1).default(DEFAULT_PULL_REQUEST_TYPES),
    })
    .default({}),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
export type MatrixConfig = z.infer<typeof matrixSchema>;

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/** Variables read from the process environment */
export const envConfigSchema = z.object({
  DEVTASKS_LOG_LEVEL: logLevelSchema.default('info'),
  DEVTASKS_CONFIG: z.string().min(1).optional(),
  DEVTASKS_PYTHON_VERSION: pythonVersionSchema.optional(),
  DEVTASKS_HISTORY: z.enum(['true', 'false']).default('true'),
  DEVTASKS_HISTORY_DB: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;
