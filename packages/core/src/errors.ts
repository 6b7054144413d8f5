import { EXIT_CONFIG, EXIT_USAGE } from '@devtasks/shared';

/** Base class for failures of the runner itself, as opposed to tool failures */
export class DevtasksError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends DevtasksError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message, EXIT_CONFIG);
    this.issues = issues;
  }
}

export class UnsupportedPlatformError extends DevtasksError {
  readonly detected: string;

  constructor(detected: string) {
    super(`Unsupported platform "${detected}": expected a POSIX shell host or Windows`, EXIT_USAGE);
    this.detected = detected;
  }
}

export class UnknownTaskError extends DevtasksError {
  constructor(name: string) {
    super(`Unknown task "${name}"`, EXIT_USAGE);
  }
}

export class LockFileError extends DevtasksError {
  readonly path: string;
  readonly line?: number;

  constructor(path: string, message: string, line?: number) {
    super(line !== undefined ? `${path}:${line}: ${message}` : `${path}: ${message}`);
    this.path = path;
    this.line = line;
  }
}

export class ReportError extends DevtasksError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.path = path;
  }
}
