import { ERROR_MESSAGES, EXIT_CODES } from "../constants";

export class AutoSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class GitError extends AutoSyncError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, `GIT_${code}`, cause);
  }
}

/**
 * A git subcommand exited with a non-zero status.
 */
export class GitCommandError extends GitError {
  constructor(
    public readonly command: string,
    public readonly details: string,
    cause?: Error,
  ) {
    super(`${command}: ${details}`, "COMMAND_FAILED", cause);
  }
}

export class ConfigError extends AutoSyncError {
  public readonly exitCode: number = EXIT_CODES.FAILURE;

  constructor(message: string, code: string, cause?: Error) {
    super(message, `CONFIG_${code}`, cause);
  }
}

export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Invalid configuration for '${field}': ${reason}`, "VALIDATION_FAILED");
  }
}

export class NotARepositoryError extends ConfigError {
  public readonly exitCode: number = EXIT_CODES.NOT_A_REPOSITORY;

  constructor(public readonly path: string) {
    super(`${ERROR_MESSAGES.NOT_A_REPOSITORY}: ${path}`, "NOT_A_REPOSITORY");
  }
}

/**
 * Extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
