import type { FailureKind } from './types';

/**
 * Thrown from inside a tool's `apply` to report a classified failure.
 * Any other thrown error is treated as a permanent `error` failure.
 */
export class ToolFailureError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string,
    public readonly options: { transient?: boolean; cause?: unknown } = {},
  ) {
    super(message);
    this.name = 'ToolFailureError';
    this.cause = options.cause;
  }

  declare cause: unknown;
}

export class InvalidToolError extends Error {
  constructor(public readonly toolName: string, message: string) {
    super(`Invalid tool '${toolName}': ${message}`);
    this.name = 'InvalidToolError';
  }
}

export class SearchConfigSchemaError extends Error {
  constructor(public readonly filePath: string, message: string) {
    super(`Invalid search config schema in ${filePath}: ${message}`);
    this.name = 'SearchConfigSchemaError';
  }
}

export class SearchConfigIoError extends Error {
  constructor(public readonly filePath: string, cause: unknown) {
    super(`Failed to read search config file ${filePath}`);
    this.name = 'SearchConfigIoError';
    this.cause = cause;
  }

  declare cause: unknown;
}

export class HintUnavailableError extends Error {
  constructor(public readonly hintSource: string, message: string, cause?: unknown) {
    super(message);
    this.name = 'HintUnavailableError';
    this.cause = cause;
  }

  declare cause: unknown;
}
