/**
 * HIL Plan Runner - Custom Error Classes
 *
 * Every error carries the process exit code the CLIs report for it.
 */

export interface ErrorContext {
  operation: string;
  timestamp: Date;
  path?: string;
  suggestion?: string;
  [key: string]: unknown;
}

export class HilRunnerError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly context: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    exitCode: number,
    context?: Partial<ErrorContext>,
    isOperational = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = exitCode;
    this.context = {
      operation: context?.operation || 'unknown',
      timestamp: new Date(),
      ...(context || {}),
    };
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      context: this.context,
    };
  }
}

// Document and configuration errors: fatal before any test runs
export class ConfigurationError extends HilRunnerError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'CONFIGURATION_ERROR', 1, context);
  }
}

export class DocumentNotFoundError extends ConfigurationError {
  constructor(kind: string, filePath: string, context?: Partial<ErrorContext>) {
    super(`${kind} file "${filePath}" does not exist`, {
      ...context,
      path: filePath,
      kind,
    });
  }
}

export class ValidationError extends HilRunnerError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Partial<ErrorContext>) {
    super(message, 'VALIDATION_ERROR', 1, { ...context, issues });
    this.issues = issues;
  }
}

// Command line misuse
export class UsageError extends HilRunnerError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'USAGE_ERROR', 2, context);
  }
}

// External tool could not be started
export class ToolInvocationError extends HilRunnerError {
  constructor(command: string, message: string, context?: Partial<ErrorContext>) {
    super(`Failed to run "${command}": ${message}`, 'TOOL_INVOCATION_ERROR', 1, {
      ...context,
      command,
    });
  }
}

export class InternalError extends HilRunnerError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'INTERNAL_ERROR', 1, context, false);
  }
}

export function isHilRunnerError(error: unknown): error is HilRunnerError {
  return error instanceof HilRunnerError;
}

export function handleError(error: unknown): HilRunnerError {
  if (isHilRunnerError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, {
      operation: 'unknown',
      originalError: error.name,
      stack: error.stack,
    });
  }

  return new InternalError('An unexpected error occurred', {
    operation: 'unknown',
    originalError: String(error),
  });
}
