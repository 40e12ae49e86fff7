export type ErrorContext = Record<string, unknown>;

export class LedgerError extends Error {
  public readonly code: string;
  public readonly userMessage: string;
  public readonly context?: ErrorContext;
  public readonly isRetryable: boolean;

  constructor(
    message: string,
    code: string = 'UNKNOWN_ERROR',
    userMessage?: string,
    context?: ErrorContext,
    isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    this.userMessage = userMessage || 'Something went wrong. Please try again.';
    this.context = context;
    this.isRetryable = isRetryable;
  }
}

export class AuthorizationError extends LedgerError {
  constructor(message: string, caller?: string, entryPoint?: string) {
    super(
      message,
      'AUTHORIZATION_ERROR',
      'You are not permitted to perform this action.',
      { caller, entryPoint },
      false
    );
    this.name = 'AuthorizationError';
  }
}

export class StateError extends LedgerError {
  constructor(message: string, context?: ErrorContext) {
    super(
      message,
      'STATE_ERROR',
      `Action not allowed right now: ${message}`,
      context,
      false
    );
    this.name = 'StateError';
  }
}

export class ValidationError extends LedgerError {
  constructor(message: string, field?: string, value?: unknown) {
    super(
      message,
      'VALIDATION_ERROR',
      `Invalid input: ${message}`,
      { field, value },
      false
    );
    this.name = 'ValidationError';
  }
}

export class TransferError extends LedgerError {
  constructor(message: string, context?: ErrorContext) {
    super(
      message,
      'TRANSFER_ERROR',
      'The transfer could not be completed.',
      context,
      false
    );
    this.name = 'TransferError';
  }
}

export class DatabaseError extends LedgerError {
  constructor(message: string, operation?: string, context?: ErrorContext) {
    super(
      message,
      'DATABASE_ERROR',
      'Database operation failed. Please try again.',
      { operation, ...context },
      true
    );
    this.name = 'DatabaseError';
  }
}

export function formatErrorForUser(error: unknown): string {
  if (error instanceof LedgerError) {
    return error.userMessage;
  }

  // Don't expose internal errors to users
  return 'An unexpected error occurred. Please try again.';
}

export function formatErrorForLogging(error: unknown, context?: ErrorContext): ErrorContext {
  const baseInfo = {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    name: error instanceof Error ? error.name : 'Unknown',
    ...context
  };

  if (error instanceof LedgerError) {
    return {
      ...baseInfo,
      code: error.code,
      userMessage: error.userMessage,
      context: error.context,
      isRetryable: error.isRetryable
    };
  }

  return baseInfo;
}
