/**
 * Error kinds raised by the adapter. Configuration problems are fatal at
 * startup; the rest surface at the call site that hit them.
 */

export class ImproperlyConfiguredError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImproperlyConfiguredError';
  }
}

/** Raised before any network call when an operation is not in the allow-list. */
export class UnsupportedOperationError extends Error {
  readonly operation: string;

  constructor(operation: string) {
    super(`Unsupported Telegram operation: ${operation}`);
    this.name = 'UnsupportedOperationError';
    this.operation = operation;
  }
}

export class TelegramApiError extends Error {
  readonly operation: string;
  readonly errorCode: number | null;

  constructor(operation: string, description?: string, errorCode?: number) {
    super(`Telegram ${operation} failed: ${description ?? 'no description'}`);
    this.name = 'TelegramApiError';
    this.operation = operation;
    this.errorCode = errorCode ?? null;
  }
}

export class InvalidUpdateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidUpdateError';
  }
}
