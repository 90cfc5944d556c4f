export enum MessagingErrorType {
  UNAUTHENTICATED = 'UNAUTHENTICATED',
  EMPTY_MESSAGE = 'EMPTY_MESSAGE',
  UNAUTHORIZED = 'UNAUTHORIZED',
  NOT_FOUND = 'NOT_FOUND',
  INVALID_RECIPIENT = 'INVALID_RECIPIENT',
  INVALID_REPORT = 'INVALID_REPORT',
  STORE_ERROR = 'STORE_ERROR',
}

export const MESSAGING_ERROR_MESSAGES: Record<MessagingErrorType, string> = {
  [MessagingErrorType.UNAUTHENTICATED]: 'You need to be signed in to do this',
  [MessagingErrorType.EMPTY_MESSAGE]: 'Message text cannot be empty',
  [MessagingErrorType.UNAUTHORIZED]: 'You are not allowed to change this conversation or message',
  [MessagingErrorType.NOT_FOUND]: 'The conversation or message no longer exists',
  [MessagingErrorType.INVALID_RECIPIENT]: 'Pick another person to message',
  [MessagingErrorType.INVALID_REPORT]: 'This report is missing a valid reason or target',
  [MessagingErrorType.STORE_ERROR]: 'Something went wrong while talking to the server',
};

// Firestore error codes worth retrying as-is.
const RETRYABLE_STORE_CODES = new Set([
  'aborted',
  'cancelled',
  'deadline-exceeded',
  'internal',
  'resource-exhausted',
  'unavailable',
]);

export class MessagingError extends Error {
  readonly type: MessagingErrorType;
  readonly canRetry: boolean;

  constructor(type: MessagingErrorType, message?: string, options: { cause?: unknown; canRetry?: boolean } = {}) {
    super(message || MESSAGING_ERROR_MESSAGES[type], { cause: options.cause });
    this.name = 'MessagingError';
    this.type = type;
    this.canRetry = options.canRetry ?? false;
  }
}

export const createMessagingError = (
  type: MessagingErrorType,
  originalError?: unknown,
  customMessage?: string,
): MessagingError => new MessagingError(type, customMessage, { cause: originalError });

export function isMessagingError(value: unknown, type?: MessagingErrorType): value is MessagingError {
  if (!(value instanceof MessagingError)) return false;
  return type === undefined || value.type === type;
}

function errorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  const { code } = error;
  return typeof code === 'string' ? code : null;
}

/**
 * Wraps a backend failure. Messaging errors pass through untouched so a
 * store that already classified the failure is not double-wrapped.
 */
export function toStoreError(error: unknown, context?: string): MessagingError {
  if (error instanceof MessagingError) return error;

  const code = errorCode(error);
  const detail = error instanceof Error ? error.message : typeof error === 'string' ? error : '';
  const message = [context, detail].filter(Boolean).join(': ') || undefined;

  return new MessagingError(MessagingErrorType.STORE_ERROR, message, {
    cause: error,
    canRetry: code !== null && RETRYABLE_STORE_CODES.has(code.replace(/^firestore\//, '')),
  });
}
