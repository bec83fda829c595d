/**
 * ManagedStoreError - Tagged failure raised by every managed-store operation
 *
 * The failure kind decides how callers react:
 * - validation: bad input, never retryable
 * - not-found: principal missing on the managed store, never retryable
 * - permission-operation: GRANT/REVOKE failed, retryable when the cause is transient
 * - operation: any other managed-store failure, retryable when the cause is transient
 */
export type ManagedStoreFailureKind =
  | 'validation'
  | 'not-found'
  | 'permission-operation'
  | 'operation';

export interface ManagedStoreFailure {
  kind: ManagedStoreFailureKind;
  code: string;
  message: string;
  retryable: boolean;
  cause?: unknown;
}

const TRANSIENT_MESSAGE_SIGNATURES = [
  'connection refused',
  'communications link failure',
  'timeout',
  'lock wait timeout',
  'deadlock',
];

const TRANSIENT_DRIVER_CODES = new Set([
  'ECONNREFUSED',
  'ETIMEDOUT',
  'PROTOCOL_CONNECTION_LOST',
  'ER_LOCK_WAIT_TIMEOUT',
  'ER_LOCK_DEADLOCK',
]);

function driverCodeOf(cause: object): string | undefined {
  if ('code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/**
 * Whether a driver error looks like a connection or locking hiccup that may
 * succeed on another attempt.
 */
export function isTransientCause(cause: unknown): boolean {
  if (!(cause instanceof Error)) {
    return false;
  }

  const code = driverCodeOf(cause);
  if (code && TRANSIENT_DRIVER_CODES.has(code)) {
    return true;
  }

  const message = cause.message.toLowerCase();
  return TRANSIENT_MESSAGE_SIGNATURES.some((signature) =>
    message.includes(signature),
  );
}

export class ManagedStoreError extends Error {
  readonly failure: ManagedStoreFailure;

  constructor(failure: ManagedStoreFailure) {
    super(failure.message);
    this.name = 'ManagedStoreError';
    this.failure = failure;

    Object.setPrototypeOf(this, ManagedStoreError.prototype);
  }

  get kind(): ManagedStoreFailureKind {
    return this.failure.kind;
  }

  get code(): string {
    return this.failure.code;
  }

  get retryable(): boolean {
    return this.failure.retryable;
  }

  static validation(message: string): ManagedStoreError {
    return new ManagedStoreError({
      kind: 'validation',
      code: 'VALIDATION_ERROR',
      message,
      retryable: false,
    });
  }

  static invalidIdentifier(identifier: string, reason: string): ManagedStoreError {
    return ManagedStoreError.validation(
      `Invalid identifier '${identifier}': ${reason}`,
    );
  }

  static invalidResource(resourceName: string, reason: string): ManagedStoreError {
    return ManagedStoreError.validation(
      `Invalid resource name '${resourceName}': ${reason}`,
    );
  }

  static invalidTimeRange(reason: string): ManagedStoreError {
    return ManagedStoreError.validation(`Invalid time range: ${reason}`);
  }

  static missingParameter(parameterName: string): ManagedStoreError {
    return ManagedStoreError.validation(
      `Required parameter '${parameterName}' is null or empty`,
    );
  }

  static principalNotFound(name: string, host: string): ManagedStoreError {
    return new ManagedStoreError({
      kind: 'not-found',
      code: 'PRINCIPAL_NOT_FOUND',
      message: `Managed store principal '${name}'@'${host}' not found`,
      retryable: false,
    });
  }

  static grantFailed(
    name: string,
    resourceName: string,
    cause: unknown,
  ): ManagedStoreError {
    return new ManagedStoreError({
      kind: 'permission-operation',
      code: 'PERMISSION_ERROR',
      message: `Failed to grant permission on '${resourceName}' to principal '${name}'`,
      retryable: isTransientCause(cause),
      cause,
    });
  }

  static revokeFailed(
    name: string,
    resourceName: string,
    cause: unknown,
  ): ManagedStoreError {
    return new ManagedStoreError({
      kind: 'permission-operation',
      code: 'PERMISSION_ERROR',
      message: `Failed to revoke permission on '${resourceName}' from principal '${name}'`,
      retryable: isTransientCause(cause),
      cause,
    });
  }

  /**
   * Creating or dropping a revoke event. Retrying is safe since scheduling
   * always drops the event before creating it.
   */
  static scheduleFailed(
    eventName: string,
    cause: unknown,
    message = `Failed to schedule revoke event '${eventName}'`,
  ): ManagedStoreError {
    return new ManagedStoreError({
      kind: 'permission-operation',
      code: 'PERMISSION_ERROR',
      message,
      retryable: isTransientCause(cause),
      cause,
    });
  }

  /**
   * Anything not characterized above. Never retried.
   */
  static operationFailed(
    message: string,
    cause: unknown,
    code = 'OPERATION_ERROR',
  ): ManagedStoreError {
    return new ManagedStoreError({
      kind: 'operation',
      code,
      message,
      retryable: false,
      cause,
    });
  }
}

/**
 * Normalize anything thrown by a managed-store call into a failure value.
 * Errors that did not come from this layer are terminal.
 */
export function classifyFailure(error: unknown): ManagedStoreFailure {
  if (error instanceof ManagedStoreError) {
    return error.failure;
  }

  return {
    kind: 'operation',
    code: 'UNEXPECTED_ERROR',
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
    cause: error,
  };
}

/**
 * Run a managed-store call, passing ManagedStoreErrors through and turning
 * anything else the driver throws into the failure built by `toError`.
 */
export async function guardManagedStoreCall<T>(
  call: () => Promise<T>,
  toError: (cause: unknown) => ManagedStoreError,
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof ManagedStoreError) {
      throw error;
    }
    throw toError(error);
  }
}
