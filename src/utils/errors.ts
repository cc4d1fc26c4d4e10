/**
 * Error types shared by the client, the config layer and the exchange queue
 */

export type HandoffErrorKind =
  | 'NotConfigured'
  | 'InsufficientPermission'
  | 'TaskNotFound'
  | 'AlreadyClaimed'
  | 'LostRace'
  | 'NotClaimedByCaller'
  | 'RemoteUnavailable';

export type HandoffOperation = 'check' | 'setup' | 'claim' | 'complete';

/**
 * Non-2xx response from the Vikunja API
 */
export class VikunjaApiError extends Error {
  constructor(
    readonly status: number,
    readonly apiMessage: string
  ) {
    super(`Vikunja API error (${status}): ${apiMessage}`);
    this.name = 'VikunjaApiError';
  }
}

/**
 * Missing or invalid configuration (instances, tokens, X-Q mappings)
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class HandoffError extends Error {
  readonly kind: HandoffErrorKind;
  readonly operation: HandoffOperation;
  readonly taskId?: number;

  constructor(
    operation: HandoffOperation,
    kind: HandoffErrorKind,
    detail: string,
    options: { taskId?: number; cause?: unknown } = {}
  ) {
    const target = options.taskId !== undefined ? ` for task ${options.taskId}` : '';
    super(`${operation} failed${target}: [${kind}] ${detail}`, { cause: options.cause });
    this.name = 'HandoffError';
    this.kind = kind;
    this.operation = operation;
    this.taskId = options.taskId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map anything thrown below the queue onto the handoff taxonomy.
 * `taskRead` marks calls where a 404 means the task itself is missing.
 */
export function toHandoffError(
  operation: HandoffOperation,
  error: unknown,
  options: { taskId?: number; taskRead?: boolean } = {}
): HandoffError {
  if (error instanceof HandoffError) {
    return error;
  }

  const { taskId } = options;

  if (error instanceof ConfigError) {
    return new HandoffError(operation, 'NotConfigured', error.message, { taskId, cause: error });
  }

  if (error instanceof VikunjaApiError) {
    if (error.status === 401 || error.status === 403) {
      return new HandoffError(operation, 'InsufficientPermission', error.message, {
        taskId,
        cause: error,
      });
    }
    if (error.status === 404 && options.taskRead) {
      return new HandoffError(operation, 'TaskNotFound', error.message, { taskId, cause: error });
    }
  }

  return new HandoffError(operation, 'RemoteUnavailable', errorMessage(error), {
    taskId,
    cause: error,
  });
}
