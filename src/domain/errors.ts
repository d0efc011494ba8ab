/**
 * Error taxonomy for the heartbeat core.
 *
 * Caller-facing: ServiceNotFoundError, DuplicateServiceError,
 * InvalidStatusError; on the client side ApiRequestError and
 * ClientNotConnectedError. The rest are contained by the component that
 * produced them and only ever surface in logs and stored error records.
 */
export type HeartbeatErrorCode =
  | 'SERVICE_NOT_FOUND'
  | 'DUPLICATE_SERVICE'
  | 'INVALID_STATUS'
  | 'STORAGE_UNAVAILABLE'
  | 'NOTIFIER_FAILED'
  | 'COLLABORATOR_TIMEOUT'
  | 'INVALID_CONFIGURATION'
  | 'API_REQUEST_FAILED'
  | 'CLIENT_NOT_CONNECTED';

export abstract class HeartbeatError extends Error {
  abstract readonly code: HeartbeatErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ServiceNotFoundError extends HeartbeatError {
  readonly code = 'SERVICE_NOT_FOUND';

  constructor(readonly serviceId: string) {
    super(`Service ${serviceId} not found`);
  }
}

export class DuplicateServiceError extends HeartbeatError {
  readonly code = 'DUPLICATE_SERVICE';

  constructor(readonly serviceId: string) {
    super(`Service ${serviceId} is already registered`);
  }
}

export class InvalidStatusError extends HeartbeatError {
  readonly code = 'INVALID_STATUS';

  constructor(readonly value: unknown) {
    super(`Invalid heartbeat status: ${JSON.stringify(value) ?? String(value)}`);
  }
}

export class StorageUnavailableError extends HeartbeatError {
  readonly code = 'STORAGE_UNAVAILABLE';
}

export class NotifierError extends HeartbeatError {
  readonly code = 'NOTIFIER_FAILED';

  constructor(readonly notifier: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CollaboratorTimeoutError extends HeartbeatError {
  readonly code = 'COLLABORATOR_TIMEOUT';

  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export class ConfigurationError extends HeartbeatError {
  readonly code = 'INVALID_CONFIGURATION';
}

/** Non-2xx answer from the heartbeat HTTP API, seen by the client. */
export class ApiRequestError extends HeartbeatError {
  readonly code = 'API_REQUEST_FAILED';

  constructor(
    readonly status: number,
    message: string,
    readonly apiCode: string | null = null,
  ) {
    super(message);
  }
}

export class ClientNotConnectedError extends HeartbeatError {
  readonly code = 'CLIENT_NOT_CONNECTED';

  constructor() {
    super('Service not registered; call connect() first');
  }
}

/**
 * Shape handed to Storage.storeError when a collaborator fails.
 */
export interface ErrorRecord {
  readonly error_type: string;
  readonly message: string;
  readonly service_id: string | null;
  readonly metadata: Record<string, unknown>;
  readonly occurred_at: Date;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
