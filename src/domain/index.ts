export type { HeartbeatStatus, NotificationLevel } from './status.js';
export {
  HEARTBEAT_STATUSES,
  NOMINAL_STATUS,
  isHeartbeatStatus,
  parseHeartbeatStatus,
  notificationLevelFor,
} from './status.js';
export type { HeartbeatEvent, ServiceRecord, ServiceMetadata, ServiceSummary } from './service.js';
export type { HeartbeatErrorCode, ErrorRecord } from './errors.js';
export {
  HeartbeatError,
  ServiceNotFoundError,
  DuplicateServiceError,
  InvalidStatusError,
  StorageUnavailableError,
  NotifierError,
  CollaboratorTimeoutError,
  ConfigurationError,
  ApiRequestError,
  ClientNotConnectedError,
  errorMessage,
} from './errors.js';
