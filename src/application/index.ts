export { ServiceRegistry, REGISTERED_MESSAGE } from './service-registry.js';
export type { ServiceRegistryOptions } from './service-registry.js';
export type { Storage, Notifier } from './ports.js';
export { EventLog, DEFAULT_EVENT_LOG_CAPACITY } from './event-log.js';
export { KeyedLock } from './keyed-lock.js';
export { withTimeout, DEFAULT_COLLABORATOR_TIMEOUT_MS } from './with-timeout.js';
export {
  createNotificationDispatcher,
  shouldNotify,
  buildStatusNotification,
} from './notification-dispatcher.js';
export type {
  StatusChangeDispatcher,
  StatusNotification,
  DispatchOutcome,
  NotificationDispatcherOptions,
} from './notification-dispatcher.js';
export {
  StaleDetector,
  findStaleServices,
  staleElapsedMs,
  staleMessage,
  DEFAULT_STALE_THRESHOLD_MS,
  DEFAULT_CHECK_INTERVAL_MS,
} from './stale-detector.js';
export type { StaleSweepTarget, StaleDetectorOptions } from './stale-detector.js';
export { MonitorController } from './monitor-controller.js';
export type { MonitorState, MonitorTask } from './monitor-controller.js';
export { summarizeServices } from './service-summary.js';
export { withHeartbeatScope } from './heartbeat-scope.js';
export type { HeartbeatReporter, HeartbeatScopeOptions } from './heartbeat-scope.js';
export {
  registerServiceSchema,
  heartbeatSchema,
  serviceIdParamsSchema,
} from './heartbeat-schema.js';
export type { RegisterServiceInput, HeartbeatInput } from './heartbeat-schema.js';
