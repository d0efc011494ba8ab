export { HeartbeatClient, DEFAULT_HEARTBEAT_INTERVAL_MS } from './heartbeat-client.js';
export type { HeartbeatClientOptions } from './heartbeat-client.js';
export type { ServiceListResponse } from './schemas.js';
