import pino from 'pino';
import type { Logger } from 'pino';
import type { z } from 'zod';
import type { HeartbeatStatus, ServiceMetadata, ServiceRecord } from '../domain/index.js';
import { ApiRequestError, ClientNotConnectedError, ConfigurationError } from '../domain/index.js';
import type {
  HeartbeatInput,
  HeartbeatReporter,
  MonitorState,
  RegisterServiceInput,
} from '../application/index.js';
import { MonitorController } from '../application/index.js';
import {
  errorResponseSchema,
  registerResponseSchema,
  serviceListResponseSchema,
  serviceResponseSchema,
} from './schemas.js';
import type { ServiceListResponse } from './schemas.js';

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;

export interface HeartbeatClientOptions {
  /** Server origin, e.g. `http://localhost:3000`. */
  apiUrl: string;
  /** Known id; when absent, `connect()` registers under `serviceName`. */
  serviceId?: string | undefined;
  serviceName?: string | undefined;
  heartbeatIntervalMs?: number | undefined;
  /** Send a `healthy` heartbeat every interval while connected. */
  autoHeartbeat?: boolean | undefined;
  log?: Logger | undefined;
}

const API_PREFIX = '/api/v1';

/**
 * Client side of the heartbeat API, for services reporting on themselves.
 *
 * All fetch calls go through `request`. The optional auto-heartbeat loop
 * runs on a MonitorController, so `disconnect()` aborts both the pending
 * sleep and any in-flight request.
 */
export class HeartbeatClient implements HeartbeatReporter {
  private readonly apiUrl: string;
  private readonly serviceName: string | null;
  private readonly autoHeartbeat: boolean;
  private readonly log: Logger;
  private readonly loop: MonitorController;
  private id: string | null;
  private metadata: ServiceMetadata = {};

  constructor(options: HeartbeatClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.id = options.serviceId ?? null;
    this.serviceName = options.serviceName ?? null;
    this.autoHeartbeat = options.autoHeartbeat ?? false;
    this.log = options.log ?? pino({ name: 'heartbeat-client' });
    this.loop = new MonitorController(
      (signal) => this.autoTick(signal),
      options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS,
      this.log,
    );
  }

  get serviceId(): string | null {
    return this.id;
  }

  get autoHeartbeatState(): MonitorState {
    return this.loop.state;
  }

  /**
   * Registers the service unless an id is already known, then starts the
   * auto-heartbeat loop when enabled. Returns the service id.
   */
  async connect(): Promise<string> {
    let serviceId = this.id;
    if (serviceId === null) {
      if (!this.serviceName) {
        throw new ConfigurationError('serviceName is required when serviceId is not provided');
      }
      serviceId = await this.registerService(this.serviceName, null, this.metadata);
      this.id = serviceId;
    }

    if (this.autoHeartbeat) {
      this.loop.start();
    }

    this.log.info({ service_id: serviceId, api_url: this.apiUrl }, 'Heartbeat client connected');
    return serviceId;
  }

  /** Stops the auto-heartbeat loop; the registration stays on the server. */
  async disconnect(): Promise<void> {
    await this.loop.stop();
  }

  async registerService(
    serviceName: string,
    serviceId?: string | null,
    metadata?: ServiceMetadata | null,
  ): Promise<string> {
    const body: RegisterServiceInput = { service_name: serviceName };
    const id = serviceId ?? this.id;
    if (id) body.service_id = id;
    if (metadata && Object.keys(metadata).length > 0) body.metadata = { ...metadata };

    const response = await this.request('/services', registerResponseSchema, {
      method: 'POST',
      body: JSON.stringify(body),
    });
    return response.service_id;
  }

  /** Heartbeat for this client's own service. */
  async sendHeartbeat(
    status: HeartbeatStatus = 'healthy',
    message?: string | null,
    metadata?: ServiceMetadata | null,
  ): Promise<ServiceRecord> {
    return this.heartbeat(this.requireId(), status, message, metadata);
  }

  /** HeartbeatReporter, so `withHeartbeatScope` works against a remote registry. */
  async heartbeat(
    serviceId: string,
    status: string,
    message?: string | null,
    metadata?: ServiceMetadata | null,
    signal?: AbortSignal,
  ): Promise<ServiceRecord> {
    const body: HeartbeatInput = { status };
    if (message) body.message = message;
    if (metadata && Object.keys(metadata).length > 0) body.metadata = { ...metadata };

    return this.request(
      `/services/${encodeURIComponent(serviceId)}/heartbeat`,
      serviceResponseSchema,
      { method: 'POST', body: JSON.stringify(body), signal },
    );
  }

  async getStatus(): Promise<ServiceRecord> {
    return this.request(`/services/${encodeURIComponent(this.requireId())}`, serviceResponseSchema);
  }

  async getAllServices(): Promise<ServiceListResponse> {
    return this.request('/services', serviceListResponseSchema);
  }

  /** Shallow-merged into what auto heartbeats and a later registration carry. */
  setMetadata(metadata: ServiceMetadata): void {
    this.metadata = { ...this.metadata, ...metadata };
  }

  // ── Internals ────────────────────────────────────────────

  private requireId(): string {
    if (this.id === null) {
      throw new ClientNotConnectedError();
    }
    return this.id;
  }

  private async autoTick(signal: AbortSignal): Promise<void> {
    const serviceId = this.requireId();
    try {
      await this.heartbeat(serviceId, 'healthy', null, this.metadata, signal);
    } catch (err: unknown) {
      if (signal.aborted) {
        this.log.debug({ service_id: serviceId }, 'Auto heartbeat cancelled');
        return;
      }
      this.log.warn({ err, service_id: serviceId }, 'Auto heartbeat failed');
    }
  }

  private async request<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    init: { method?: string; body?: string; signal?: AbortSignal | undefined } = {},
  ): Promise<z.output<S>> {
    const headers: Record<string, string> = init.body === undefined
      ? {}
      : { 'Content-Type': 'application/json' };

    const res = await fetch(`${this.apiUrl}${API_PREFIX}${path}`, {
      method: init.method ?? 'GET',
      headers,
      body: init.body,
      signal: init.signal,
    });

    if (!res.ok) {
      const parsed = errorResponseSchema.safeParse(await readJson(res));
      const detail = parsed.success ? parsed.data.error : res.statusText;
      throw new ApiRequestError(
        res.status,
        `API ${res.status}: ${detail}`,
        parsed.success ? parsed.data.code ?? null : null,
      );
    }

    return schema.parse(await res.json());
  }
}

/** Error bodies are best-effort; a non-JSON body yields null. */
async function readJson(res: Response): Promise<unknown> {
  try {
    return await res.json();
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
}
