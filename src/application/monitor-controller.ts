import type { Logger } from 'pino';

export type MonitorTask = (signal: AbortSignal) => Promise<unknown>;

export type MonitorState = 'stopped' | 'running';

type MonitorHandle =
  | { readonly state: 'stopped' }
  | { readonly state: 'running'; readonly controller: AbortController; readonly done: Promise<void> };

const STOPPED: MonitorHandle = { state: 'stopped' };

/**
 * Owns the single recurring background task.
 *
 * STOPPED --start()--> RUNNING --stop()--> STOPPED. Both transitions are
 * idempotent. A loop started while a previous one is still draining
 * waits for it, so two sweeps never overlap.
 */
export class MonitorController {
  private handle: MonitorHandle = STOPPED;
  private draining: Promise<void> = Promise.resolve();

  constructor(
    private readonly task: MonitorTask,
    readonly intervalMs: number,
    private readonly log: Logger,
  ) {
    if (!(intervalMs > 0)) {
      throw new RangeError(`Monitor interval must be positive, got ${intervalMs}`);
    }
  }

  get state(): MonitorState {
    return this.handle.state;
  }

  start(): void {
    if (this.handle.state === 'running') {
      this.log.debug('Monitor already running, start ignored');
      return;
    }

    const controller = new AbortController();
    const done = this.run(controller.signal, this.draining);
    this.handle = { state: 'running', controller, done };
    this.log.info({ intervalMs: this.intervalMs }, 'Heartbeat monitor started');
  }

  async stop(): Promise<void> {
    const handle = this.handle;
    if (handle.state === 'stopped') return;

    this.handle = STOPPED;
    this.draining = handle.done;
    handle.controller.abort();
    await handle.done;
    this.log.info('Heartbeat monitor stopped');
  }

  private async run(signal: AbortSignal, previous: Promise<void>): Promise<void> {
    await previous;

    while (!signal.aborted) {
      await sleep(this.intervalMs, signal);
      if (signal.aborted) break;

      try {
        await this.task(signal);
      } catch (err: unknown) {
        this.log.error({ err }, 'Monitor tick failed, continuing on next interval');
      }
    }
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
