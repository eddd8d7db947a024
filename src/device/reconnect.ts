import { childLogger, type ComponentLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { BusPublisher } from '../bus/adapter.js';

export type ReconnectPhase = 'idle' | 'connected' | 'disconnected';

export interface ReconnectControllerOptions {
  initialDelayMs?: number;
  maxDelayMs?: number;
  bus?: Pick<BusPublisher, 'publishState'>;
  log?: ComponentLogger;
  metrics?: MetricsRegistry;
}

export const DEFAULT_INITIAL_DELAY_MS = 1000;
export const DEFAULT_MAX_DELAY_MS = 60_000;

/**
 * Backoff bookkeeping around the device connection. It owns no timers; the
 * device listener reads the recorded delay before listening again.
 */
export class ReconnectController {
  private state: ReconnectPhase = 'idle';
  private delayMs: number;
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: ReconnectControllerOptions = {}) {
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
    this.maxDelayMs = Math.max(this.initialDelayMs, options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS);
    this.delayMs = this.initialDelayMs;
    this.log = options.log ?? childLogger('reconnect');
    this.metrics = options.metrics ?? metricsModule;
  }

  get phase() {
    return this.state;
  }

  get currentDelayMs() {
    return this.delayMs;
  }

  /** Returns the delay to wait now and doubles the next one, up to the ceiling. */
  recordFailure(): number {
    const delay = this.delayMs;
    this.delayMs = Math.min(this.delayMs * 2, this.maxDelayMs);
    this.metrics.setGauge('reconnect.delayMs', this.delayMs);
    return delay;
  }

  reset() {
    this.delayMs = this.initialDelayMs;
    this.metrics.setGauge('reconnect.delayMs', this.delayMs);
  }

  async onConnected(flush: () => Promise<void>) {
    this.state = 'connected';
    this.reset();
    this.metrics.increment('device', 'connections');
    await this.options.bus?.publishState('binary_sensor/connected', 'ON');
    await flush();
  }

  async onDisconnected(): Promise<number> {
    this.state = 'disconnected';
    this.metrics.increment('device', 'disconnections');
    await this.options.bus?.publishState('binary_sensor/connected', 'OFF');
    const delay = this.recordFailure();
    this.log.info({ delayMs: delay, nextDelayMs: this.delayMs }, 'Device disconnected');
    return delay;
  }

  markIdle() {
    this.state = 'idle';
  }
}
