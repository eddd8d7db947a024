import loggerModule from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { DeviceSessionManager } from '../device/session.js';
import { requestFrame } from '../device/protocol.js';
import type { RuntimeSettings } from '../settings.js';

type MonitoringLogger = Pick<typeof loggerModule, 'info' | 'debug' | 'error'>;

export interface MonitoringLoopOptions {
  settings: RuntimeSettings;
  device: Pick<DeviceSessionManager, 'isActive' | 'sendToDevice'>;
  logger?: MonitoringLogger;
  metrics?: MetricsRegistry;
}

/**
 * Asks the connected device for a camera frame every monitoring interval while
 * monitoring is enabled. Frames come back as ordinary `image` messages.
 */
export class MonitoringLoop {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private started = false;
  private readonly logger: MonitoringLogger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: MonitoringLoopOptions) {
    this.logger = options.logger ?? loggerModule.child({ component: 'monitoring' });
    this.metrics = options.metrics ?? metricsModule;
  }

  start() {
    if (this.started) {
      return;
    }
    this.started = true;
    this.logger.info('Monitoring loop started');
    this.scheduleNext(this.intervalMs());
  }

  stop() {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Runs a request now and restarts the interval, e.g. after settings change. */
  wake() {
    if (!this.started) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.scheduleNext(0);
  }

  async runOnce(): Promise<boolean> {
    if (this.running) {
      return false;
    }
    const { settings, device } = this.options;
    if (!settings.monitoringEnabled || !device.isActive()) {
      return false;
    }

    this.running = true;
    try {
      await device.sendToDevice(requestFrame());
      this.metrics.increment('monitoring', 'frameRequests');
      this.logger.debug('Requested camera frame');
      return true;
    } catch (error) {
      this.logger.error({ err: error }, 'Monitoring frame request failed');
      return false;
    } finally {
      this.running = false;
    }
  }

  private intervalMs() {
    return this.options.settings.intervalSeconds * 1000;
  }

  private scheduleNext(delayMs: number) {
    if (!this.started) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce().then(() => {
        this.scheduleNext(this.intervalMs());
      });
    }, delayMs);
    this.timer.unref();
  }
}
