import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';
import { childLogger, type ComponentLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { ProtocolError } from '../errors.js';
import type { BusPublisher } from '../bus/adapter.js';
import type { SpeechProvider } from '../collaborators/index.js';
import type { PerceptionPipeline } from '../perception/index.js';
import { CommandOutbox } from './outbox.js';
import type { ReconnectController } from './reconnect.js';
import type { DeviceFrame, DeviceSocket } from './socket.js';
import {
  encodeDeviceMessage,
  helloReply,
  parseDeviceMessage,
  ttsStop,
  visionInitialize,
  type InboundDeviceMessage,
  type OutboundDeviceMessage
} from './protocol.js';

export type SessionState = 'connecting' | 'handshaking' | 'active' | 'closed';

type DeviceSession = {
  id: string | null;
  socket: DeviceSocket;
  state: SessionState;
  connectedAt: number;
};

export type DeviceSessionSnapshot = {
  id: string | null;
  state: SessionState;
  remoteAddress: string;
  connectedAt: number;
};

export type DeliveryOutcome = 'sent' | 'queued';

export interface DeviceSessionManagerOptions {
  bus: BusPublisher;
  perception: PerceptionPipeline;
  speech: SpeechProvider;
  reconnect: ReconnectController;
  /** Confidence at or above which an analysis result fires an alert event. */
  confidenceThreshold: () => number;
  /** Image-analysis callback URL announced after `hello`, given the host the device dialed. */
  visionUrl: (localHost: string) => string;
  visionToken: string;
  flushIntervalMs?: number;
  listenStopDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  generateSessionId?: () => string;
  log?: ComponentLogger;
  metrics?: MetricsRegistry;
}

const LAST_EVENT_MAX_LENGTH = 255;
const MCP_LOG_MAX_LENGTH = 500;

/**
 * Owns the single device connection slot and the outbox. A new connection
 * supersedes the previous one; per-message failures are logged and the
 * connection keeps going.
 */
export class DeviceSessionManager {
  readonly outbox = new CommandOutbox();
  private session: DeviceSession | null = null;
  private flushing: Promise<void> | null = null;
  private draining = false;
  private rpcId = 0;
  private binaryFrames = 0;
  private readonly flushIntervalMs: number;
  private readonly listenStopDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly generateSessionId: () => string;
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: DeviceSessionManagerOptions) {
    this.flushIntervalMs = options.flushIntervalMs ?? 100;
    this.listenStopDelayMs = options.listenStopDelayMs ?? 500;
    this.sleep = options.sleep ?? (ms => delay(ms).then(() => undefined));
    this.generateSessionId = options.generateSessionId ?? randomUUID;
    this.log = options.log ?? childLogger('device-session');
    this.metrics = options.metrics ?? metricsModule;
  }

  isActive() {
    return this.session?.state === 'active';
  }

  currentSession(): DeviceSessionSnapshot | null {
    const session = this.session;
    if (!session) {
      return null;
    }
    return {
      id: session.id,
      state: session.state,
      remoteAddress: session.socket.remoteAddress,
      connectedAt: session.connectedAt
    };
  }

  /** Id shared by the initialize push and tool calls sent to the device. */
  nextRpcId() {
    this.rpcId += 1;
    return this.rpcId;
  }

  /** Runs until the socket closes. Never rejects. */
  async handleConnection(socket: DeviceSocket): Promise<void> {
    const previous = this.session;
    if (previous && previous.state !== 'closed') {
      this.log.info({ remoteAddress: previous.socket.remoteAddress }, 'Superseding previous device connection');
      previous.state = 'closed';
      previous.socket.close(1000, 'superseded');
    }

    const session: DeviceSession = {
      id: null,
      socket,
      state: 'connecting',
      connectedAt: Date.now()
    };
    this.session = session;
    this.log.info({ remoteAddress: socket.remoteAddress }, 'Device connected');

    session.state = 'active';
    try {
      await this.options.reconnect.onConnected(() => this.flushOutbox());
    } catch (error) {
      this.log.error({ err: error }, 'Connect bookkeeping failed');
    }

    try {
      for await (const frame of socket.frames()) {
        if (this.session !== session) {
          break;
        }
        await this.handleFrame(session, frame);
      }
    } catch (error) {
      this.log.warn({ err: error }, 'Device connection ended with an error');
    } finally {
      session.state = 'closed';
      if (this.session === session) {
        this.session = null;
        try {
          const delayMs = await this.options.reconnect.onDisconnected();
          this.log.debug({ delayMs, queued: this.outbox.size }, 'Waiting for the device to reconnect');
        } catch (error) {
          this.log.error({ err: error }, 'Disconnect bookkeeping failed');
        } finally {
          this.options.reconnect.markIdle();
        }
      }
    }
  }

  /**
   * Sends now when a session is active and nothing is waiting ahead of the
   * message; otherwise, or when the send fails, appends it to the outbox.
   */
  async sendToDevice(message: OutboundDeviceMessage | string): Promise<DeliveryOutcome> {
    const text = typeof message === 'string' ? message : encodeDeviceMessage(message);
    const session = this.session;
    if (session && session.state === 'active' && this.outbox.isEmpty() && !this.draining) {
      try {
        await session.socket.send(text);
        this.metrics.increment('device', 'sent');
        return 'sent';
      } catch (error) {
        this.log.warn({ err: error }, 'Device send failed; queueing');
      }
    }

    this.outbox.enqueue(text);
    this.metrics.increment('device', 'queued');
    this.metrics.setGauge('outbox.size', this.outbox.size);
    this.log.info({ queued: this.outbox.size }, 'Command queued for delivery');
    return 'queued';
  }

  /** Drains the outbox while the session stays active. Concurrent calls share one drain. */
  flushOutbox(): Promise<void> {
    if (!this.draining || !this.flushing) {
      this.flushing = this.drainOutbox();
    }
    return this.flushing;
  }

  async close(reason = 'shutdown') {
    const session = this.session;
    if (!session) {
      return;
    }
    session.state = 'closed';
    session.socket.close(1001, reason);
  }

  /** `draining` is cleared in the same turn the loop sees an empty outbox. */
  private async drainOutbox() {
    this.draining = true;
    let delivered = 0;
    try {
      while (!this.outbox.isEmpty()) {
        const session = this.session;
        if (!session || session.state !== 'active') {
          break;
        }
        const envelope = this.outbox.shift();
        if (!envelope) {
          break;
        }
        try {
          await session.socket.send(envelope.message);
          delivered += 1;
          this.metrics.increment('device', 'delivered');
        } catch (error) {
          this.outbox.requeueFront(envelope);
          this.log.warn({ err: error, sequence: envelope.sequence }, 'Queued command delivery failed');
          break;
        }
        if (!this.outbox.isEmpty()) {
          await this.sleep(this.flushIntervalMs);
        }
      }
    } finally {
      this.draining = false;
    }
    this.metrics.setGauge('outbox.size', this.outbox.size);
    if (delivered > 0) {
      this.log.info({ delivered, remaining: this.outbox.size }, 'Flushed queued commands');
    }
  }

  private async handleFrame(session: DeviceSession, frame: DeviceFrame) {
    if (frame.kind === 'binary') {
      this.binaryFrames += 1;
      this.metrics.increment('device', 'binaryFrames');
      if (this.binaryFrames === 1 || this.binaryFrames % 100 === 0) {
        this.log.debug({ count: this.binaryFrames, bytes: frame.data.length }, 'Received binary audio frames');
      }
      return;
    }

    try {
      const message = parseDeviceMessage(frame.text);
      this.metrics.increment('device', 'messages');
      await this.dispatch(session, message);
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.metrics.increment('device', 'protocolErrors');
        this.log.warn({ err: error }, 'Dropped malformed device message');
      } else {
        this.log.error({ err: error }, 'Error processing device message');
      }
    }
  }

  private async dispatch(session: DeviceSession, message: InboundDeviceMessage) {
    switch (message.type) {
      case 'hello':
        await this.handleHello(session);
        return;
      case 'listen':
        await this.handleListen(session, message.state);
        return;
      case 'audio':
        await this.handleAudio(message.data);
        return;
      case 'image':
        await this.handleImage(message.data);
        return;
      case 'mcp': {
        const json = JSON.stringify(message.payload);
        this.log.info({ payload: json.slice(0, MCP_LOG_MAX_LENGTH) }, 'MCP message from device');
        await this.options.bus.publishState('sensor/last_event', `MCP: ${json.slice(0, LAST_EVENT_MAX_LENGTH)}`);
        return;
      }
      case 'wheel':
        this.log.info({ direction: message.direction }, 'Wheel event');
        return;
      case 'button':
        this.log.info({ action: message.action }, 'Button event');
        return;
      case 'status':
        this.log.debug({ status: message.payload }, 'Device status');
        return;
      case 'unrecognized':
        this.log.debug({ type: message.messageType }, 'Ignoring unrecognized device message');
        return;
    }
  }

  private async handleHello(session: DeviceSession) {
    const sessionId = this.generateSessionId();
    session.id = sessionId;
    session.state = 'handshaking';
    try {
      await session.socket.send(encodeDeviceMessage(helloReply(sessionId)));
      const visionUrl = this.options.visionUrl(session.socket.localHost);
      await session.socket.send(
        encodeDeviceMessage(visionInitialize(this.nextRpcId(), visionUrl, this.options.visionToken))
      );
      this.log.info({ sessionId }, 'Hello handshake completed');
    } catch (error) {
      this.log.warn({ err: error, sessionId }, 'Hello handshake send failed');
    } finally {
      if (session.state === 'handshaking') {
        session.state = 'active';
      }
    }
    await this.flushOutbox();
  }

  private async handleListen(session: DeviceSession, state: string) {
    this.log.info({ state }, 'Device listen state');
    if (state !== 'detect' && state !== 'start') {
      return;
    }
    await this.sleep(this.listenStopDelayMs);
    if (session.state === 'active' && session.socket.isOpen()) {
      try {
        await session.socket.send(encodeDeviceMessage(ttsStop()));
      } catch (error) {
        this.log.warn({ err: error }, 'Failed to end listen session');
      }
    }
    await this.flushOutbox();
  }

  private async handleAudio(audio: Buffer) {
    if (audio.length === 0) {
      return;
    }
    const { bus, perception, speech } = this.options;
    const noisy = perception.detectNoise(audio);
    await bus.publishState('binary_sensor/noise_detected', noisy ? 'ON' : 'OFF');

    let transcript = '';
    try {
      transcript = (await speech.recognize(audio)).trim();
    } catch (error) {
      this.log.warn({ err: error }, 'Speech recognition failed');
    }
    if (transcript) {
      this.log.info({ text: transcript }, 'Voice command recognized');
      await bus.fireEvent('voice_command', { text: transcript });
    }
  }

  private async handleImage(image: Buffer) {
    if (image.length === 0) {
      return;
    }
    const { bus, perception } = this.options;
    await bus.publishImage(image);

    const outcome = perception.detectMotion(image);
    await bus.publishState('binary_sensor/motion_detected', outcome.motion ? 'ON' : 'OFF');

    const result = await perception.analyzeIfNeeded(image, outcome.motion);
    if (!result) {
      return;
    }
    await bus.publishState('sensor/last_event', result.description.slice(0, LAST_EVENT_MAX_LENGTH));
    if (result.confidence >= this.options.confidenceThreshold()) {
      await bus.fireEvent('alert', {
        description: result.description,
        confidence: result.confidence
      });
    }
  }
}
