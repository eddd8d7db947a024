import { childLogger, type ComponentLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { DeviceIdentity } from '../config/index.js';
import type { SerialTaskQueue } from '../utils/taskQueue.js';
import type { BusTransport } from './transport.js';
import type { TopicScheme } from './topics.js';
import {
  ENTITY_CATALOG,
  EVENT_TYPES,
  discoveryPayload,
  eventDiscoveryPayload,
  type EntityDescriptor,
  type EventType
} from './entities.js';

export type StateValue = string | number | boolean | Record<string, unknown>;

/** Outbound half of the bus, as used by the device session and HTTP server. */
export interface BusPublisher {
  publishState(entityId: string, value: StateValue, options?: { retain?: boolean }): Promise<void>;
  publishImage(image: Buffer): Promise<void>;
  fireEvent(type: EventType, data: Record<string, unknown>): Promise<void>;
}

export type BusCommand = {
  topic: string;
  component: string;
  objectId: string;
  payload: string;
};

export type BusCommandHandler = (command: BusCommand) => void | Promise<void>;

export interface BusAdapterOptions {
  transport: BusTransport;
  topics: TopicScheme;
  device: DeviceIdentity;
  queue: SerialTaskQueue;
  connectTimeoutMs?: number;
  entities?: readonly EntityDescriptor[];
  /** Current values that replace catalog defaults in the initial states. */
  initialStates?: () => Readonly<Record<string, StateValue>>;
  log?: ComponentLogger;
  metrics?: MetricsRegistry;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/**
 * Discovery registration, state publishing and command intake over one broker
 * connection. Transport callbacks only post work to the serial task queue.
 */
export class BusAdapter implements BusPublisher {
  private readonly transport: BusTransport;
  private readonly topics: TopicScheme;
  private readonly queue: SerialTaskQueue;
  private readonly entities: readonly EntityDescriptor[];
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private readonly detachers: Array<() => void> = [];
  private initialStatesPublished = false;
  private commandsWanted = false;
  private started = false;

  constructor(private readonly options: BusAdapterOptions) {
    this.transport = options.transport;
    this.topics = options.topics;
    this.queue = options.queue;
    this.entities = options.entities ?? ENTITY_CATALOG;
    this.log = options.log ?? childLogger('bus');
    this.metrics = options.metrics ?? metricsModule;
  }

  isConnected() {
    return this.transport.isConnected();
  }

  /**
   * Hooks broker (re)connects and waits up to the connect timeout for the
   * first one. Resolves false on timeout; the transport keeps retrying.
   */
  async start(): Promise<boolean> {
    if (!this.started) {
      this.started = true;
      this.detachers.push(
        this.transport.onConnect(() => {
          void this.queue.post(() => this.handleBrokerConnect());
        })
      );
    }

    const timeoutMs = Math.min(
      this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      DEFAULT_CONNECT_TIMEOUT_MS
    );
    const connected = await this.transport.waitForConnection(timeoutMs);
    if (connected) {
      this.log.info('Connected to MQTT broker');
    } else {
      this.log.warn({ timeoutMs }, 'MQTT connection timed out; continuing without the bus');
    }
    return connected;
  }

  async stop() {
    await this.publishState('binary_sensor/connected', 'OFF');
    for (const detach of this.detachers.splice(0, this.detachers.length)) {
      detach();
    }
    try {
      await this.transport.end();
      this.log.info('Disconnected from MQTT broker');
    } catch (error) {
      this.log.warn({ err: error }, 'MQTT disconnect failed');
    }
  }

  /** Retains every discovery descriptor plus the two event descriptors. */
  async registerEntities() {
    const { device } = this.options;
    for (const descriptor of this.entities) {
      await this.publish(
        this.topics.discovery(descriptor.component, descriptor.objectId),
        JSON.stringify(discoveryPayload(descriptor, this.topics, device)),
        true
      );
    }
    for (const eventType of EVENT_TYPES) {
      await this.publish(
        this.topics.eventDiscovery(eventType),
        JSON.stringify(eventDiscoveryPayload(eventType, this.topics, device)),
        true
      );
    }
    this.log.info(
      { entities: this.entities.length, events: EVENT_TYPES.length },
      'Registered discovery entities'
    );
  }

  async publishInitialStates() {
    const current = this.options.initialStates?.() ?? {};
    let published = 0;
    for (const descriptor of this.entities) {
      if (descriptor.initialState === null) {
        continue;
      }
      const entityId = `${descriptor.component}/${descriptor.objectId}`;
      await this.publishState(entityId, current[entityId] ?? descriptor.initialState);
      published += 1;
    }
    this.log.info({ published }, 'Published initial entity states');
  }

  async publishState(entityId: string, value: StateValue, options: { retain?: boolean } = {}) {
    const topic = this.topics.stateForEntity(entityId);
    const payload = typeof value === 'object' ? JSON.stringify(value) : String(value);
    await this.publish(topic, payload, options.retain ?? true);
    this.log.debug({ entityId, value: payload }, 'Published state');
  }

  async publishImage(image: Buffer) {
    await this.publish(this.topics.image(), image, true);
  }

  async fireEvent(type: EventType, data: Record<string, unknown>) {
    const payload = JSON.stringify({ event_type: type, ...data });
    await this.publish(this.topics.eventState(type), payload, false);
    this.metrics.increment('bus', `event.${type}`);
    this.log.info({ eventType: type }, 'Fired bus event');
  }

  /**
   * Routes `<node>/+/+/set` messages to `handler` through the task queue. The
   * subscription is renewed on every broker connect.
   */
  async subscribeCommands(handler: BusCommandHandler) {
    this.detachers.push(
      this.transport.onMessage((topic, payload) => {
        const ref = this.topics.parseCommand(topic);
        if (!ref) {
          return;
        }
        const command: BusCommand = { topic, ...ref, payload: payload.toString('utf8') };
        this.metrics.increment('bus', 'commandsReceived');
        void this.queue.post(() => handler(command));
      })
    );
    this.commandsWanted = true;
    if (this.transport.isConnected()) {
      await this.subscribeCommandTopics();
    }
  }

  private async handleBrokerConnect() {
    await this.registerEntities();
    if (!this.initialStatesPublished) {
      this.initialStatesPublished = true;
      await this.publishInitialStates();
    }
    if (this.commandsWanted) {
      await this.subscribeCommandTopics();
    }
  }

  private async subscribeCommandTopics() {
    const filter = this.topics.commandWildcard();
    try {
      await this.transport.subscribe(filter);
      this.log.info({ filter }, 'Subscribed to command topics');
    } catch (error) {
      this.log.warn({ err: error, filter }, 'Command subscription failed');
    }
  }

  private async publish(topic: string, payload: string | Buffer, retain: boolean) {
    if (!this.transport.isConnected()) {
      this.metrics.increment('bus', 'publishSkipped');
      this.log.warn({ topic }, 'Cannot publish: not connected to MQTT');
      return;
    }
    try {
      await this.transport.publish(topic, payload, { retain });
      this.metrics.increment('bus', 'published');
    } catch (error) {
      this.metrics.increment('bus', 'publishFailed');
      this.log.warn({ err: error, topic }, 'MQTT publish failed');
    }
  }
}
