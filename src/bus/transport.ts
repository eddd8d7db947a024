import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import { childLogger, type ComponentLogger } from '../logger.js';
import { TransportError } from '../errors.js';

export type PublishOptions = {
  retain: boolean;
};

export type BusMessageHandler = (topic: string, payload: Buffer) => void;

/** Broker connection as seen by the bus adapter. */
export interface BusTransport {
  isConnected(): boolean;
  publish(topic: string, payload: string | Buffer, options: PublishOptions): Promise<void>;
  subscribe(filter: string): Promise<void>;
  onMessage(handler: BusMessageHandler): () => void;
  /** Called on the first connect and on every reconnect. */
  onConnect(handler: () => void): () => void;
  waitForConnection(timeoutMs: number): Promise<boolean>;
  end(): Promise<void>;
}

export type MqttTransportOptions = {
  host: string;
  port: number;
  username?: string;
  password?: string;
  clientId: string;
  connectTimeoutMs: number;
  reconnectPeriodMs?: number;
  /** Retained message the broker publishes if this client drops without ending. */
  will?: { topic: string; payload: string };
  log?: ComponentLogger;
};

export function mqttClientOptions(options: MqttTransportOptions): IClientOptions {
  return {
    host: options.host,
    port: options.port,
    protocol: 'mqtt',
    clientId: options.clientId,
    username: options.username || undefined,
    password: options.password || undefined,
    keepalive: 60,
    connectTimeout: options.connectTimeoutMs,
    reconnectPeriod: options.reconnectPeriodMs ?? 5000,
    will: options.will
      ? { topic: options.will.topic, payload: options.will.payload, qos: 0, retain: true }
      : undefined
  };
}

export class MqttBusTransport implements BusTransport {
  private readonly log: ComponentLogger;

  private constructor(
    private readonly client: MqttClient,
    log: ComponentLogger
  ) {
    this.log = log;
    client.on('error', error => {
      this.log.warn({ err: error }, 'MQTT client error');
    });
    client.on('offline', () => {
      this.log.warn('MQTT broker offline');
    });
    client.on('reconnect', () => {
      this.log.debug('Reconnecting to MQTT broker');
    });
  }

  /** Starts connecting; the client keeps retrying in the background. */
  static create(options: MqttTransportOptions): MqttBusTransport {
    const log = options.log ?? childLogger('mqtt');
    const client = connect(mqttClientOptions(options));
    return new MqttBusTransport(client, log);
  }

  isConnected() {
    return this.client.connected;
  }

  async publish(topic: string, payload: string | Buffer, options: PublishOptions) {
    try {
      await this.client.publishAsync(topic, payload, { retain: options.retain, qos: 0 });
    } catch (error) {
      throw new TransportError(`Publish to ${topic} failed`, { cause: error });
    }
  }

  async subscribe(filter: string) {
    try {
      await this.client.subscribeAsync(filter, { qos: 0 });
    } catch (error) {
      throw new TransportError(`Subscribe to ${filter} failed`, { cause: error });
    }
  }

  onMessage(handler: BusMessageHandler) {
    const listener = (topic: string, payload: Buffer) => {
      handler(topic, payload);
    };
    this.client.on('message', listener);
    return () => {
      this.client.removeListener('message', listener);
    };
  }

  onConnect(handler: () => void) {
    const listener = () => {
      handler();
    };
    this.client.on('connect', listener);
    return () => {
      this.client.removeListener('connect', listener);
    };
  }

  waitForConnection(timeoutMs: number): Promise<boolean> {
    if (this.client.connected) {
      return Promise.resolve(true);
    }
    return new Promise(resolve => {
      const onConnect = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.client.removeListener('connect', onConnect);
        resolve(false);
      }, timeoutMs);
      this.client.once('connect', onConnect);
    });
  }

  async end() {
    await this.client.endAsync();
  }
}
