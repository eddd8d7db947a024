import fs from 'node:fs';
import path from 'node:path';
import config from 'config';
import loggerModule, { type ComponentLogger } from '../logger.js';
import { ConfigError } from '../errors.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DeviceConfig = {
  host: string;
  websocketPort: number;
  path: string;
  listenStopDelayMs: number;
  flushIntervalMs: number;
  visionToken: string;
};

export type VersionDocument = {
  version: string;
  build: string;
  date: string;
};

export type HandshakeConfig = {
  host: string;
  port: number;
  publicHost: string;
  dataDir: string;
  firmwarePath: string;
  maxBodyBytes: number;
  version: VersionDocument;
};

export type DeviceIdentity = {
  identifiers: string[];
  name: string;
  manufacturer: string;
  model: string;
};

export type BusConfig = {
  host: string;
  port: number;
  username: string;
  password: string;
  nodeId: string;
  discoveryPrefix: string;
  connectTimeoutMs: number;
  device: DeviceIdentity;
};

export type SnapshotConfig = {
  dir: string;
  maxFiles: number;
  maxAgeDays: number;
};

export type PerceptionConfig = {
  motionThreshold: number;
  noiseThreshold: number;
  pixelDelta: number;
  analysisIntervalMs: number;
  defaultPrompt: string;
  snapshots: SnapshotConfig;
};

export type MonitoringConfig = {
  enabled: boolean;
  intervalSeconds: number;
  confidenceThreshold: number;
  customPrompt: string;
};

export type ReconnectConfig = {
  initialDelayMs: number;
  maxDelayMs: number;
};

export type ToolBridgeConfig = {
  url: string;
  retryDelayMs: number;
  heartbeatMs: number;
  protocolVersion: string;
  serverName: string;
  serverVersion: string;
};

export type GatewayConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  device: DeviceConfig;
  handshake: HandshakeConfig;
  bus: BusConfig;
  perception: PerceptionConfig;
  monitoring: MonitoringConfig;
  reconnect: ReconnectConfig;
  toolBridge: ToolBridgeConfig;
};

export const DEFAULT_CONFIG: GatewayConfig = {
  app: { name: 'watcher-gateway' },
  logging: { level: 'info' },
  device: {
    host: '0.0.0.0',
    websocketPort: 8000,
    path: '/ws',
    listenStopDelayMs: 500,
    flushIntervalMs: 100,
    visionToken: 'local-vision'
  },
  handshake: {
    host: '0.0.0.0',
    port: 8001,
    publicHost: '',
    dataDir: 'data',
    firmwarePath: 'data/firmware.bin',
    maxBodyBytes: 5 * 1024 * 1024,
    version: { version: '1.0.0', build: '1', date: '2024-01-01' }
  },
  bus: {
    host: 'localhost',
    port: 1883,
    username: '',
    password: '',
    nodeId: 'sensecap_watcher',
    discoveryPrefix: 'homeassistant',
    connectTimeoutMs: 10_000,
    device: {
      identifiers: ['sensecap_watcher'],
      name: 'SenseCAP Watcher',
      manufacturer: 'Seeed Studio',
      model: 'SenseCAP Watcher'
    }
  },
  perception: {
    motionThreshold: 0.05,
    noiseThreshold: 500,
    pixelDelta: 25,
    analysisIntervalMs: 30_000,
    defaultPrompt:
      'Describe what you see in this image. Focus on any people, animals, or unusual activity.',
    snapshots: { dir: 'data/snapshots', maxFiles: 100, maxAgeDays: 7 }
  },
  monitoring: {
    enabled: false,
    intervalSeconds: 30,
    confidenceThreshold: 0.5,
    customPrompt: ''
  },
  reconnect: {
    initialDelayMs: 1000,
    maxDelayMs: 60_000
  },
  toolBridge: {
    url: '',
    retryDelayMs: 10_000,
    heartbeatMs: 30_000,
    protocolVersion: '2024-11-05',
    serverName: 'watcher-gateway',
    serverVersion: '1.0.0'
  }
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType;
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  integer?: boolean;
};

const port: JsonSchema = { type: 'number', integer: true, minimum: 0, maximum: 65535 };
const durationMs: JsonSchema = { type: 'number', minimum: 0 };

const gatewayConfigSchema: JsonSchema = {
  type: 'object',
  properties: {
    app: {
      type: 'object',
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      properties: {
        level: {
          type: 'string',
          enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
        }
      }
    },
    device: {
      type: 'object',
      properties: {
        host: { type: 'string' },
        websocketPort: port,
        path: { type: 'string' },
        listenStopDelayMs: durationMs,
        flushIntervalMs: durationMs,
        visionToken: { type: 'string' }
      }
    },
    handshake: {
      type: 'object',
      properties: {
        host: { type: 'string' },
        port,
        publicHost: { type: 'string' },
        dataDir: { type: 'string' },
        firmwarePath: { type: 'string' },
        maxBodyBytes: { type: 'number', integer: true, minimum: 1 },
        version: {
          type: 'object',
          properties: {
            version: { type: 'string' },
            build: { type: 'string' },
            date: { type: 'string' }
          }
        }
      }
    },
    bus: {
      type: 'object',
      properties: {
        host: { type: 'string' },
        port,
        username: { type: 'string' },
        password: { type: 'string' },
        nodeId: { type: 'string' },
        discoveryPrefix: { type: 'string' },
        connectTimeoutMs: { type: 'number', minimum: 0, maximum: 10_000 },
        device: {
          type: 'object',
          properties: {
            identifiers: { type: 'array', items: { type: 'string' } },
            name: { type: 'string' },
            manufacturer: { type: 'string' },
            model: { type: 'string' }
          }
        }
      }
    },
    perception: {
      type: 'object',
      properties: {
        motionThreshold: { type: 'number', minimum: 0, maximum: 1 },
        noiseThreshold: { type: 'number', minimum: 0 },
        pixelDelta: { type: 'number', minimum: 0, maximum: 255 },
        analysisIntervalMs: durationMs,
        defaultPrompt: { type: 'string' },
        snapshots: {
          type: 'object',
          properties: {
            dir: { type: 'string' },
            maxFiles: { type: 'number', integer: true, minimum: 0 },
            maxAgeDays: { type: 'number', minimum: 0 }
          }
        }
      }
    },
    monitoring: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
        intervalSeconds: { type: 'number', integer: true, minimum: 10, maximum: 300 },
        confidenceThreshold: { type: 'number', minimum: 0, maximum: 1 },
        customPrompt: { type: 'string' }
      }
    },
    reconnect: {
      type: 'object',
      properties: {
        initialDelayMs: { type: 'number', minimum: 1 },
        maxDelayMs: { type: 'number', minimum: 1 }
      }
    },
    toolBridge: {
      type: 'object',
      properties: {
        url: { type: 'string' },
        retryDelayMs: durationMs,
        heartbeatMs: durationMs,
        protocolVersion: { type: 'string' },
        serverName: { type: 'string' },
        serverVersion: { type: 'string' }
      }
    }
  }
};

type ConfigLogger = Pick<ComponentLogger, 'warn'>;

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const errors: string[] = [];

  if (schema.type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (schema.type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (schema.type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (schema.type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }
  return errors;
}

/**
 * Walks the schema and keeps every leaf of `value` that validates, falling
 * back to the matching leaf of `defaults` otherwise. Each substitution of a
 * value that was present but invalid is logged.
 */
function applyDefaults(
  schema: JsonSchema,
  value: unknown,
  defaults: unknown,
  pathLabel: string,
  log: ConfigLogger
): unknown {
  if (schema.type === 'object') {
    const source = isRecord(value) ? value : {};
    const fallback = isRecord(defaults) ? defaults : {};
    if (value !== undefined && !isRecord(value)) {
      log.warn({ path: pathLabel }, 'Configuration section is not an object; using defaults');
    }

    const result: Record<string, unknown> = {};
    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      result[key] = applyDefaults(
        childSchema,
        source[key],
        fallback[key],
        `${pathLabel}.${key}`,
        log
      );
    }
    return result;
  }

  const coerced = coerceScalar(schema, value);
  if (coerced === undefined) {
    return defaults;
  }

  const errors = validateAgainstSchema(schema, coerced, pathLabel);
  if (errors.length === 0) {
    return coerced;
  }

  log.warn({ path: pathLabel, errors }, 'Invalid configuration value; using default');
  return defaults;
}

// node-config hands environment overrides through as strings unless a
// __format is declared, so numeric and boolean leaves accept their string forms.
function coerceScalar(schema: JsonSchema, value: unknown): unknown {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    return value;
  }
  if (schema.type === 'number') {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return undefined;
    }
    const parsed = Number(trimmed);
    return Number.isNaN(parsed) ? value : parsed;
  }
  if (schema.type === 'boolean') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateConfig(candidate: unknown): asserts candidate is GatewayConfig {
  const errors = validateAgainstSchema(gatewayConfigSchema, candidate, 'config');
  if (errors.length > 0) {
    throw new ConfigError(errors.join('; '));
  }
}

function validateLogicalConfig(resolved: GatewayConfig, log: ConfigLogger): GatewayConfig {
  const messages: string[] = [];

  const { device, handshake, reconnect, toolBridge } = resolved;
  if (device.websocketPort !== 0 && device.websocketPort === handshake.port) {
    messages.push(
      `config.device.websocketPort and config.handshake.port must differ (both ${device.websocketPort})`
    );
  }

  if (reconnect.initialDelayMs > reconnect.maxDelayMs) {
    messages.push('config.reconnect.initialDelayMs must not exceed config.reconnect.maxDelayMs');
  }

  if (!device.path.startsWith('/')) {
    messages.push('config.device.path must start with "/"');
  }

  if (messages.length > 0) {
    throw new ConfigError(messages.join('; '));
  }

  const bridgeUrl = toolBridge.url.trim();
  if (bridgeUrl && !/^wss?:\/\//i.test(bridgeUrl)) {
    log.warn({ url: bridgeUrl }, 'Tool bridge URL must use ws:// or wss://; bridge disabled');
    return { ...resolved, toolBridge: { ...toolBridge, url: '' } };
  }

  return { ...resolved, toolBridge: { ...toolBridge, url: bridgeUrl } };
}

export function resolveConfig(raw: unknown, log: ConfigLogger = loggerModule): GatewayConfig {
  const merged = applyDefaults(gatewayConfigSchema, raw, DEFAULT_CONFIG, 'config', log);
  validateConfig(merged);
  return validateLogicalConfig(merged, log);
}

export function parseConfig(contents: string, log?: ConfigLogger): GatewayConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse configuration: ${message}`, { cause: error });
  }

  return resolveConfig(parsed, log);
}

export function loadConfigFromFile(filePath: string, log?: ConfigLogger): GatewayConfig {
  const resolvedPath = path.resolve(filePath);
  let contents: string;
  try {
    contents = fs.readFileSync(resolvedPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read configuration from ${resolvedPath}`, { cause: error });
  }
  return parseConfig(contents, log);
}

/** Reads the merged node-config tree (default, NODE_ENV and environment overrides). */
export function loadGatewayConfig(log?: ConfigLogger): GatewayConfig {
  const loaded: unknown = config.util.toObject(config);
  return resolveConfig(loaded, log);
}

export { gatewayConfigSchema };
