import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_CONFIG,
  loadConfigFromFile,
  loadGatewayConfig,
  parseConfig,
  resolveConfig,
  validateConfig
} from '../src/config/index.js';
import { ConfigError } from '../src/errors.js';
import { createLogger } from './helpers/fakes.js';

describe('resolveConfig', () => {
  it('fills every missing section from the defaults', () => {
    expect(resolveConfig({}, createLogger())).toEqual(DEFAULT_CONFIG);
  });

  it('accepts string overrides for numeric and boolean leaves', () => {
    const resolved = resolveConfig(
      { bus: { host: 'broker.lan', port: '1884' }, monitoring: { enabled: 'true' } },
      createLogger()
    );

    expect(resolved.bus.host).toBe('broker.lan');
    expect(resolved.bus.port).toBe(1884);
    expect(resolved.bus.nodeId).toBe('sensecap_watcher');
    expect(resolved.monitoring.enabled).toBe(true);
  });

  it('ConfigFallback replaces invalid values with defaults and warns', () => {
    const log = createLogger();
    const resolved = resolveConfig(
      {
        monitoring: { intervalSeconds: 5, confidenceThreshold: 0.8 },
        perception: 'loud',
        logging: { level: 'chatty' }
      },
      log
    );

    expect(resolved.monitoring.intervalSeconds).toBe(30);
    expect(resolved.monitoring.confidenceThreshold).toBe(0.8);
    expect(resolved.perception).toEqual(DEFAULT_CONFIG.perception);
    expect(resolved.logging.level).toBe('info');
    expect(log.warn).toHaveBeenCalledTimes(3);
  });

  it('rejects conflicting ports, inverted backoff and relative socket paths', () => {
    expect(() =>
      resolveConfig({ device: { websocketPort: 9000 }, handshake: { port: 9000 } }, createLogger())
    ).toThrow('config.device.websocketPort and config.handshake.port must differ (both 9000)');

    expect(() =>
      resolveConfig({ reconnect: { initialDelayMs: 5000, maxDelayMs: 1000 } }, createLogger())
    ).toThrow(ConfigError);

    expect(() => resolveConfig({ device: { path: 'ws' } }, createLogger())).toThrow(
      'config.device.path must start with "/"'
    );
  });

  it('disables the tool bridge for URLs that are not WebSocket URLs', () => {
    const log = createLogger();

    expect(resolveConfig({ toolBridge: { url: 'http://broker.lan/mcp' } }, log).toolBridge.url).toBe('');
    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(resolveConfig({ toolBridge: { url: ' wss://broker.lan/mcp ' } }, log).toolBridge.url).toBe(
      'wss://broker.lan/mcp'
    );
  });

  it('reports every schema violation at once', () => {
    expect(() => validateConfig({ app: {} })).toThrow(ConfigError);
    expect(() =>
      validateConfig({ ...DEFAULT_CONFIG, bus: { ...DEFAULT_CONFIG.bus, port: 70000, nodeId: 3 } })
    ).toThrow('config.bus.port must be <= 65535; config.bus.nodeId must be a string');
  });
});

describe('configuration files', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gateway-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads a JSON file and wraps read and parse failures', () => {
    const filePath = path.join(tempDir, 'gateway.json');
    fs.writeFileSync(filePath, JSON.stringify({ handshake: { publicHost: '192.0.2.20' } }));

    expect(loadConfigFromFile(filePath, createLogger()).handshake.publicHost).toBe('192.0.2.20');
    expect(() => loadConfigFromFile(path.join(tempDir, 'missing.json'))).toThrow(ConfigError);
    expect(() => parseConfig('{ not json')).toThrow(/^Failed to parse configuration/);
  });

  it('reads the node-config tree for the test environment', () => {
    const loaded = loadGatewayConfig(createLogger());
    expect(loaded.logging.level).toBe('silent');
    expect(loaded.device.path).toBe('/ws');
  });
});
