import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import loggerModule, { childLogger, setLogLevel, type ComponentLogger } from './logger.js';
import metricsModule, { type MetricsRegistry } from './metrics/index.js';
import { AppLifecycle, type ShutdownHookContext, type ShutdownHookResult } from './app.js';
import { loadGatewayConfig, type GatewayConfig } from './config/index.js';
import {
  SilentSpeechProvider,
  UnconfiguredVisionProvider,
  type Collaborators
} from './collaborators/index.js';
import { RuntimeSettings } from './settings.js';
import { SerialTaskQueue } from './utils/taskQueue.js';
import { MqttBusTransport, type BusTransport } from './bus/transport.js';
import { TopicScheme } from './bus/topics.js';
import { BusAdapter } from './bus/adapter.js';
import { CommandRouter } from './bus/commandRouter.js';
import { ReconnectController } from './device/reconnect.js';
import { DeviceSessionManager } from './device/session.js';
import { DeviceServer } from './device/server.js';
import { PerceptionPipeline } from './perception/index.js';
import { ToolRegistry } from './tools/registry.js';
import { ToolBridge } from './bridge/toolBridge.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import { MonitoringLoop } from './tasks/monitoring.js';
import { RetentionTask } from './tasks/retention.js';

export interface GatewayOptions {
  config?: GatewayConfig;
  collaborators?: Partial<Collaborators>;
  transport?: BusTransport;
  lifecycle?: AppLifecycle;
  log?: ComponentLogger;
  metrics?: MetricsRegistry;
}

export type GatewayRuntime = {
  config: GatewayConfig;
  lifecycle: AppLifecycle;
  settings: RuntimeSettings;
  sessions: DeviceSessionManager;
  bus: BusAdapter;
  devicePort: number;
  handshakePort: number;
  stop: (context?: ShutdownHookContext) => Promise<ShutdownHookResult[]>;
};

const SNAPSHOT_RETENTION_INTERVAL_MS = 60 * 60 * 1000;

export async function startGateway(options: GatewayOptions = {}): Promise<GatewayRuntime> {
  const config = options.config ?? loadGatewayConfig();
  setLogLevel(config.logging.level);
  const log = options.log ?? childLogger('gateway');
  const metrics = options.metrics ?? metricsModule;
  const lifecycle = options.lifecycle ?? new AppLifecycle(metrics);
  const startedAt = Date.now();
  let serviceStatus = 'starting';

  const collaborators: Collaborators = {
    vision: options.collaborators?.vision ?? new UnconfiguredVisionProvider(),
    speech: options.collaborators?.speech ?? new SilentSpeechProvider(),
    tools: options.collaborators?.tools ?? new ToolRegistry()
  };
  lifecycle.registerShutdownHook('collaborators', async () => {
    await collaborators.tools.close?.();
    await collaborators.speech.close?.();
    await collaborators.vision.close?.();
  });

  const settings = new RuntimeSettings(config.monitoring);
  const queue = new SerialTaskQueue({ log: childLogger('task-queue') });
  const topics = new TopicScheme(config.bus.nodeId, config.bus.discoveryPrefix);
  const transport =
    options.transport ??
    MqttBusTransport.create({
      host: config.bus.host,
      port: config.bus.port,
      username: config.bus.username,
      password: config.bus.password,
      clientId: `${config.bus.nodeId}_${randomUUID().slice(0, 8)}`,
      connectTimeoutMs: config.bus.connectTimeoutMs,
      will: { topic: topics.stateForEntity('binary_sensor/connected'), payload: 'OFF' }
    });
  const bus = new BusAdapter({
    transport,
    topics,
    device: config.bus.device,
    queue,
    connectTimeoutMs: config.bus.connectTimeoutMs,
    initialStates: () => settings.busStates(),
    metrics
  });
  lifecycle.registerShutdownHook('bus', async () => {
    await queue.onIdle();
    await bus.stop();
  });

  const reconnect = new ReconnectController({
    initialDelayMs: config.reconnect.initialDelayMs,
    maxDelayMs: config.reconnect.maxDelayMs,
    bus,
    metrics
  });
  const perception = new PerceptionPipeline({
    config: config.perception,
    vision: collaborators.vision,
    customPrompt: () => settings.customPrompt,
    metrics
  });

  let handshake: HttpServerRuntime | null = null;
  const handshakePort = () => handshake?.port ?? config.handshake.port;
  const sessions = new DeviceSessionManager({
    bus,
    perception,
    speech: collaborators.speech,
    reconnect,
    confidenceThreshold: () => settings.confidenceThreshold,
    visionUrl: localHost =>
      `http://${config.handshake.publicHost || localHost}:${handshakePort()}/vision/explain`,
    visionToken: config.device.visionToken,
    flushIntervalMs: config.device.flushIntervalMs,
    listenStopDelayMs: config.device.listenStopDelayMs,
    metrics
  });
  const monitoring = new MonitoringLoop({ settings, device: sessions, metrics });
  const router = new CommandRouter({
    bus,
    device: sessions,
    perception,
    settings,
    speech: collaborators.speech,
    onMonitoringChange: () => monitoring.wake(),
    metrics
  });
  const deviceServer = new DeviceServer({
    host: config.device.host,
    port: config.device.websocketPort,
    path: config.device.path,
    sessions,
    reconnect
  });
  const toolBridge = config.toolBridge.url
    ? new ToolBridge({
        url: config.toolBridge.url,
        executor: collaborators.tools,
        retryDelayMs: config.toolBridge.retryDelayMs,
        heartbeatMs: config.toolBridge.heartbeatMs,
        protocolVersion: config.toolBridge.protocolVersion,
        serverName: config.toolBridge.serverName,
        serverVersion: config.toolBridge.serverVersion,
        metrics
      })
    : null;
  const retention = new RetentionTask({
    dir: config.perception.snapshots.dir,
    maxFiles: config.perception.snapshots.maxFiles,
    maxAgeDays: config.perception.snapshots.maxAgeDays,
    intervalMs: SNAPSHOT_RETENTION_INTERVAL_MS,
    metrics
  });

  const stop = async (context: ShutdownHookContext = { reason: 'stop' }) => {
    serviceStatus = 'stopping';
    log.info({ reason: context.reason, signal: context.signal }, 'Stopping gateway');
    const results = await lifecycle.runShutdownHooks(context);
    for (const result of results) {
      if (result.status === 'error') {
        log.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
      }
    }
    serviceStatus = 'stopped';
    return results;
  };

  let devicePort: number;
  try {
    await bus.start();
    await bus.subscribeCommands(async command => {
      await router.route(command);
    });

    lifecycle.registerShutdownHook('listeners', async () => {
      await toolBridge?.stop();
      await handshake?.close();
      await deviceServer.stop();
    });
    devicePort = await deviceServer.start();
    handshake = await startHttpServer({
      config: config.handshake,
      websocketPort: () => deviceServer.port ?? config.device.websocketPort,
      websocketPath: config.device.path,
      bus,
      perception,
      lifecycle,
      service: () => ({ status: serviceStatus, startedAt }),
      metrics
    });
    lifecycle.registerShutdownHook('device-session', async () => {
      await sessions.close('shutdown');
    });

    toolBridge?.start();
    monitoring.start();
    retention.start();
    lifecycle.registerShutdownHook('background-tasks', () => {
      monitoring.stop();
      retention.stop();
    });
  } catch (error) {
    log.error({ err: error }, 'Gateway startup failed');
    await stop({ reason: 'startup-failure' });
    throw error;
  }

  lifecycle.registerHealthIndicator('bus', () => ({
    status: bus.isConnected() ? 'ok' : 'degraded',
    details: { connected: bus.isConnected() }
  }));
  lifecycle.registerHealthIndicator('device', () => ({
    status: deviceServer.isListening() ? 'ok' : 'degraded',
    details: {
      listening: deviceServer.isListening(),
      session: sessions.currentSession(),
      outbox: sessions.outbox.size,
      reconnectDelayMs: reconnect.currentDelayMs
    }
  }));
  if (toolBridge) {
    lifecycle.registerHealthIndicator('tool-bridge', () => ({
      status: toolBridge.state === 'connected' ? 'ok' : 'degraded',
      details: { state: toolBridge.state, initialized: toolBridge.initialized }
    }));
  }

  serviceStatus = 'running';
  log.info(
    { devicePort, handshakePort: handshake.port, toolBridge: Boolean(toolBridge) },
    'Gateway started'
  );

  return {
    config,
    lifecycle,
    settings,
    sessions,
    bus,
    devicePort,
    handshakePort: handshake.port,
    stop
  };
}

function isEntryPoint() {
  return process.argv[1] !== undefined && fileURLToPath(import.meta.url) === process.argv[1];
}

if (isEntryPoint() && process.env.GATEWAY_DISABLE_AUTO_START !== '1') {
  const runtimePromise = startGateway().catch(error => {
    loggerModule.error({ err: error }, 'Failed to start gateway');
    process.exitCode = 1;
    return null;
  });

  const shutdown = (signal: NodeJS.Signals) => {
    loggerModule.info({ signal }, 'Shutdown signal received');
    void runtimePromise
      .then(runtime => runtime?.stop({ reason: 'signal', signal }))
      .finally(() => {
        process.exit(0);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
