import { beforeEach, describe, expect, it } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';
import { DEFAULT_CONFIG } from '../src/config/index.js';
import { RuntimeSettings } from '../src/settings.js';
import { SerialTaskQueue } from '../src/utils/taskQueue.js';
import { TopicScheme, parseEntityId } from '../src/bus/topics.js';
import { BusAdapter, type BusCommand } from '../src/bus/adapter.js';
import { ENTITY_CATALOG } from '../src/bus/entities.js';
import { mqttClientOptions } from '../src/bus/transport.js';
import { FakeBusTransport, createLogger } from './helpers/fakes.js';

const device = DEFAULT_CONFIG.bus.device;

describe('TopicScheme', () => {
  const topics = new TopicScheme('watcher');

  it('builds discovery, state, command and event topics', () => {
    expect(topics.discovery('switch', 'monitoring')).toBe('homeassistant/switch/watcher/monitoring/config');
    expect(topics.state('sensor', 'last_event')).toBe('watcher/sensor/last_event/state');
    expect(topics.command('number', 'monitoring_interval')).toBe('watcher/number/monitoring_interval/set');
    expect(topics.commandWildcard()).toBe('watcher/+/+/set');
    expect(topics.image()).toBe('watcher/image/snapshot/image');
    expect(topics.eventState('alert')).toBe('watcher/event/alert/state');
    expect(topics.eventDiscovery('voice_command')).toBe('homeassistant/event/watcher_voice_command/config');
    expect(topics.stateForEntity('binary_sensor/connected')).toBe('watcher/binary_sensor/connected/state');
    expect(topics.stateForEntity('status')).toBe('watcher/status/state');
  });

  it('parses only four-part command topics for its own node', () => {
    expect(topics.parseCommand('watcher/switch/monitoring/set')).toEqual({
      component: 'switch',
      objectId: 'monitoring'
    });
    expect(topics.parseCommand('other/switch/monitoring/set')).toBeNull();
    expect(topics.parseCommand('watcher/switch/monitoring/state')).toBeNull();
    expect(topics.parseCommand('watcher/switch/monitoring/extra/set')).toBeNull();
    expect(parseEntityId('no-separator')).toBeNull();
  });
});

describe('BusAdapter', () => {
  let transport: FakeBusTransport;
  let queue: SerialTaskQueue;
  let metrics: MetricsRegistry;
  let adapter: BusAdapter;

  beforeEach(() => {
    transport = new FakeBusTransport();
    const log = createLogger();
    queue = new SerialTaskQueue({ log });
    metrics = new MetricsRegistry();
    adapter = new BusAdapter({
      transport,
      topics: new TopicScheme('watcher'),
      device,
      queue,
      connectTimeoutMs: 50,
      log,
      metrics
    });
  });

  it('registers discovery and initial states on the first broker connect', async () => {
    expect(await adapter.start()).toBe(false);

    transport.simulateConnect();
    await queue.onIdle();

    const discovery = transport.published.filter(entry => entry.topic.endsWith('/config'));
    expect(discovery).toHaveLength(ENTITY_CATALOG.length + 2);
    expect(discovery.every(entry => entry.retain)).toBe(true);

    expect(JSON.parse(transport.payloadsFor('homeassistant/switch/watcher/monitoring/config')[0])).toEqual({
      name: 'Watcher Monitoring',
      unique_id: 'watcher_monitoring',
      state_topic: 'watcher/switch/monitoring/state',
      command_topic: 'watcher/switch/monitoring/set',
      payload_on: 'ON',
      payload_off: 'OFF',
      device
    });
    expect(JSON.parse(transport.payloadsFor('homeassistant/image/watcher/snapshot/config')[0])).toEqual({
      name: 'Watcher Snapshot',
      unique_id: 'watcher_snapshot',
      image_topic: 'watcher/image/snapshot/image',
      device
    });
    expect(JSON.parse(transport.payloadsFor('homeassistant/siren/watcher/alarm/config')[0])).toMatchObject({
      unique_id: 'watcher_siren',
      command_topic: 'watcher/siren/alarm/set'
    });
    expect(JSON.parse(transport.payloadsFor('homeassistant/event/watcher_alert/config')[0])).toEqual({
      name: 'Watcher Alert',
      unique_id: 'watcher_alert',
      state_topic: 'watcher/event/alert/state',
      event_types: ['alert'],
      device
    });

    expect(transport.payloadsFor('watcher/number/monitoring_interval/state')).toEqual(['30']);
    expect(transport.payloadsFor('watcher/select/display_mode/state')).toEqual(['Clock']);
    expect(transport.payloadsFor('watcher/switch/display_power/state')).toEqual(['ON']);
    const states = transport.published.filter(entry => entry.topic.endsWith('/state'));
    expect(states).toHaveLength(13);
  });

  it('publishes current setting values in place of catalog defaults', async () => {
    const settings = new RuntimeSettings({
      ...DEFAULT_CONFIG.monitoring,
      enabled: true,
      customPrompt: 'Watch the porch',
      intervalSeconds: 45,
      confidenceThreshold: 0.8
    });
    const configured = new BusAdapter({
      transport,
      topics: new TopicScheme('watcher'),
      device,
      queue,
      connectTimeoutMs: 50,
      initialStates: () => settings.busStates(),
      log: createLogger(),
      metrics
    });
    await configured.start();

    transport.simulateConnect();
    await queue.onIdle();

    expect(transport.payloadsFor('watcher/switch/monitoring/state')).toEqual(['ON']);
    expect(transport.payloadsFor('watcher/text/custom_prompt/state')).toEqual(['Watch the porch']);
    expect(transport.payloadsFor('watcher/number/monitoring_interval/state')).toEqual(['45']);
    expect(transport.payloadsFor('watcher/number/confidence_threshold/state')).toEqual(['80']);
    expect(transport.payloadsFor('watcher/binary_sensor/connected/state')).toEqual(['OFF']);
  });

  it('re-registers discovery on reconnect without republishing initial states', async () => {
    await adapter.start();
    transport.simulateConnect();
    await queue.onIdle();
    const afterFirst = transport.published.length;

    transport.connected = false;
    transport.simulateConnect();
    await queue.onIdle();

    expect(transport.published.length - afterFirst).toBe(ENTITY_CATALOG.length + 2);
    expect(transport.payloadsFor('watcher/number/confidence_threshold/state')).toEqual(['50']);
  });

  it('subscribes to command topics on connect and queues matching messages', async () => {
    const received: BusCommand[] = [];
    await adapter.start();
    await adapter.subscribeCommands(command => {
      received.push(command);
    });
    expect(transport.subscriptions).toEqual([]);

    transport.simulateConnect();
    await queue.onIdle();
    expect(transport.subscriptions).toEqual(['watcher/+/+/set']);

    transport.deliver('watcher/switch/monitoring/set', 'ON');
    transport.deliver('watcher/switch/monitoring/state', 'ON');
    transport.deliver('other/number/monitoring_interval/set', '60');
    await queue.onIdle();

    expect(received).toEqual([
      { topic: 'watcher/switch/monitoring/set', component: 'switch', objectId: 'monitoring', payload: 'ON' }
    ]);
    expect(metrics.getCounter('bus', 'commandsReceived')).toBe(1);
  });

  it('fires events without retain and publishes structured state as JSON', async () => {
    transport.connected = true;

    await adapter.fireEvent('alert', { description: 'Person at the gate', confidence: 0.8 });
    await adapter.publishState('sensor/last_event', { text: 'hello' });

    expect(transport.published).toEqual([
      {
        topic: 'watcher/event/alert/state',
        payload: '{"event_type":"alert","description":"Person at the gate","confidence":0.8}',
        retain: false
      },
      { topic: 'watcher/sensor/last_event/state', payload: '{"text":"hello"}', retain: true }
    ]);
    expect(metrics.getCounter('bus', 'event.alert')).toBe(1);
  });

  it('skips publishes while disconnected and swallows broker failures', async () => {
    await adapter.publishState('binary_sensor/motion_detected', 'ON');
    expect(transport.published).toEqual([]);
    expect(metrics.getCounter('bus', 'publishSkipped')).toBe(1);

    transport.connected = true;
    transport.failPublish = true;
    await adapter.publishImage(Buffer.from([0xff, 0xd8]));
    expect(metrics.getCounter('bus', 'publishFailed')).toBe(1);
  });

  it('publishes connectivity off and ends the transport on stop', async () => {
    transport.connected = true;
    await adapter.stop();

    expect(transport.published).toEqual([
      { topic: 'watcher/binary_sensor/connected/state', payload: 'OFF', retain: true }
    ]);
    expect(transport.ended).toBe(true);
  });
});

describe('mqttClientOptions', () => {
  it('leaves a retained connectivity OFF as the last will', () => {
    const topics = new TopicScheme('watcher');
    const options = mqttClientOptions({
      host: 'broker.test',
      port: 1883,
      username: '',
      password: '',
      clientId: 'watcher_test',
      connectTimeoutMs: 10_000,
      will: { topic: topics.stateForEntity('binary_sensor/connected'), payload: 'OFF' }
    });

    expect(options).toMatchObject({ host: 'broker.test', port: 1883, clientId: 'watcher_test' });
    expect(options.username).toBeUndefined();
    expect(options.will).toEqual({
      topic: 'watcher/binary_sensor/connected/state',
      payload: 'OFF',
      qos: 0,
      retain: true
    });
  });
});
