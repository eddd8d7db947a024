import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { DEFAULT_CONFIG } from '../src/config/index.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { PerceptionPipeline } from '../src/perception/index.js';
import { ReconnectController } from '../src/device/reconnect.js';
import { DeviceSessionManager, type DeliveryOutcome } from '../src/device/session.js';
import { encodeDeviceMessage, ttsSentence } from '../src/device/protocol.js';
import {
  FakeDeviceSocket,
  FakeSpeech,
  FakeVision,
  RecordingBus,
  createLogger,
  grayPng,
  pcm16
} from './helpers/fakes.js';

class TrackingReconnect extends ReconnectController {
  connected: Promise<void> = Promise.resolve();

  onConnected(flush: () => Promise<void>) {
    this.connected = super.onConnected(flush);
    return this.connected;
  }
}

describe('DeviceSessionManager', () => {
  let tempDir: string;
  let bus: RecordingBus;
  let vision: FakeVision;
  let speech: FakeSpeech;
  let metrics: MetricsRegistry;
  let reconnect: TrackingReconnect;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let log: ReturnType<typeof createLogger>;
  let sessions: DeviceSessionManager;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gateway-session-'));
    bus = new RecordingBus();
    vision = new FakeVision();
    speech = new FakeSpeech();
    metrics = new MetricsRegistry();
    log = createLogger();
    reconnect = new TrackingReconnect({ bus, log, metrics });
    const perception = new PerceptionPipeline({
      config: {
        ...DEFAULT_CONFIG.perception,
        snapshots: { dir: tempDir, maxFiles: 100, maxAgeDays: 7 }
      },
      vision,
      customPrompt: () => '',
      log,
      metrics
    });
    sleep = vi.fn(async (_ms: number) => {});
    sessions = new DeviceSessionManager({
      bus,
      perception,
      speech,
      reconnect,
      confidenceThreshold: () => 0.5,
      visionUrl: localHost => `http://${localHost}:8001/vision/explain`,
      visionToken: 'test-token',
      sleep,
      generateSessionId: () => 'session-1',
      log,
      metrics
    });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  async function connect(socket: FakeDeviceSocket) {
    const done = sessions.handleConnection(socket);
    await reconnect.connected;
    return done;
  }

  it('OutboxFifoAcrossReconnect delivers queued commands in order once a device connects', async () => {
    expect(await sessions.sendToDevice(ttsSentence('one'))).toBe('queued');
    expect(await sessions.sendToDevice(ttsSentence('two'))).toBe('queued');
    expect(await sessions.sendToDevice(ttsSentence('three'))).toBe('queued');
    expect(sessions.outbox.size).toBe(3);

    const socket = new FakeDeviceSocket();
    const done = await connect(socket);

    expect(socket.sentMessages()).toEqual([
      { type: 'tts', state: 'sentence_start', text: 'one' },
      { type: 'tts', state: 'sentence_start', text: 'two' },
      { type: 'tts', state: 'sentence_start', text: 'three' }
    ]);
    expect(sessions.outbox.isEmpty()).toBe(true);
    expect(sleep.mock.calls).toEqual([[100], [100]]);

    socket.disconnect();
    await done;
  });

  it('OutboxRequeueOnFailure keeps the head of the queue when delivery fails', async () => {
    await sessions.sendToDevice(ttsSentence('a'));
    await sessions.sendToDevice(ttsSentence('b'));

    const first = new FakeDeviceSocket();
    first.failSends = true;
    const firstDone = await connect(first);
    expect(sessions.outbox.messages()).toEqual([
      encodeDeviceMessage(ttsSentence('a')),
      encodeDeviceMessage(ttsSentence('b'))
    ]);

    first.disconnect();
    await firstDone;
    expect(await sessions.sendToDevice(ttsSentence('c'))).toBe('queued');

    const second = new FakeDeviceSocket();
    const secondDone = await connect(second);
    expect(second.sentMessages()).toEqual([
      { type: 'tts', state: 'sentence_start', text: 'a' },
      { type: 'tts', state: 'sentence_start', text: 'b' },
      { type: 'tts', state: 'sentence_start', text: 'c' }
    ]);

    second.disconnect();
    await secondDone;
  });

  it('sends directly as soon as the outbox drain has emptied the queue', async () => {
    await sessions.sendToDevice(ttsSentence('queued'));
    const outcomes: Array<Promise<DeliveryOutcome>> = [];
    log.info.mockImplementation((_fields: unknown, message?: unknown) => {
      if (message === 'Flushed queued commands') {
        outcomes.push(sessions.sendToDevice(ttsSentence('follow-up')));
      }
    });

    const socket = new FakeDeviceSocket();
    const done = await connect(socket);

    expect(await Promise.all(outcomes)).toEqual(['sent']);
    expect(socket.sentMessages()).toEqual([
      { type: 'tts', state: 'sentence_start', text: 'queued' },
      { type: 'tts', state: 'sentence_start', text: 'follow-up' }
    ]);
    expect(sessions.outbox.isEmpty()).toBe(true);

    socket.disconnect();
    await done;
  });

  it('sends directly while a session is active and the outbox is empty', async () => {
    const socket = new FakeDeviceSocket();
    const done = await connect(socket);

    expect(await sessions.sendToDevice(ttsSentence('now'))).toBe('sent');
    expect(socket.sentMessages()).toEqual([{ type: 'tts', state: 'sentence_start', text: 'now' }]);
    expect(metrics.getCounter('device', 'sent')).toBe(1);

    socket.disconnect();
    await done;
  });

  it('answers hello with the session reply followed by the vision initialize push', async () => {
    const socket = new FakeDeviceSocket();
    const done = await connect(socket);

    socket.pushMessage({ type: 'hello', version: 1 });
    await vi.waitFor(() => expect(sessions.currentSession()?.id).toBe('session-1'));
    await vi.waitFor(() => expect(socket.sent).toHaveLength(2));

    expect(socket.sentMessages()).toEqual([
      {
        type: 'hello',
        transport: 'websocket',
        session_id: 'session-1',
        audio_params: { sample_rate: 24000, frame_duration: 60 }
      },
      {
        type: 'mcp',
        payload: {
          jsonrpc: '2.0',
          id: 1,
          method: 'initialize',
          params: {
            capabilities: {
              vision: { url: 'http://192.0.2.1:8001/vision/explain', token: 'test-token' }
            }
          }
        }
      }
    ]);
    await vi.waitFor(() => expect(sessions.currentSession()?.state).toBe('active'));
    expect(sessions.nextRpcId()).toBe(2);

    socket.disconnect();
    await done;
  });

  it('publishes connectivity and backs off when the device disconnects', async () => {
    const socket = new FakeDeviceSocket();
    const done = await connect(socket);
    expect(sessions.isActive()).toBe(true);

    socket.disconnect();
    await done;

    expect(bus.valuesFor('binary_sensor/connected')).toEqual(['ON', 'OFF']);
    expect(sessions.isActive()).toBe(false);
    expect(sessions.currentSession()).toBeNull();
    expect(reconnect.currentDelayMs).toBe(2000);
    expect(reconnect.phase).toBe('idle');
  });

  it('supersedes an existing connection without reporting a disconnect', async () => {
    const first = new FakeDeviceSocket();
    const firstDone = await connect(first);
    const second = new FakeDeviceSocket();
    const secondDone = await connect(second);
    await firstDone;

    expect(first.closeCalls).toEqual([{ code: 1000, reason: 'superseded' }]);
    expect(bus.valuesFor('binary_sensor/connected')).toEqual(['ON', 'ON']);
    expect(sessions.isActive()).toBe(true);

    second.disconnect();
    await secondDone;
    expect(bus.valuesFor('binary_sensor/connected')).toEqual(['ON', 'ON', 'OFF']);
  });

  it('runs motion detection and alerts on a confident scene analysis', async () => {
    const socket = new FakeDeviceSocket();
    const done = await connect(socket);
    const dark = grayPng(8, 8, () => 0);
    const bright = grayPng(8, 8, () => 255);

    socket.pushMessage({ type: 'image', payload: { data: dark.toString('hex') } });
    socket.pushMessage({ type: 'image', payload: { data: bright.toString('hex') } });
    await vi.waitFor(() => expect(bus.events).toHaveLength(1));

    expect(bus.images).toHaveLength(2);
    expect(bus.valuesFor('binary_sensor/motion_detected')).toEqual(['OFF', 'ON']);
    expect(bus.valuesFor('sensor/last_event')).toEqual(['A person at the door']);
    expect(bus.events[0]).toEqual({
      type: 'alert',
      data: { description: 'A person at the door', confidence: 0.9 }
    });
    expect(vision.calls).toHaveLength(1);
    expect(vision.calls[0].prompt).toBe(DEFAULT_CONFIG.perception.defaultPrompt);
    expect(fs.readdirSync(tempDir).filter(name => name.endsWith('.png'))).toHaveLength(1);

    socket.disconnect();
    await done;
  });

  it('publishes the description without an alert below the confidence threshold', async () => {
    vision.result = { description: 'An empty hallway', confidence: 0.3 };
    const socket = new FakeDeviceSocket();
    const done = await connect(socket);

    socket.pushMessage({ type: 'image', payload: { data: grayPng(4, 4, () => 10).toString('hex') } });
    socket.pushMessage({ type: 'image', payload: { data: grayPng(4, 4, () => 200).toString('hex') } });
    await vi.waitFor(() => expect(bus.valuesFor('sensor/last_event')).toEqual(['An empty hallway']));

    expect(bus.events).toEqual([]);

    socket.disconnect();
    await done;
  });

  it('reports noise and fires a voice command event for recognized speech', async () => {
    speech.transcript = '  turn on the porch light ';
    const socket = new FakeDeviceSocket();
    const done = await connect(socket);

    socket.pushMessage({ type: 'audio', payload: { data: pcm16(100, 1000).toString('hex') } });
    await vi.waitFor(() => expect(bus.events).toHaveLength(1));

    expect(bus.valuesFor('binary_sensor/noise_detected')).toEqual(['ON']);
    expect(bus.events[0]).toEqual({ type: 'voice_command', data: { text: 'turn on the porch light' } });
    expect(speech.recognized).toHaveLength(1);

    socket.disconnect();
    await done;
  });

  it('ends the listen turn with a tts stop after the configured delay', async () => {
    const socket = new FakeDeviceSocket();
    const done = await connect(socket);

    socket.pushMessage({ type: 'listen', state: 'detect' });
    await vi.waitFor(() => expect(socket.sent).toHaveLength(1));

    expect(sleep).toHaveBeenCalledWith(500);
    expect(socket.sentMessages()).toEqual([{ type: 'tts', state: 'stop' }]);

    socket.disconnect();
    await done;
  });

  it('relays device MCP traffic to the last event sensor', async () => {
    const socket = new FakeDeviceSocket();
    const done = await connect(socket);

    socket.pushMessage({ type: 'mcp', payload: { jsonrpc: '2.0', id: 1, result: {} } });
    await vi.waitFor(() => expect(bus.valuesFor('sensor/last_event')).toHaveLength(1));

    expect(bus.valuesFor('sensor/last_event')).toEqual(['MCP: {"jsonrpc":"2.0","id":1,"result":{}}']);

    socket.disconnect();
    await done;
  });

  it('drops malformed frames and keeps the connection alive', async () => {
    const socket = new FakeDeviceSocket();
    const done = await connect(socket);

    socket.pushText('not json');
    socket.pushMessage({ type: 'image', payload: { data: 'xyz' } });
    socket.pushBinary(Buffer.from([1, 2, 3]));
    socket.pushMessage({ type: 'hello' });
    await vi.waitFor(() => expect(socket.sent).toHaveLength(2));

    expect(metrics.getCounter('device', 'protocolErrors')).toBe(2);
    expect(metrics.getCounter('device', 'binaryFrames')).toBe(1);
    expect(socket.sentTypes()).toEqual(['hello', 'mcp']);

    socket.disconnect();
    await done;
  });

  it('closes the active socket on shutdown', async () => {
    const socket = new FakeDeviceSocket();
    const done = await connect(socket);

    await sessions.close();
    await done;

    expect(socket.closeCalls).toEqual([{ code: 1001, reason: 'shutdown' }]);
  });
});
