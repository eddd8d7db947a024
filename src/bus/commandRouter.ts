import { childLogger, type ComponentLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { SpeechProvider } from '../collaborators/index.js';
import type { PerceptionPipeline } from '../perception/index.js';
import type { DeviceSessionManager } from '../device/session.js';
import {
  alert,
  audioPlay,
  emotion,
  requestFrame,
  toolCall,
  ttsSentence,
  type Emotion
} from '../device/protocol.js';
import { isDisplayMode, type DisplayMode, type RuntimeSettings } from '../settings.js';
import type { BusCommand, BusPublisher } from './adapter.js';
import { formatEntityId } from './topics.js';

export type CommandOutcome =
  | { status: 'handled'; entityId: string }
  | { status: 'rejected'; entityId: string; reason: string }
  | { status: 'unknown'; entityId: string };

export type CommandRoute = (payload: string) => Promise<void | { rejected: string }>;

export interface CommandRouterContext {
  bus: Pick<BusPublisher, 'publishState'>;
  device: Pick<DeviceSessionManager, 'sendToDevice' | 'nextRpcId'>;
  perception: Pick<PerceptionPipeline, 'requestAnalysis' | 'setMotionThreshold' | 'setNoiseThreshold'>;
  settings: RuntimeSettings;
  speech: SpeechProvider;
  /** Notified when monitoring is toggled or its interval changes. */
  onMonitoringChange?: () => void;
  log?: ComponentLogger;
  metrics?: MetricsRegistry;
}

export const DISPLAY_MODE_EMOTIONS: Record<DisplayMode, Emotion> = {
  Clock: 'neutral',
  Weather: 'cool',
  Status: 'thinking',
  'AI Log': 'confident',
  Custom: 'neutral'
};

export type ToolCallCommand = {
  name: string;
  arguments: Record<string, unknown>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts `{"name": ..., "arguments": {...}}` or a bare tool name. */
export function parseToolCallCommand(payload: string): ToolCallCommand {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return { name: payload.trim(), arguments: {} };
  }
  if (!isRecord(parsed)) {
    return { name: payload.trim(), arguments: {} };
  }
  return {
    name: typeof parsed.name === 'string' ? parsed.name : payload.trim(),
    arguments: isRecord(parsed.arguments) ? parsed.arguments : {}
  };
}

function isOn(payload: string) {
  return payload.trim().toUpperCase() === 'ON';
}

function parseNumber(payload: string): number | null {
  const trimmed = payload.trim();
  if (!trimmed) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Maps `component/object` pairs from command topics to handlers. Pairs with
 * no route produce an `unknown` outcome instead of an error.
 */
export class CommandRouter {
  private readonly routes = new Map<string, CommandRoute>();
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly context: CommandRouterContext) {
    this.log = context.log ?? childLogger('commands');
    this.metrics = context.metrics ?? metricsModule;
    this.registerDefaults();
  }

  register(entityId: string, route: CommandRoute) {
    this.routes.set(entityId, route);
  }

  async route(command: Pick<BusCommand, 'component' | 'objectId' | 'payload'>): Promise<CommandOutcome> {
    const entityId = formatEntityId(command);
    const route = this.routes.get(entityId);
    if (!route) {
      this.metrics.increment('commands', 'unknown');
      this.log.warn({ entityId }, 'Unknown bus command');
      return { status: 'unknown', entityId };
    }

    const result = await route(command.payload);
    if (result && 'rejected' in result) {
      this.metrics.increment('commands', 'rejected');
      this.log.warn({ entityId, payload: command.payload, reason: result.rejected }, 'Bus command rejected');
      return { status: 'rejected', entityId, reason: result.rejected };
    }

    this.metrics.increment('commands', 'handled');
    this.log.debug({ entityId }, 'Bus command handled');
    return { status: 'handled', entityId };
  }

  private registerDefaults() {
    const { bus, device, perception, settings, speech } = this.context;
    const echo = (entityId: string, value: string) => bus.publishState(entityId, value);
    const monitoringChanged = () => {
      this.context.onMonitoringChange?.();
    };

    this.register('switch/monitoring', async payload => {
      settings.monitoringEnabled = isOn(payload);
      monitoringChanged();
      this.log.info({ enabled: settings.monitoringEnabled }, 'Monitoring toggled');
      await echo('switch/monitoring', settings.monitoringEnabled ? 'ON' : 'OFF');
    });

    this.register('button/analyze_scene', async () => {
      await device.sendToDevice(alert('Analyzing', 'Analyzing scene...', 'thinking'));
      perception.requestAnalysis();
      await device.sendToDevice(requestFrame());
    });

    this.register('text/custom_prompt', async payload => {
      settings.customPrompt = payload;
      await echo('text/custom_prompt', payload);
    });

    this.register('number/monitoring_interval', async payload => {
      const value = parseNumber(payload);
      if (value === null) {
        return { rejected: 'interval must be a number' };
      }
      const applied = settings.setIntervalSeconds(value);
      monitoringChanged();
      await echo('number/monitoring_interval', String(applied));
    });

    this.register('number/confidence_threshold', async payload => {
      const value = parseNumber(payload);
      if (value === null) {
        return { rejected: 'confidence must be a number' };
      }
      const percent = Math.min(100, Math.max(0, value));
      settings.setConfidenceThreshold(percent / 100);
      await echo('number/confidence_threshold', String(percent));
    });

    this.register('switch/voice_assistant', async payload => {
      settings.voiceAssistant = isOn(payload);
      await echo('switch/voice_assistant', settings.voiceAssistant ? 'ON' : 'OFF');
    });

    this.register('notify/tts', async payload => {
      await device.sendToDevice(ttsSentence(payload));
      let audio: Buffer = Buffer.alloc(0);
      try {
        audio = await speech.synthesize(payload);
      } catch (error) {
        this.log.warn({ err: error }, 'Speech synthesis failed');
      }
      if (audio.length > 0) {
        await device.sendToDevice(audioPlay(audio));
      }
    });

    this.register('siren/alarm', async payload => {
      const on = isOn(payload);
      settings.sirenOn = on;
      await device.sendToDevice(on ? alert('ALARM', 'Alarm triggered!', 'shocked') : emotion('neutral'));
      await echo('siren/alarm', on ? 'ON' : 'OFF');
    });

    this.register('select/display_mode', async payload => {
      const mode = payload.trim();
      if (!isDisplayMode(mode)) {
        return { rejected: `unknown display mode "${mode}"` };
      }
      settings.displayMode = mode;
      await device.sendToDevice(emotion(DISPLAY_MODE_EMOTIONS[mode]));
      await echo('select/display_mode', mode);
    });

    this.register('text/display_message', async payload => {
      await device.sendToDevice(ttsSentence(payload));
      await echo('text/display_message', payload);
    });

    this.register('switch/display_power', async payload => {
      const on = isOn(payload);
      settings.displayPower = on;
      if (on) {
        await device.sendToDevice(emotion('neutral'));
      }
      await echo('switch/display_power', on ? 'ON' : 'OFF');
    });

    this.register('raw/mcp', async payload => {
      const call = parseToolCallCommand(payload);
      if (!call.name) {
        return { rejected: 'tool name is empty' };
      }
      await device.sendToDevice(toolCall(device.nextRpcId(), call.name, call.arguments));
      this.log.info({ tool: call.name }, 'Sent tool call to device');
    });

    this.register('number/motion_threshold', async payload => {
      const value = parseNumber(payload);
      if (value === null) {
        return { rejected: 'threshold must be a number' };
      }
      await echo('number/motion_threshold', String(perception.setMotionThreshold(value)));
    });

    this.register('number/noise_threshold', async payload => {
      const value = parseNumber(payload);
      if (value === null) {
        return { rejected: 'threshold must be a number' };
      }
      await echo('number/noise_threshold', String(perception.setNoiseThreshold(value)));
    });
  }
}
