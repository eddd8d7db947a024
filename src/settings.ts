import type { MonitoringConfig } from './config/index.js';

export const DISPLAY_MODES = ['Clock', 'Weather', 'Status', 'AI Log', 'Custom'] as const;

export type DisplayMode = (typeof DISPLAY_MODES)[number];

export const MIN_MONITORING_INTERVAL_SECONDS = 10;
export const MAX_MONITORING_INTERVAL_SECONDS = 300;

export function isDisplayMode(value: string): value is DisplayMode {
  return DISPLAY_MODES.some(mode => mode === value);
}

export type RuntimeSettingsSnapshot = {
  monitoringEnabled: boolean;
  customPrompt: string;
  intervalSeconds: number;
  confidenceThreshold: number;
  voiceAssistant: boolean;
  displayMode: DisplayMode;
  displayPower: boolean;
  sirenOn: boolean;
};

/**
 * Operator settings changed from the bus. Mutated only from the serial task
 * queue, so readers never see a half-applied command.
 */
export class RuntimeSettings {
  monitoringEnabled: boolean;
  customPrompt: string;
  voiceAssistant = false;
  displayMode: DisplayMode = 'Clock';
  displayPower = true;
  sirenOn = false;
  private interval: number;
  private confidence: number;

  constructor(monitoring: MonitoringConfig) {
    this.monitoringEnabled = monitoring.enabled;
    this.customPrompt = monitoring.customPrompt;
    this.interval = clampInterval(monitoring.intervalSeconds);
    this.confidence = clampUnit(monitoring.confidenceThreshold);
  }

  get intervalSeconds() {
    return this.interval;
  }

  /** Rounds and clamps to 10-300 seconds; returns the stored value. */
  setIntervalSeconds(seconds: number) {
    this.interval = clampInterval(seconds);
    return this.interval;
  }

  get confidenceThreshold() {
    return this.confidence;
  }

  setConfidenceThreshold(value: number) {
    this.confidence = clampUnit(value);
    return this.confidence;
  }

  /** Entity states as the command router echoes them, keyed by `component/object-id`. */
  busStates(): Record<string, string> {
    const onOff = (value: boolean) => (value ? 'ON' : 'OFF');
    return {
      'switch/monitoring': onOff(this.monitoringEnabled),
      'text/custom_prompt': this.customPrompt,
      'number/monitoring_interval': String(this.interval),
      'number/confidence_threshold': String(Math.round(this.confidence * 10_000) / 100),
      'switch/voice_assistant': onOff(this.voiceAssistant),
      'select/display_mode': this.displayMode,
      'switch/display_power': onOff(this.displayPower),
      'siren/alarm': onOff(this.sirenOn)
    };
  }

  snapshot(): RuntimeSettingsSnapshot {
    return {
      monitoringEnabled: this.monitoringEnabled,
      customPrompt: this.customPrompt,
      intervalSeconds: this.interval,
      confidenceThreshold: this.confidence,
      voiceAssistant: this.voiceAssistant,
      displayMode: this.displayMode,
      displayPower: this.displayPower,
      sirenOn: this.sirenOn
    };
  }
}

function clampInterval(seconds: number) {
  const rounded = Math.round(seconds);
  return Math.min(MAX_MONITORING_INTERVAL_SECONDS, Math.max(MIN_MONITORING_INTERVAL_SECONDS, rounded));
}

function clampUnit(value: number) {
  return Math.min(1, Math.max(0, value));
}
