import type { DeviceIdentity } from '../config/index.js';
import { DISPLAY_MODES } from '../settings.js';
import type { TopicScheme } from './topics.js';

export type EntityComponent =
  | 'image'
  | 'switch'
  | 'sensor'
  | 'text'
  | 'button'
  | 'binary_sensor'
  | 'number'
  | 'notify'
  | 'siren'
  | 'select';

export type EntityDescriptor = {
  component: EntityComponent;
  objectId: string;
  name: string;
  /** Suffix of `unique_id` when it differs from the object id. */
  uniqueSuffix?: string;
  hasState: boolean;
  hasCommand: boolean;
  /** Published by `publishInitialStates`; null for stateless entities. */
  initialState: string | null;
  attributes: Readonly<Record<string, unknown>>;
};

const onOff = { payload_on: 'ON', payload_off: 'OFF' } as const;

export const ENTITY_CATALOG: readonly EntityDescriptor[] = [
  {
    component: 'image',
    objectId: 'snapshot',
    name: 'Watcher Snapshot',
    hasState: false,
    hasCommand: false,
    initialState: null,
    attributes: {}
  },
  {
    component: 'switch',
    objectId: 'monitoring',
    name: 'Watcher Monitoring',
    hasState: true,
    hasCommand: true,
    initialState: 'OFF',
    attributes: { ...onOff }
  },
  {
    component: 'sensor',
    objectId: 'last_event',
    name: 'Watcher Last Event',
    hasState: true,
    hasCommand: false,
    initialState: '',
    attributes: { icon: 'mdi:message-text' }
  },
  {
    component: 'text',
    objectId: 'custom_prompt',
    name: 'Watcher Custom Prompt',
    hasState: true,
    hasCommand: true,
    initialState: '',
    attributes: { mode: 'text', max: 500 }
  },
  {
    component: 'button',
    objectId: 'analyze_scene',
    name: 'Watcher Analyze Scene',
    hasState: false,
    hasCommand: true,
    initialState: null,
    attributes: { payload_press: 'PRESS', icon: 'mdi:eye' }
  },
  {
    component: 'binary_sensor',
    objectId: 'motion_detected',
    name: 'Watcher Motion Detected',
    hasState: true,
    hasCommand: false,
    initialState: 'OFF',
    attributes: { ...onOff, device_class: 'motion' }
  },
  {
    component: 'number',
    objectId: 'monitoring_interval',
    name: 'Watcher Monitoring Interval',
    hasState: true,
    hasCommand: true,
    initialState: '30',
    attributes: { min: 10, max: 300, step: 1, unit_of_measurement: 's', icon: 'mdi:timer' }
  },
  {
    component: 'number',
    objectId: 'confidence_threshold',
    name: 'Watcher Confidence Threshold',
    hasState: true,
    hasCommand: true,
    initialState: '50',
    attributes: { min: 0, max: 100, step: 1, unit_of_measurement: '%', icon: 'mdi:percent' }
  },
  {
    component: 'switch',
    objectId: 'voice_assistant',
    name: 'Watcher Voice Assistant',
    hasState: true,
    hasCommand: true,
    initialState: 'OFF',
    attributes: { ...onOff, icon: 'mdi:microphone' }
  },
  {
    component: 'notify',
    objectId: 'tts',
    name: 'Watcher TTS',
    hasState: false,
    hasCommand: true,
    initialState: null,
    attributes: { icon: 'mdi:text-to-speech' }
  },
  {
    component: 'siren',
    objectId: 'alarm',
    name: 'Watcher Siren',
    uniqueSuffix: 'siren',
    hasState: true,
    hasCommand: true,
    initialState: 'OFF',
    attributes: {
      ...onOff,
      available_tones: ['alarm', 'alert', 'chime'],
      support_duration: true,
      support_volume_set: true
    }
  },
  {
    component: 'binary_sensor',
    objectId: 'noise_detected',
    name: 'Watcher Noise Detected',
    hasState: true,
    hasCommand: false,
    initialState: 'OFF',
    attributes: { ...onOff, device_class: 'sound' }
  },
  {
    component: 'select',
    objectId: 'display_mode',
    name: 'Watcher Display Mode',
    hasState: true,
    hasCommand: true,
    initialState: 'Clock',
    attributes: { options: [...DISPLAY_MODES], icon: 'mdi:monitor' }
  },
  {
    component: 'text',
    objectId: 'display_message',
    name: 'Watcher Display Message',
    hasState: true,
    hasCommand: true,
    initialState: '',
    attributes: { mode: 'text', max: 100, icon: 'mdi:message-text-outline' }
  },
  {
    component: 'switch',
    objectId: 'display_power',
    name: 'Watcher Display Power',
    hasState: true,
    hasCommand: true,
    initialState: 'ON',
    attributes: { ...onOff, icon: 'mdi:monitor-shimmer' }
  },
  {
    component: 'binary_sensor',
    objectId: 'connected',
    name: 'Watcher Connected',
    hasState: true,
    hasCommand: false,
    initialState: 'OFF',
    attributes: { ...onOff, device_class: 'connectivity' }
  }
];

export const EVENT_TYPES = ['alert', 'voice_command'] as const;

export type EventType = (typeof EVENT_TYPES)[number];

const EVENT_NAMES: Record<EventType, string> = {
  alert: 'Watcher Alert',
  voice_command: 'Watcher Voice Command'
};

export function discoveryPayload(
  descriptor: EntityDescriptor,
  topics: TopicScheme,
  device: DeviceIdentity
): Record<string, unknown> {
  const { component, objectId } = descriptor;
  const payload: Record<string, unknown> = {
    name: descriptor.name,
    unique_id: `${topics.nodeId}_${descriptor.uniqueSuffix ?? objectId}`
  };
  if (component === 'image') {
    payload.image_topic = topics.image();
  }
  if (descriptor.hasState) {
    payload.state_topic = topics.state(component, objectId);
  }
  if (descriptor.hasCommand) {
    payload.command_topic = topics.command(component, objectId);
  }
  return { ...payload, ...descriptor.attributes, device };
}

export function eventDiscoveryPayload(
  eventType: EventType,
  topics: TopicScheme,
  device: DeviceIdentity
): Record<string, unknown> {
  return {
    name: EVENT_NAMES[eventType],
    unique_id: `${topics.nodeId}_${eventType}`,
    state_topic: topics.eventState(eventType),
    event_types: [eventType],
    device
  };
}
