import type { ToolDescriptor } from '../collaborators/index.js';

export const TOOL_NAMES = [
  'get_states',
  'call_service',
  'get_weather',
  'send_notification',
  'get_calendar',
  'control_media'
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

const MEDIA_ACTIONS = [
  'media_play',
  'media_pause',
  'media_stop',
  'media_next_track',
  'media_previous_track',
  'toggle'
] as const;

export const TOOL_CATALOG: readonly ToolDescriptor[] = [
  {
    name: 'get_states',
    description: 'Get current states of Home Assistant entities',
    inputSchema: {
      type: 'object',
      properties: {
        entity_ids: {
          type: 'array',
          items: { type: 'string' },
          description: 'List of entity IDs to query'
        }
      },
      required: ['entity_ids']
    }
  },
  {
    name: 'call_service',
    description: 'Call a Home Assistant service',
    inputSchema: {
      type: 'object',
      properties: {
        domain: { type: 'string', description: 'The service domain (e.g., light, switch)' },
        service: { type: 'string', description: 'The service name (e.g., turn_on, toggle)' },
        data: { type: 'object', description: 'Service data parameters' }
      },
      required: ['domain', 'service', 'data']
    }
  },
  {
    name: 'get_weather',
    description: 'Get current weather information from a weather entity',
    inputSchema: {
      type: 'object',
      properties: {
        entity_id: { type: 'string', description: 'The weather entity ID (e.g., weather.home)' }
      },
      required: ['entity_id']
    }
  },
  {
    name: 'send_notification',
    description: 'Send a persistent notification to Home Assistant',
    inputSchema: {
      type: 'object',
      properties: {
        message: { type: 'string', description: 'The notification message content' },
        title: { type: 'string', description: 'Optional notification title' }
      },
      required: ['message']
    }
  },
  {
    name: 'get_calendar',
    description: 'Get events from a Home Assistant calendar entity',
    inputSchema: {
      type: 'object',
      properties: {
        entity_id: { type: 'string', description: 'The calendar entity ID' },
        days: { type: 'integer', description: 'Number of days ahead to fetch events', default: 7 }
      },
      required: ['entity_id']
    }
  },
  {
    name: 'control_media',
    description: 'Control a media player entity',
    inputSchema: {
      type: 'object',
      properties: {
        entity_id: { type: 'string', description: 'The media_player entity ID' },
        action: {
          type: 'string',
          enum: [...MEDIA_ACTIONS],
          description: 'The action to perform'
        }
      },
      required: ['entity_id', 'action']
    }
  }
];
