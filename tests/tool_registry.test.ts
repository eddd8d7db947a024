import { describe, expect, it } from 'vitest';
import { ToolRegistry } from '../src/tools/registry.js';
import { TOOL_NAMES } from '../src/tools/catalog.js';
import { CollaboratorError, UnknownToolError } from '../src/errors.js';

describe('ToolRegistry', () => {
  it('lists every catalog tool whether or not a handler is registered', () => {
    const registry = new ToolRegistry();
    expect(registry.listTools().map(tool => tool.name)).toEqual([...TOOL_NAMES]);
    expect(registry.listTools()[0].inputSchema.required).toEqual(['entity_ids']);
  });

  it('runs registered handlers with their arguments', async () => {
    const registry = new ToolRegistry({
      get_weather: args => ({ entity: args.entity_id, state: 'sunny' })
    });

    expect(await registry.execute('get_weather', { entity_id: 'weather.home' })).toEqual({
      entity: 'weather.home',
      state: 'sunny'
    });
  });

  it('rejects names outside the catalog', async () => {
    const registry = new ToolRegistry();
    await expect(registry.execute('launch_rocket', {})).rejects.toBeInstanceOf(UnknownToolError);
    expect(() => registry.register('launch_rocket', () => null)).toThrow(UnknownToolError);
  });

  it('reports catalog tools without a handler as unavailable', async () => {
    const registry = new ToolRegistry();
    await expect(registry.execute('get_calendar', { entity_id: 'calendar.home' })).rejects.toThrow(
      'Tool not available: get_calendar'
    );
  });

  it('checks required arguments before calling the handler', async () => {
    let calls = 0;
    const registry = new ToolRegistry({
      call_service: () => {
        calls += 1;
        return 'ok';
      }
    });

    await expect(registry.execute('call_service', { domain: 'light' })).rejects.toThrow(
      'Missing required argument: service, data'
    );
    expect(calls).toBe(0);
  });

  it('wraps handler failures as collaborator errors', async () => {
    const registry = new ToolRegistry({
      send_notification: () => {
        throw new Error('service unavailable');
      }
    });

    const failure = registry.execute('send_notification', { message: 'hi' });
    await expect(failure).rejects.toBeInstanceOf(CollaboratorError);
    await expect(failure).rejects.toThrow('service unavailable');
  });

  it('unregisters a handler through the returned disposer', async () => {
    const registry = new ToolRegistry();
    const dispose = registry.register('control_media', () => 'playing');
    expect(await registry.execute('control_media', { entity_id: 'media_player.tv', action: 'toggle' })).toBe(
      'playing'
    );

    dispose();
    await expect(
      registry.execute('control_media', { entity_id: 'media_player.tv', action: 'toggle' })
    ).rejects.toThrow('Tool not available: control_media');
  });
});
