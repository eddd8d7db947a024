export type EntityRef = {
  component: string;
  objectId: string;
};

/** Topic naming for one node under a discovery prefix. */
export class TopicScheme {
  constructor(
    readonly nodeId: string,
    readonly discoveryPrefix = 'homeassistant'
  ) {}

  discovery(component: string, objectId: string) {
    return `${this.discoveryPrefix}/${component}/${this.nodeId}/${objectId}/config`;
  }

  state(component: string, objectId: string) {
    return `${this.nodeId}/${component}/${objectId}/state`;
  }

  command(component: string, objectId: string) {
    return `${this.nodeId}/${component}/${objectId}/set`;
  }

  commandWildcard() {
    return `${this.nodeId}/+/+/set`;
  }

  image() {
    return `${this.nodeId}/image/snapshot/image`;
  }

  eventState(eventType: string) {
    return `${this.nodeId}/event/${eventType}/state`;
  }

  eventDiscovery(eventType: string) {
    return `${this.discoveryPrefix}/event/${this.nodeId}_${eventType}/config`;
  }

  /** State topic for `component/object` ids; a bare id maps to `<node>/<id>/state`. */
  stateForEntity(entityId: string) {
    const ref = parseEntityId(entityId);
    return ref ? this.state(ref.component, ref.objectId) : `${this.nodeId}/${entityId}/state`;
  }

  /** Extracts component and object id from `<node>/<component>/<object>/set`. */
  parseCommand(topic: string): EntityRef | null {
    const parts = topic.split('/');
    if (parts.length !== 4 || parts[0] !== this.nodeId || parts[3] !== 'set') {
      return null;
    }
    const [, component, objectId] = parts;
    if (!component || !objectId) {
      return null;
    }
    return { component, objectId };
  }
}

export function parseEntityId(entityId: string): EntityRef | null {
  const separator = entityId.indexOf('/');
  if (separator <= 0 || separator === entityId.length - 1) {
    return null;
  }
  return {
    component: entityId.slice(0, separator),
    objectId: entityId.slice(separator + 1)
  };
}

export function formatEntityId(ref: EntityRef) {
  return `${ref.component}/${ref.objectId}`;
}
