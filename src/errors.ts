export type GatewayErrorKind = 'transport' | 'protocol' | 'collaborator' | 'config';

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;

  constructor(kind: GatewayErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = 'GatewayError';
  }
}

/** Socket, bus or HTTP failure. Retried by the owning loop, never fatal. */
export class TransportError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport', message, options);
    this.name = 'TransportError';
  }
}

/** Malformed or unexpected input from a peer. The message is dropped. */
export class ProtocolError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('protocol', message, options);
    this.name = 'ProtocolError';
  }
}

export class CollaboratorError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('collaborator', message, options);
    this.name = 'CollaboratorError';
  }
}

export class UnknownToolError extends CollaboratorError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.toolName = toolName;
    this.name = 'UnknownToolError';
  }
}

export class ConfigError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
