import { CollaboratorError } from '../errors.js';

export type VisionResult = {
  description: string;
  confidence: number;
};

/** Image understanding backend. Implementations throw on failure. */
export interface VisionProvider {
  analyze(image: Buffer, prompt: string): Promise<VisionResult>;
  close?(): Promise<void>;
}

export interface SpeechProvider {
  recognize(audio: Buffer): Promise<string>;
  synthesize(text: string): Promise<Buffer>;
  close?(): Promise<void>;
}

export type JsonSchemaObject = {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: readonly string[];
};

export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: JsonSchemaObject;
};

export type ToolArguments = Record<string, unknown>;

export interface ToolExecutor {
  listTools(): ToolDescriptor[];
  execute(name: string, args: ToolArguments): Promise<unknown>;
  close?(): Promise<void>;
}

export type Collaborators = {
  vision: VisionProvider;
  speech: SpeechProvider;
  tools: ToolExecutor;
};

export class UnconfiguredVisionProvider implements VisionProvider {
  async analyze(): Promise<VisionResult> {
    throw new CollaboratorError('No vision provider configured');
  }
}

/** Recognizes nothing and synthesizes no audio. */
export class SilentSpeechProvider implements SpeechProvider {
  async recognize(): Promise<string> {
    return '';
  }

  async synthesize(): Promise<Buffer> {
    return Buffer.alloc(0);
  }
}

export function clampConfidence(value: unknown): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
