import type { ToolArguments, ToolDescriptor, ToolExecutor } from '../collaborators/index.js';
import { CollaboratorError, UnknownToolError, errorMessage } from '../errors.js';
import { TOOL_CATALOG, type ToolName } from './catalog.js';

export type ToolHandler = (args: ToolArguments) => unknown | Promise<unknown>;

export type ToolHandlers = Partial<Record<ToolName, ToolHandler>>;

/**
 * Name to handler map over a declared catalog. Every catalog entry is listed;
 * calling one whose handler is not registered is a collaborator failure, and
 * a name outside the catalog raises UnknownToolError.
 */
export class ToolRegistry implements ToolExecutor {
  private readonly descriptors = new Map<string, ToolDescriptor>();
  private readonly handlers = new Map<string, ToolHandler>();

  constructor(handlers: ToolHandlers = {}, catalog: readonly ToolDescriptor[] = TOOL_CATALOG) {
    for (const descriptor of catalog) {
      this.descriptors.set(descriptor.name, descriptor);
    }
    for (const [name, handler] of Object.entries(handlers)) {
      if (handler) {
        this.register(name, handler);
      }
    }
  }

  register(name: string, handler: ToolHandler) {
    if (!this.descriptors.has(name)) {
      throw new UnknownToolError(name);
    }
    this.handlers.set(name, handler);
    return () => {
      if (this.handlers.get(name) === handler) {
        this.handlers.delete(name);
      }
    };
  }

  listTools(): ToolDescriptor[] {
    return Array.from(this.descriptors.values(), descriptor => ({
      name: descriptor.name,
      description: descriptor.description,
      inputSchema: descriptor.inputSchema
    }));
  }

  async execute(name: string, args: ToolArguments): Promise<unknown> {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new UnknownToolError(name);
    }

    const handler = this.handlers.get(name);
    if (!handler) {
      throw new CollaboratorError(`Tool not available: ${name}`);
    }

    const missing = (descriptor.inputSchema.required ?? []).filter(key => args[key] === undefined);
    if (missing.length > 0) {
      throw new CollaboratorError(`Missing required argument: ${missing.join(', ')}`);
    }

    try {
      return await handler(args);
    } catch (error) {
      if (error instanceof CollaboratorError) {
        throw error;
      }
      throw new CollaboratorError(errorMessage(error), { cause: error });
    }
  }
}
