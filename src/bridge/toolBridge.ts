import { WebSocket, type RawData } from 'ws';
import { childLogger, type ComponentLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { ProtocolError, errorMessage } from '../errors.js';
import type { ToolArguments, ToolExecutor } from '../collaborators/index.js';
import {
  INTERNAL_ERROR,
  METHOD_NOT_FOUND,
  parseRpcMessage,
  rpcError,
  rpcResult,
  type JsonRpcId,
  type RpcError,
  type RpcResult
} from './jsonRpc.js';

export type ToolBridgeState = 'idle' | 'connecting' | 'connected' | 'waiting' | 'stopped';

export interface ToolBridgeOptions {
  url: string;
  executor: ToolExecutor;
  retryDelayMs?: number;
  heartbeatMs?: number;
  protocolVersion?: string;
  serverName?: string;
  serverVersion?: string;
  createSocket?: (url: string) => WebSocket;
  log?: ComponentLogger;
  metrics?: MetricsRegistry;
}

export type ToolCallResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError: boolean;
};

const MAX_HEARTBEAT_MISSES = 2;
const LOG_PREVIEW_LENGTH = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rawText(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(new Uint8Array(data)).toString('utf8');
  }
  return data.toString('utf8');
}

export function formatToolResult(result: unknown): string {
  if (typeof result === 'string') {
    return result;
  }
  if (typeof result === 'object') {
    return JSON.stringify(result);
  }
  return String(result);
}

/**
 * Dials the remote broker and serves JSON-RPC on the connection: the broker
 * is the client and this process answers `initialize`, `tools/list`,
 * `tools/call` and `ping`. Reconnects after `retryDelayMs` until stopped.
 */
export class ToolBridge {
  private socket: WebSocket | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private heartbeat: NodeJS.Timeout | null = null;
  private status: ToolBridgeState = 'idle';
  private handshakeComplete = false;
  private readonly retryDelayMs: number;
  private readonly heartbeatMs: number;
  private readonly createSocket: (url: string) => WebSocket;
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: ToolBridgeOptions) {
    this.retryDelayMs = options.retryDelayMs ?? 10_000;
    this.heartbeatMs = options.heartbeatMs ?? 30_000;
    this.createSocket = options.createSocket ?? (url => new WebSocket(url));
    this.log = options.log ?? childLogger('tool-bridge');
    this.metrics = options.metrics ?? metricsModule;
  }

  get state() {
    return this.status;
  }

  /** True once the broker has sent `notifications/initialized` on the current connection. */
  get initialized() {
    return this.handshakeComplete;
  }

  start() {
    if (this.status !== 'idle' && this.status !== 'stopped') {
      return;
    }
    this.connect();
  }

  async stop() {
    this.status = 'stopped';
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    this.stopHeartbeat();
    const socket = this.socket;
    this.socket = null;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      return;
    }
    await new Promise<void>(resolve => {
      const timer = setTimeout(() => {
        socket.terminate();
        resolve();
      }, 5000);
      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.close(1000, 'shutdown');
    });
    this.log.info('Tool bridge stopped');
  }

  /**
   * Handles one broker frame and returns the reply to send, if any. Invalid
   * JSON is logged and skipped; a request that fails while being served is
   * answered with an internal error.
   */
  async handleMessage(text: string): Promise<RpcResult | RpcError | null> {
    let message;
    try {
      message = parseRpcMessage(text);
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.log.warn({ preview: text.slice(0, LOG_PREVIEW_LENGTH) }, 'Invalid JSON from broker');
        return null;
      }
      throw error;
    }

    switch (message.kind) {
      case 'response':
        return null;
      case 'invalid':
        this.log.debug({ reason: message.reason }, 'Ignoring broker frame');
        return null;
      case 'notification':
        if (message.method === 'notifications/initialized') {
          this.handshakeComplete = true;
          this.log.info('Tool bridge handshake complete');
        } else {
          this.log.debug({ method: message.method }, 'Ignoring broker notification');
        }
        return null;
      case 'request':
        try {
          return await this.handleRequest(message.id, message.method, message.params);
        } catch (error) {
          this.metrics.increment('toolBridge', 'requestsFailed');
          this.log.error({ err: error, method: message.method }, 'Broker request failed');
          return rpcError(message.id, INTERNAL_ERROR, errorMessage(error));
        }
    }
  }

  async callTool(params: Record<string, unknown>): Promise<ToolCallResult> {
    const name = typeof params.name === 'string' ? params.name : '';
    const args: ToolArguments = isRecord(params.arguments) ? params.arguments : {};
    this.log.info(
      { tool: name, arguments: JSON.stringify(args).slice(0, LOG_PREVIEW_LENGTH) },
      'Broker tool call'
    );

    try {
      const result = await this.options.executor.execute(name, args);
      const text = formatToolResult(result);
      this.metrics.increment('toolBridge', 'callsSucceeded');
      this.log.info({ tool: name, result: text.slice(0, LOG_PREVIEW_LENGTH) }, 'Tool call completed');
      return { content: [{ type: 'text', text }], isError: false };
    } catch (error) {
      this.metrics.increment('toolBridge', 'callsFailed');
      this.log.error({ err: error, tool: name }, 'Tool call failed');
      return { content: [{ type: 'text', text: `Error: ${errorMessage(error)}` }], isError: true };
    }
  }

  private async handleRequest(
    id: JsonRpcId,
    method: string,
    params: Record<string, unknown>
  ): Promise<RpcResult | RpcError> {
    switch (method) {
      case 'initialize':
        this.log.info({ clientInfo: params.clientInfo ?? {} }, 'Broker initialize');
        return rpcResult(id, {
          protocolVersion: this.options.protocolVersion ?? '2024-11-05',
          capabilities: { tools: { listChanged: false } },
          serverInfo: {
            name: this.options.serverName ?? 'watcher-gateway',
            version: this.options.serverVersion ?? '1.0.0'
          }
        });
      case 'tools/list': {
        const tools = this.options.executor.listTools();
        this.log.info({ count: tools.length }, 'Sent tool catalog to broker');
        return rpcResult(id, { tools });
      }
      case 'tools/call':
        return rpcResult(id, await this.callTool(params));
      case 'ping':
        return rpcResult(id, {});
      default:
        this.log.debug({ method }, 'Unknown broker method');
        return rpcError(id, METHOD_NOT_FOUND, `Method not found: ${method}`);
    }
  }

  private connect() {
    this.status = 'connecting';
    this.handshakeComplete = false;
    this.log.info({ url: this.options.url }, 'Connecting to tool broker');

    let socket: WebSocket;
    try {
      socket = this.createSocket(this.options.url);
    } catch (error) {
      this.log.error({ err: error }, 'Tool broker connection failed');
      this.scheduleReconnect();
      return;
    }
    this.socket = socket;

    let alive = true;
    let missedPongs = 0;

    socket.on('open', () => {
      this.status = 'connected';
      this.metrics.increment('toolBridge', 'connections');
      this.log.info('Connected to tool broker');
      this.heartbeat = setInterval(() => {
        if (!alive) {
          missedPongs += 1;
          if (missedPongs >= MAX_HEARTBEAT_MISSES) {
            this.log.warn('Tool broker heartbeat lost');
            socket.terminate();
            return;
          }
        } else {
          missedPongs = 0;
        }
        alive = false;
        socket.ping();
      }, this.heartbeatMs);
    });

    socket.on('pong', () => {
      alive = true;
    });

    socket.on('message', (data: RawData) => {
      alive = true;
      void this.handleMessage(rawText(data))
        .then(reply => this.reply(socket, reply))
        .catch((error: unknown) => {
          this.log.error({ err: error }, 'Failed to handle broker message');
        });
    });

    socket.on('error', error => {
      this.log.warn({ err: error }, 'Tool broker socket error');
    });

    socket.on('close', (code: number) => {
      if (this.socket === socket) {
        this.socket = null;
      }
      this.stopHeartbeat();
      this.handshakeComplete = false;
      this.log.info({ code }, 'Tool broker connection closed');
      this.scheduleReconnect();
    });
  }

  private async reply(socket: WebSocket, message: RpcResult | RpcError | null) {
    if (!message) {
      return;
    }
    if (socket.readyState !== WebSocket.OPEN) {
      this.log.warn({ id: message.id }, 'Dropping reply: broker connection closed');
      return;
    }
    await new Promise<void>(resolve => {
      socket.send(JSON.stringify(message), error => {
        if (error) {
          this.log.warn({ err: error, id: message.id }, 'Failed to send reply to broker');
        }
        resolve();
      });
    });
  }

  private scheduleReconnect() {
    if (this.status === 'stopped') {
      return;
    }
    this.status = 'waiting';
    this.log.info({ delayMs: this.retryDelayMs }, 'Reconnecting to tool broker after delay');
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (this.status !== 'stopped') {
        this.connect();
      }
    }, this.retryDelayMs);
  }

  private stopHeartbeat() {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }
}
