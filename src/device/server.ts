import http, { type IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { URL } from 'node:url';
import { WebSocketServer } from 'ws';
import { childLogger, type ComponentLogger } from '../logger.js';
import { TransportError } from '../errors.js';
import type { DeviceSessionManager } from './session.js';
import type { ReconnectController } from './reconnect.js';
import { requestHost } from '../utils/host.js';
import { WsDeviceSocket } from './socket.js';

export interface DeviceServerOptions {
  host: string;
  port: number;
  path: string;
  sessions: DeviceSessionManager;
  reconnect: ReconnectController;
  log?: ComponentLogger;
}

/**
 * WebSocket listener for the device. Upgrades on the configured path are
 * handed to the session manager; when the listener fails it is reopened after
 * the reconnect controller's current delay.
 */
export class DeviceServer {
  private server: http.Server | null = null;
  private readonly wss = new WebSocketServer({ noServer: true });
  private retryTimer: NodeJS.Timeout | null = null;
  private stopped = false;
  private boundPort: number | null = null;
  private readonly log: ComponentLogger;

  constructor(private readonly options: DeviceServerOptions) {
    this.log = options.log ?? childLogger('device-server');
  }

  get port() {
    return this.boundPort;
  }

  isListening() {
    return this.server?.listening === true;
  }

  async start(): Promise<number> {
    this.stopped = false;
    return this.listen();
  }

  async stop() {
    this.stopped = true;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    for (const client of this.wss.clients) {
      client.terminate();
    }
    const server = this.server;
    this.server = null;
    if (server) {
      await closeServer(server);
    }
    this.wss.close();
    this.log.info('Device listener stopped');
  }

  private listen(): Promise<number> {
    const { host, port, path } = this.options;
    const server = http.createServer((_req, res) => {
      res.writeHead(426, { 'Content-Type': 'text/plain' });
      res.end('Upgrade Required');
    });
    server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(request, socket, head);
    });

    return new Promise<number>((resolve, reject) => {
      const onError = (error: Error) => {
        server.removeListener('listening', onListening);
        reject(new TransportError(`Device listener failed on ${host}:${port}`, { cause: error }));
      };
      const onListening = () => {
        server.removeListener('error', onError);
        server.on('error', error => {
          this.handleListenerFailure(server, error);
        });
        const address = server.address();
        const actualPort = typeof address === 'object' && address ? address.port : port;
        this.server = server;
        this.boundPort = actualPort;
        this.log.info({ host, port: actualPort, path }, 'Device WebSocket listener started');
        resolve(actualPort);
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(port, host);
    });
  }

  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer) {
    const url = new URL(request.url ?? '/', `http://${request.headers.host ?? 'localhost'}`);
    if (url.pathname !== this.options.path) {
      socket.destroy();
      return;
    }

    this.wss.handleUpgrade(request, socket, head, ws => {
      const remoteAddress = request.socket.remoteAddress ?? 'unknown';
      const socket = new WsDeviceSocket(ws, remoteAddress, requestHost(request));
      void this.options.sessions.handleConnection(socket);
    });
  }

  private handleListenerFailure(server: http.Server, error: Error) {
    if (this.server !== server) {
      return;
    }
    this.server = null;
    this.log.error({ err: error }, 'Device listener failed');
    server.close();
    this.scheduleRelisten();
  }

  private scheduleRelisten() {
    if (this.stopped) {
      return;
    }
    const delayMs = this.options.reconnect.recordFailure();
    this.log.info({ delayMs }, 'Reopening device listener after delay');
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (this.stopped) {
        return;
      }
      void this.listen().then(
        port => {
          this.log.info({ port }, 'Device listener restored');
        },
        (error: unknown) => {
          this.log.error({ err: error }, 'Device listener restart failed');
          this.scheduleRelisten();
        }
      );
    }, delayMs);
  }
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.closeAllConnections();
    server.close(error => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
