import http from 'node:http';
import { childLogger, type ComponentLogger } from '../logger.js';
import { TransportError } from '../errors.js';
import { createHandshakeRouter, HandshakeRouter, type HandshakeRouterOptions } from './routes/handshake.js';

export interface HttpServerOptions extends HandshakeRouterOptions {
  port?: number;
  host?: string;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  router: HandshakeRouter;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? options.config.port;
  const host = options.host ?? options.config.host;
  const log: ComponentLogger = options.log ?? childLogger('handshake');
  const router = createHandshakeRouter({ ...options, log });

  const server = http.createServer((req, res) => {
    try {
      if (router.handle(req, res)) {
        return;
      }

      res.statusCode = 404;
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ error: 'Not found' }));
    } catch (error) {
      log.error({ err: error }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => {
      reject(new TransportError(`Handshake server failed on ${host}:${port}`, { cause: error }));
    };
    server.once('error', onError);
    server.listen(port, host, () => {
      server.removeListener('error', onError);
      server.on('error', error => {
        log.error({ err: error }, 'Handshake server error');
      });
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  log.info({ port: actualPort, host }, 'Handshake HTTP server listening');

  return {
    server,
    port: actualPort,
    router,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      })
  };
}

export default startHttpServer;
