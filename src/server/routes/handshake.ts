import fs from 'node:fs';
import { IncomingMessage, ServerResponse } from 'node:http';
import path from 'node:path';
import { URL } from 'node:url';
import busboy from 'busboy';
import { childLogger, type ComponentLogger } from '../../logger.js';
import metricsModule, { type MetricsRegistry } from '../../metrics/index.js';
import { AppLifecycle, summarizeHealth, type HealthIndicatorContext } from '../../app.js';
import type { HandshakeConfig } from '../../config/index.js';
import type { BusPublisher } from '../../bus/adapter.js';
import type { PerceptionPipeline } from '../../perception/index.js';
import { ProtocolError, errorMessage } from '../../errors.js';
import { requestHost } from '../../utils/host.js';

export type DeviceCheckin = {
  mac: string;
  firmwareVersion: string;
  ip: string;
  receivedAt: number;
};

export interface HandshakeRouterOptions {
  config: HandshakeConfig;
  /** Port the device WebSocket listener is bound to. */
  websocketPort: () => number;
  websocketPath: string;
  bus: Pick<BusPublisher, 'publishImage' | 'publishState'>;
  perception: Pick<PerceptionPipeline, 'describe'>;
  lifecycle?: AppLifecycle;
  service?: () => HealthIndicatorContext['service'];
  clock?: () => number;
  log?: ComponentLogger;
  metrics?: MetricsRegistry;
}

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

type MultipartUpload = {
  file: Buffer | null;
  question: string | null;
  truncated: boolean;
};

export const DEFAULT_QUESTION = 'What do you see?';
export const LAST_PHOTO_FILE = 'last_photo.jpg';
const LAST_EVENT_MAX_LENGTH = 255;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function normalizeMac(mac: string): string {
  return mac.replace(/[:-]/g, '').toLowerCase();
}

/**
 * Device-facing HTTP surface: version and firmware downloads, the check-in
 * that hands out the WebSocket URL, and photo uploads from the camera.
 */
export class HandshakeRouter {
  private readonly handlers: Handler[];
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private readonly clock: () => number;
  private checkin: DeviceCheckin | null = null;

  constructor(private readonly options: HandshakeRouterOptions) {
    this.log = options.log ?? childLogger('handshake');
    this.metrics = options.metrics ?? metricsModule;
    this.clock = options.clock ?? Date.now;
    this.handlers = [
      (req, res, url) => this.handleVersion(req, res, url),
      (req, res, url) => this.handleFirmware(req, res, url),
      (req, res, url) => this.handleCheckin(req, res, url),
      (req, res, url) => this.handleVisionIngest(req, res, url),
      (req, res, url) => this.handleHealth(req, res, url),
      (req, res, url) => this.handleMetrics(req, res, url)
    ];
  }

  get lastCheckin(): DeviceCheckin | null {
    return this.checkin;
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }

    return false;
  }

  private handleVersion(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || (url.pathname !== '/version' && url.pathname !== '/ota/version')) {
      return false;
    }
    sendJson(res, 200, { ...this.options.config.version });
    return true;
  }

  private handleFirmware(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || (url.pathname !== '/firmware' && url.pathname !== '/ota/firmware')) {
      return false;
    }

    const firmwarePath = path.resolve(this.options.config.firmwarePath);
    let stats: fs.Stats;
    try {
      stats = fs.statSync(firmwarePath);
    } catch {
      sendJson(res, 404, { error: 'Firmware not found' });
      return true;
    }
    if (!stats.isFile()) {
      sendJson(res, 404, { error: 'Firmware not found' });
      return true;
    }

    res.writeHead(200, {
      'Content-Type': 'application/octet-stream',
      'Content-Length': stats.size
    });
    const stream = fs.createReadStream(firmwarePath);
    stream.on('error', error => {
      this.log.error({ err: error }, 'Failed to read firmware image');
      res.destroy(error);
    });
    stream.pipe(res);
    this.metrics.increment('handshake', 'firmwareDownloads');
    return true;
  }

  private handleCheckin(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (
      req.method !== 'POST' ||
      (url.pathname !== '/checkin' && url.pathname !== '/ota' && url.pathname !== '/ota/')
    ) {
      return false;
    }

    void this.respondToCheckin(req, res);
    return true;
  }

  private async respondToCheckin(req: IncomingMessage, res: ServerResponse) {
    try {
      const body = await readBody(req, this.options.config.maxBodyBytes);
      if (body.truncated) {
        this.metrics.increment('handshake', 'oversizedCheckins');
        this.log.warn({ limitBytes: this.options.config.maxBodyBytes }, 'Check-in body over limit; reading as empty');
      }
      const info = parseCheckinBody(body.truncated ? Buffer.alloc(0) : body.raw);
      const application = isRecord(info.application) ? info.application : {};
      const board = isRecord(info.board) ? info.board : {};
      const mac = readString(info, 'mac_address');
      const checkin: DeviceCheckin = {
        mac: mac ? normalizeMac(mac) : 'unknown',
        firmwareVersion: readString(application, 'version') ?? 'unknown',
        ip: readString(board, 'ip') ?? req.socket.remoteAddress ?? 'unknown',
        receivedAt: this.clock()
      };
      this.checkin = checkin;

      const host = this.options.config.publicHost || requestHost(req);
      const websocketUrl = `ws://${host}:${this.options.websocketPort()}${this.options.websocketPath}`;
      this.metrics.increment('handshake', 'checkins');
      this.log.info(
        { mac: checkin.mac, version: checkin.firmwareVersion, ip: checkin.ip, websocketUrl },
        'Device check-in'
      );

      sendJson(res, 200, {
        server_time: { timestamp: checkin.receivedAt, timezone_offset: 0 },
        websocket: { url: websocketUrl },
        firmware: {}
      });
    } catch (error) {
      this.metrics.increment('handshake', 'errors');
      this.log.error({ err: error }, 'Check-in failed');
      sendJson(res, 500, { error: errorMessage(error) });
    }
  }

  private handleVisionIngest(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (
      req.method !== 'POST' ||
      (url.pathname !== '/vision-ingest' && url.pathname !== '/vision/explain')
    ) {
      return false;
    }

    void this.ingestPhoto(req, res);
    return true;
  }

  private async ingestPhoto(req: IncomingMessage, res: ServerResponse) {
    const { bus, perception, config } = this.options;
    try {
      const upload = await readMultipart(req, config.maxBodyBytes);
      if (upload.truncated) {
        sendJson(res, 413, { success: false, message: 'Image too large' });
        return;
      }
      const image = upload.file;
      if (!image || image.length === 0) {
        sendJson(res, 400, { success: false, message: 'No image received' });
        return;
      }

      const question = upload.question ?? DEFAULT_QUESTION;
      this.metrics.increment('handshake', 'photos');
      this.log.info({ bytes: image.length, question }, 'Received camera photo');

      await fs.promises.mkdir(config.dataDir, { recursive: true });
      await fs.promises.writeFile(path.join(config.dataDir, LAST_PHOTO_FILE), image);
      await bus.publishImage(image);

      const description = (await perception.describe(image, question)) ?? `Photo captured (${image.length} bytes)`;
      await bus.publishState('sensor/last_event', description.slice(0, LAST_EVENT_MAX_LENGTH));

      sendJson(res, 200, { success: true, message: description });
    } catch (error) {
      this.metrics.increment('handshake', 'errors');
      this.log.error({ err: error }, 'Photo ingest failed');
      sendJson(res, error instanceof ProtocolError ? 400 : 500, { success: false, message: errorMessage(error) });
    }
  }

  private handleHealth(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || url.pathname !== '/health') {
      return false;
    }

    const lifecycle = this.options.lifecycle;
    const service = this.options.service?.() ?? { status: 'ok', startedAt: null };
    if (!lifecycle) {
      sendJson(res, 200, { status: 'ok', service, checks: [] });
      return true;
    }

    void lifecycle.collectHealthChecks({ service }).then(
      checks => {
        const status = summarizeHealth(checks);
        sendJson(res, status === 'ok' ? 200 : 503, { status, service, checks });
      },
      (error: unknown) => {
        this.log.error({ err: error }, 'Health check failed');
        sendJson(res, 500, { error: errorMessage(error) });
      }
    );
    return true;
  }

  private handleMetrics(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || url.pathname !== '/metrics') {
      return false;
    }
    sendJson(res, 200, this.metrics.snapshot());
    return true;
  }
}

/** Check-in bodies are best effort: anything that is not a JSON object reads as `{}`. */
export function parseCheckinBody(raw: Buffer): Record<string, unknown> {
  if (raw.length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw.toString('utf8'));
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/** Reads the whole body; past `limitBytes` the rest is drained and dropped. */
function readBody(req: IncomingMessage, limitBytes: number): Promise<{ raw: Buffer; truncated: boolean }> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;

    req.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      received += buffer.length;
      if (received <= limitBytes) {
        chunks.push(buffer);
      }
    });

    req.on('end', () => {
      const truncated = received > limitBytes;
      resolve({ raw: truncated ? Buffer.alloc(0) : Buffer.concat(chunks), truncated });
    });

    req.on('error', reject);
  });
}

function readMultipart(req: IncomingMessage, limitBytes: number): Promise<MultipartUpload> {
  const contentType = req.headers['content-type'];
  if (!contentType || !contentType.toLowerCase().startsWith('multipart/form-data')) {
    req.resume();
    return Promise.resolve({ file: null, question: null, truncated: false });
  }

  return new Promise((resolve, reject) => {
    const upload: MultipartUpload = { file: null, question: null, truncated: false };
    const parser = busboy({
      headers: { ...req.headers, 'content-type': contentType },
      limits: { fileSize: limitBytes, files: 4 }
    });

    parser.on('file', (name, stream, info) => {
      const wanted = upload.file === null && (name === 'file' || Boolean(info.filename));
      if (!wanted) {
        stream.resume();
        return;
      }
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      stream.on('limit', () => {
        upload.truncated = true;
      });
      stream.on('end', () => {
        upload.file = Buffer.concat(chunks);
      });
    });

    parser.on('field', (name, value) => {
      if (name === 'question' && value) {
        upload.question = value;
      }
    });

    parser.on('close', () => {
      resolve(upload);
    });

    parser.on('error', (error: unknown) => {
      reject(new ProtocolError('Malformed multipart body', { cause: error }));
    });

    req.pipe(parser);
  });
}

function sendJson(res: ServerResponse, status: number, payload: object) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}

export function createHandshakeRouter(options: HandshakeRouterOptions) {
  return new HandshakeRouter(options);
}
