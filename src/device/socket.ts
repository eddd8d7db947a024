import { WebSocket, type RawData } from 'ws';
import { TransportError } from '../errors.js';

export type DeviceFrame = { kind: 'text'; text: string } | { kind: 'binary'; data: Buffer };

/** The slice of a WebSocket connection the session manager depends on. */
export interface DeviceSocket {
  readonly remoteAddress: string;
  /** Host the device dialed to reach this listener. */
  readonly localHost: string;
  isOpen(): boolean;
  send(text: string): Promise<void>;
  close(code?: number, reason?: string): void;
  frames(): AsyncIterable<DeviceFrame>;
}

type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
};

/**
 * Push-to-pull adapter: event handlers push, one consumer iterates. Ending
 * with an error rejects the pending and subsequent reads.
 */
export class FrameQueue<T> implements AsyncIterable<T> {
  private readonly buffered: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private ended = false;
  private failure: unknown = undefined;

  get closed() {
    return this.ended;
  }

  push(item: T) {
    if (this.ended) {
      return;
    }
    const [waiter] = this.waiters.splice(0, 1);
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.buffered.push(item);
    }
  }

  end(error?: unknown) {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.failure = error;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      if (error === undefined) {
        waiter.resolve({ value: undefined, done: true });
      } else {
        waiter.reject(error);
      }
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => {
        if (this.buffered.length > 0) {
          const [value] = this.buffered.splice(0, 1);
          return Promise.resolve<IteratorResult<T>>({ value, done: false });
        }
        if (this.ended) {
          return this.failure === undefined
            ? Promise.resolve<IteratorResult<T>>({ value: undefined, done: true })
            : Promise.reject(this.failure);
        }
        return new Promise<IteratorResult<T>>((resolve, reject) => {
          this.waiters.push({ resolve, reject });
        });
      },
      return: () => {
        this.end();
        return Promise.resolve<IteratorResult<T>>({ value: undefined, done: true });
      }
    };
  }
}

function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(new Uint8Array(data));
  }
  return data;
}

export class WsDeviceSocket implements DeviceSocket {
  private readonly queue = new FrameQueue<DeviceFrame>();

  constructor(
    private readonly ws: WebSocket,
    readonly remoteAddress: string,
    readonly localHost: string
  ) {
    ws.on('message', (data: RawData, isBinary: boolean) => {
      const bytes = toBuffer(data);
      this.queue.push(
        isBinary ? { kind: 'binary', data: bytes } : { kind: 'text', text: bytes.toString('utf8') }
      );
    });
    ws.on('close', () => {
      this.queue.end();
    });
    ws.on('error', error => {
      this.queue.end(new TransportError(`Device socket error: ${error.message}`, { cause: error }));
    });
  }

  isOpen() {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.isOpen()) {
        reject(new TransportError('Device socket is not open'));
        return;
      }
      this.ws.send(text, error => {
        if (error) {
          reject(new TransportError(`Device send failed: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  close(code = 1000, reason = '') {
    if (this.ws.readyState === WebSocket.CLOSED) {
      return;
    }
    this.ws.close(code, reason);
  }

  frames(): AsyncIterable<DeviceFrame> {
    return this.queue;
  }
}
