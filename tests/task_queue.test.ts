import { describe, expect, it } from 'vitest';
import { SerialTaskQueue } from '../src/utils/taskQueue.js';
import { CommandOutbox } from '../src/device/outbox.js';
import { createLogger } from './helpers/fakes.js';

describe('SerialTaskQueue', () => {
  it('runs tasks one at a time in post order', async () => {
    const queue = new SerialTaskQueue({ log: createLogger() });
    const order: string[] = [];

    void queue.post(async () => {
      order.push('a:start');
      await new Promise(resolve => setTimeout(resolve, 5));
      order.push('a:end');
    });
    void queue.post(() => {
      order.push('b');
    });
    expect(queue.pending).toBe(2);

    await queue.onIdle();
    expect(order).toEqual(['a:start', 'a:end', 'b']);
    expect(queue.pending).toBe(0);
  });

  it('logs a failing task and keeps draining', async () => {
    const log = createLogger();
    const queue = new SerialTaskQueue({ log });
    const order: string[] = [];

    await queue.post(() => {
      throw new Error('boom');
    });
    await queue.post(() => {
      order.push('after');
    });

    expect(order).toEqual(['after']);
    expect(log.error).toHaveBeenCalledTimes(1);
  });
});

describe('CommandOutbox', () => {
  it('keeps FIFO order and puts a failed entry back at the head', () => {
    const outbox = new CommandOutbox();
    outbox.enqueue('one', 10);
    outbox.enqueue('two', 20);

    const head = outbox.shift();
    expect(head).toEqual({ sequence: 1, message: 'one', enqueuedAt: 10 });
    outbox.enqueue('three', 30);
    if (head) {
      outbox.requeueFront(head);
    }

    expect(outbox.messages()).toEqual(['one', 'two', 'three']);
    expect(outbox.size).toBe(3);
    expect(outbox.enqueue('four').sequence).toBe(4);
  });
});
