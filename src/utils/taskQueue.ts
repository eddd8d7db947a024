import { childLogger, type ComponentLogger } from '../logger.js';

export type QueuedTask = () => void | Promise<void>;

/**
 * Runs posted tasks one at a time in post order. Transport callbacks post here
 * instead of touching gateway state from inside the client's event handler.
 */
export class SerialTaskQueue {
  private tail: Promise<void> = Promise.resolve();
  private pendingCount = 0;
  private readonly log: Pick<ComponentLogger, 'error'>;

  constructor(options: { log?: Pick<ComponentLogger, 'error'> } = {}) {
    this.log = options.log ?? childLogger('task-queue');
  }

  get pending() {
    return this.pendingCount;
  }

  /** The returned promise settles once the task has run; it never rejects. */
  post(task: QueuedTask): Promise<void> {
    this.pendingCount += 1;
    const run = this.tail.then(async () => {
      try {
        await task();
      } catch (error) {
        this.log.error({ err: error }, 'Queued task failed');
      } finally {
        this.pendingCount -= 1;
      }
    });
    this.tail = run;
    return run;
  }

  onIdle(): Promise<void> {
    return this.tail;
  }
}
