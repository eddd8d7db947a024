export type CommandEnvelope = {
  sequence: number;
  message: string;
  enqueuedAt: number;
};

/**
 * Unbounded FIFO of device-bound messages waiting for a live session. Entries
 * are never reordered or deduplicated; a failed delivery goes back to the head.
 */
export class CommandOutbox {
  private readonly entries: CommandEnvelope[] = [];
  private nextSequence = 1;

  get size() {
    return this.entries.length;
  }

  isEmpty() {
    return this.entries.length === 0;
  }

  enqueue(message: string, now = Date.now()): CommandEnvelope {
    const envelope: CommandEnvelope = { sequence: this.nextSequence, message, enqueuedAt: now };
    this.nextSequence += 1;
    this.entries.push(envelope);
    return envelope;
  }

  shift(): CommandEnvelope | undefined {
    return this.entries.shift();
  }

  requeueFront(envelope: CommandEnvelope) {
    this.entries.unshift(envelope);
  }

  messages(): string[] {
    return this.entries.map(entry => entry.message);
  }
}
