/**
 * Job Event Channel
 * 
 * Fan-out of one job's progress and terminal events to any number of async
 * iterator subscribers. Pending progress snapshots coalesce to the latest;
 * events are never reordered and the terminal event is always delivered.
 */

import type { JobEvent, ProgressSnapshot, TerminalResult } from '@transcoder/core';

interface Subscriber {
  queue: JobEvent[];
  wake: (() => void) | null;
  closed: boolean;
}

export class JobEventChannel {
  private readonly jobId: string;
  private readonly subscribers = new Set<Subscriber>();
  private latest: ProgressSnapshot | null = null;
  private terminal: TerminalResult | null = null;

  constructor(jobId: string) {
    this.jobId = jobId;
  }

  get latestSnapshot(): ProgressSnapshot | null {
    return this.latest;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  publishProgress(snapshot: ProgressSnapshot): void {
    if (this.terminal) return;
    this.latest = snapshot;

    const event: JobEvent = { type: 'progress', jobId: this.jobId, snapshot };
    for (const subscriber of this.subscribers) {
      const last = subscriber.queue.at(-1);
      if (last?.type === 'progress') {
        subscriber.queue[subscriber.queue.length - 1] = event;
      } else {
        subscriber.queue.push(event);
      }
      this.notify(subscriber);
    }
  }

  publishTerminal(result: TerminalResult): void {
    if (this.terminal) return;
    this.terminal = result;

    const event: JobEvent = { type: 'terminal', jobId: this.jobId, result };
    for (const subscriber of this.subscribers) {
      subscriber.queue.push(event);
      this.notify(subscriber);
    }
  }

  /**
   * Late subscribers start from the most recent snapshot
   */
  subscribe(): AsyncIterableIterator<JobEvent> {
    const subscriber: Subscriber = { queue: [], wake: null, closed: false };

    if (this.latest) {
      subscriber.queue.push({ type: 'progress', jobId: this.jobId, snapshot: this.latest });
    }
    if (this.terminal) {
      subscriber.queue.push({ type: 'terminal', jobId: this.jobId, result: this.terminal });
    } else {
      this.subscribers.add(subscriber);
    }

    const close = (): IteratorResult<JobEvent> => {
      subscriber.closed = true;
      subscriber.queue = [];
      this.subscribers.delete(subscriber);
      this.notify(subscriber);
      return { done: true, value: undefined };
    };

    const iterator: AsyncIterableIterator<JobEvent> = {
      next: async () => {
        while (!subscriber.closed) {
          const event = subscriber.queue.shift();
          if (event) {
            if (event.type === 'terminal') {
              close();
            }
            return { done: false, value: event };
          }
          await new Promise<void>((resolve) => {
            subscriber.wake = resolve;
          });
        }
        return { done: true, value: undefined };
      },
      return: async () => close(),
      [Symbol.asyncIterator]() {
        return iterator;
      },
    };

    return iterator;
  }

  private notify(subscriber: Subscriber): void {
    const wake = subscriber.wake;
    subscriber.wake = null;
    wake?.();
  }
}
