import { describe, expect, it } from 'vitest';
import type { JobEvent, ProgressSnapshot, TerminalResult } from '@transcoder/core';
import { JobEventChannel } from './eventStream.js';

function snapshot(fraction: number): ProgressSnapshot {
  return {
    fraction,
    processedMs: fraction * 1000,
    etaMs: null,
    sizeBytes: 0,
    durationMs: 1000,
    elapsedMs: 0,
  };
}

const CANCELLED: TerminalResult = {
  jobId: 'job-1',
  outcome: 'cancelled',
  outputPath: '/out/clip_converted.webm',
  inputSizeBytes: 100,
  elapsedMs: 5,
};

async function collect(iterator: AsyncIterable<JobEvent>): Promise<JobEvent[]> {
  const events: JobEvent[] = [];
  for await (const event of iterator) {
    events.push(event);
  }
  return events;
}

describe('JobEventChannel', () => {
  it('delivers progress then the terminal event and ends', async () => {
    const channel = new JobEventChannel('job-1');
    const pending = collect(channel.subscribe());

    channel.publishProgress(snapshot(0.5));
    channel.publishTerminal(CANCELLED);

    const events = await pending;
    expect(events.map((e) => e.type)).toEqual(['progress', 'terminal']);
    expect(channel.subscriberCount).toBe(0);
  });

  it('coalesces progress that has not been consumed yet', async () => {
    const channel = new JobEventChannel('job-1');
    const iterator = channel.subscribe();

    channel.publishProgress(snapshot(0.1));
    channel.publishProgress(snapshot(0.2));
    channel.publishProgress(snapshot(0.3));
    channel.publishTerminal(CANCELLED);

    const events = await collect(iterator);
    expect(events).toEqual([
      { type: 'progress', jobId: 'job-1', snapshot: snapshot(0.3) },
      { type: 'terminal', jobId: 'job-1', result: CANCELLED },
    ]);
  });

  it('replays the latest snapshot to late subscribers', async () => {
    const channel = new JobEventChannel('job-1');
    channel.publishProgress(snapshot(0.4));

    const iterator = channel.subscribe();
    const first = await iterator.next();

    expect(first).toEqual({ done: false, value: { type: 'progress', jobId: 'job-1', snapshot: snapshot(0.4) } });
    await iterator.return?.();
  });

  it('still delivers the terminal event after the job finished', async () => {
    const channel = new JobEventChannel('job-1');
    channel.publishProgress(snapshot(0.9));
    channel.publishTerminal(CANCELLED);

    const events = await collect(channel.subscribe());
    expect(events.map((e) => e.type)).toEqual(['progress', 'terminal']);
  });

  it('ignores events after the terminal one', async () => {
    const channel = new JobEventChannel('job-1');
    channel.publishTerminal(CANCELLED);
    channel.publishProgress(snapshot(1));

    expect(channel.latestSnapshot).toBeNull();
    expect(await collect(channel.subscribe())).toEqual([
      { type: 'terminal', jobId: 'job-1', result: CANCELLED },
    ]);
  });

  it('releases a waiting consumer when the subscription is closed', async () => {
    const channel = new JobEventChannel('job-1');
    const iterator = channel.subscribe();

    const waiting = iterator.next();
    await iterator.return?.();

    await expect(waiting).resolves.toEqual({ done: true, value: undefined });
    expect(channel.subscriberCount).toBe(0);
  });
});
