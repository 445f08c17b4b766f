import { describe, it, expect, vi } from 'vitest';
import { createNullLogger } from 'tr064-core';
import { BoundedQueue } from './boundedQueue';
import { EventReporter } from './eventReporter';

const drain = (queue: BoundedQueue<string>): string[] => {
  const items: string[] = [];
  while (!queue.isEmpty) {
    items.push(queue.getNowait());
  }
  return items;
};

describe('EventReporter', () => {
  it('reassembles lines fed one character at a time', async () => {
    const queue = new BoundedQueue<string>();
    const reporter = new EventReporter(queue);
    for (const character of 'CALL;20201031;12;34\nINC;20-10-31;09;76\n') {
      await reporter.add(character);
    }
    expect(drain(queue)).toEqual(['CALL;20201031;12;34', 'INC;20-10-31;09;76']);
    expect(reporter.pending).toBe('');
  });

  it('keeps an incomplete line until its end arrives', async () => {
    const queue = new BoundedQueue<string>();
    const reporter = new EventReporter(queue);
    await reporter.add('first\nsec');
    expect(drain(queue)).toEqual(['first']);
    expect(reporter.pending).toBe('sec');
    await reporter.add('ond\n');
    expect(drain(queue)).toEqual(['second']);
  });

  it('discards the incomplete line on reset', async () => {
    const queue = new BoundedQueue<string>();
    const reporter = new EventReporter(queue);
    await reporter.add('first\nsec');
    expect(reporter.reset()).toBe('sec');
    await reporter.add('third\n');
    expect(drain(queue)).toEqual(['first', 'third']);
  });

  it('drops lines that do not fit into a full queue', async () => {
    const logger = createNullLogger();
    const debug = vi.spyOn(logger, 'debug');
    const queue = new BoundedQueue<string>(1);
    const reporter = new EventReporter(queue, { logger });
    await reporter.add('a\nb\nc\n');
    expect(drain(queue)).toEqual(['a']);
    expect(debug).toHaveBeenCalledWith('[EventReporter] queue full, dropping event: b');
  });

  it('waits for space when blocking', async () => {
    const queue = new BoundedQueue<string>(1);
    const reporter = new EventReporter(queue, { blockOnFilledQueue: true });
    const adding = reporter.add('a\nb\n');
    await Promise.resolve();
    expect(queue.getNowait()).toBe('a');
    await adding;
    expect(drain(queue)).toEqual(['b']);
  });

  it('stops waiting when aborted', async () => {
    const controller = new AbortController();
    const queue = new BoundedQueue<string>(1);
    const reporter = new EventReporter(queue, { blockOnFilledQueue: true, signal: controller.signal });
    const adding = reporter.add('a\nb\nc\n');
    controller.abort();
    await adding;
    expect(drain(queue)).toEqual(['a']);
  });
});
