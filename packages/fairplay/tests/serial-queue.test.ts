import { describe, it, expect } from 'vitest';
import { SerialQueue } from '../src/serial-queue.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('SerialQueue', () => {
  it('runs tasks one at a time in order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    const task = (name: string) => async () => {
      events.push(`start ${name}`);
      await tick();
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.enqueue(task('a')), queue.enqueue(task('b'))]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('keeps going after a failed task', async () => {
    const queue = new SerialQueue();

    const failed = queue.enqueue(() => Promise.reject(new Error('first failed')));
    const next = queue.enqueue(() => 'second');

    await expect(failed).rejects.toThrow('first failed');
    await expect(next).resolves.toBe('second');
  });

  it('tracks pending tasks until idle', async () => {
    const queue = new SerialQueue();
    const first = queue.enqueue(tick);
    const second = queue.enqueue(tick);

    expect(queue.size).toBe(2);

    await queue.onIdle();
    await Promise.all([first, second]);

    expect(queue.size).toBe(0);
  });
});
