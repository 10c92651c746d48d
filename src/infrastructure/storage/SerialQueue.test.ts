import { describe, it, expect } from 'vitest';
import { SerialQueue } from './SerialQueue.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('SerialQueue', () => {
  it('runs tasks one after another in queue order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    await Promise.all([
      queue.run(async () => {
        events.push('a:start');
        await delay(20);
        events.push('a:end');
      }),
      queue.run(async () => {
        events.push('b:start');
        await delay(1);
        events.push('b:end');
      })
    ]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('passes results and errors to the caller and keeps going after a failure', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(async () => {
      throw new Error('disk full');
    });
    const next = queue.run(async () => 42);

    await expect(failed).rejects.toThrow('disk full');
    expect(await next).toBe(42);
  });
});
