import { describe, expect, it } from 'vitest';
import { SerialExecutor } from '../src/concurrency/serial-executor.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('SerialExecutor', () => {
  it('runs tasks one at a time in submission order', async () => {
    const executor = new SerialExecutor('test');
    const order: string[] = [];

    const first = executor.run(async () => {
      order.push('first:start');
      await delay(10);
      order.push('first:end');
      return 1;
    });
    const second = executor.run(async () => {
      order.push('second');
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('keeps going after a failed task', async () => {
    const executor = new SerialExecutor('test');

    const failing = executor.run(async () => {
      throw new Error('task failed');
    });
    const next = executor.run(async () => 'ok');

    await expect(failing).rejects.toThrow('task failed');
    await expect(next).resolves.toBe('ok');
    await executor.idle();

    expect(executor.getStats()).toEqual({ queued: 0, completed: 1, failed: 1, peakQueued: 2 });
  });
});
