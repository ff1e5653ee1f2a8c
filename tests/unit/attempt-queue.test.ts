import { describe, it, expect } from 'vitest';
import { AttemptQueue } from '../../src/auth/attempt-queue.js';

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe('AttemptQueue', () => {
  it('runs attempts for one key in order', async () => {
    const queue = new AttemptQueue();
    const order: string[] = [];

    await Promise.all([
      queue.run('U1', async () => {
        await sleep(20);
        order.push('first');
      }),
      queue.run('U1', async () => {
        order.push('second');
      }),
    ]);

    expect(order).toEqual(['first', 'second']);
  });

  it('keeps going after a failed attempt', async () => {
    const queue = new AttemptQueue();
    const first = queue.run('U1', async () => {
      throw new Error('failed');
    });
    const second = queue.run('U1', async () => 'ok');

    await expect(first).rejects.toThrow('failed');
    await expect(second).resolves.toBe('ok');
  });

  it('counts running and waiting attempts per key', async () => {
    const queue = new AttemptQueue();
    const a = queue.run('U1', () => sleep(20));
    const b = queue.run('U1', () => sleep(20));

    expect(queue.getPending('U1')).toBe(2);
    expect(queue.getPending('U2')).toBe(0);

    await Promise.all([a, b]);
    expect(queue.getPending('U1')).toBe(0);
  });
});
