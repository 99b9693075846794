import { describe, expect, it } from 'vitest';
import { ChatQueue } from '../src/chat-queue.js';

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('ChatQueue', () => {
  it('runs tasks for one key in arrival order', async () => {
    const queue = new ChatQueue();
    const log: string[] = [];

    const first = queue.run('a', async () => {
      log.push('first start');
      await sleep(20);
      log.push('first end');
      return 1;
    });
    const second = queue.run('a', async () => {
      log.push('second start');
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(log).toEqual(['first start', 'first end', 'second start']);
  });

  it('does not block other keys', async () => {
    const queue = new ChatQueue();
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const log: string[] = [];

    const slow = queue.run('a', async () => {
      await gate;
      log.push('a');
    });
    await queue.run('b', async () => {
      log.push('b');
    });
    release();
    await slow;

    expect(log).toEqual(['b', 'a']);
  });

  it('keeps going after a failed task', async () => {
    const queue = new ChatQueue();
    const failed = queue.run('a', async () => {
      throw new Error('boom');
    });
    const next = queue.run('a', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    expect(await next).toBe('ok');
  });

  it('forgets keys once their work has settled', async () => {
    const queue = new ChatQueue();
    await queue.run('a', async () => undefined);
    await sleep(0);
    expect(queue.activeKeys()).toBe(0);
  });
});
