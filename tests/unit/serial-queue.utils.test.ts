import { SerialQueue } from '@/utils/serial-queue.utils';
import { HardwareTimeoutError } from '@/utils/errors.utils';
import { withTimeout } from '@/utils/timeout.utils';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('SerialQueue', () => {
  test('should run tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    const slow = queue.run(async () => {
      events.push('slow:start');
      await delay(20);
      events.push('slow:end');
      return 'slow';
    });
    const fast = queue.run(() => {
      events.push('fast');
      return 'fast';
    });

    await expect(Promise.all([slow, fast])).resolves.toEqual(['slow', 'fast']);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  test('should keep running after a task fails', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(() => {
      throw new Error('boom');
    });
    const next = queue.run(() => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  test('should report pending tasks and drain', async () => {
    const queue = new SerialQueue();
    const done: number[] = [];

    void queue.run(async () => {
      await delay(10);
      done.push(1);
    });
    void queue.run(() => {
      done.push(2);
    });
    expect(queue.size).toBe(2);

    await queue.drain();
    expect(done).toEqual([1, 2]);
    expect(queue.size).toBe(0);
  });
});

describe('withTimeout', () => {
  test('should return the call result', async () => {
    await expect(withTimeout('read', () => 7, 50)).resolves.toBe(7);
  });

  test('should propagate a thrown error', async () => {
    await expect(
      withTimeout('read', () => {
        throw new Error('bus error');
      }, 50)
    ).rejects.toThrow('bus error');
  });

  test('should reject a hung call with HardwareTimeoutError', async () => {
    const hung = withTimeout('read dht', () => new Promise<number>(() => undefined), 20);
    await expect(hung).rejects.toThrow(HardwareTimeoutError);
    await expect(hung).rejects.toThrow('read dht timed out after 20ms');
  });
});
