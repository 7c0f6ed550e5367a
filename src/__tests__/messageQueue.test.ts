import { MessageQueue } from '../messageQueue';

describe('MessageQueue', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  test('pops in FIFO order', async () => {
    const q = new MessageQueue<number>();
    q.push(1);
    q.push(2);
    expect(q.size).toBe(2);
    expect(await q.pop()).toBe(1);
    expect(q.tryPop()).toBe(2);
    expect(q.size).toBe(0);
  });

  test('pop with no timeout resolves undefined when empty', async () => {
    const q = new MessageQueue<string>();
    expect(await q.pop(0)).toBeUndefined();
    expect(q.tryPop()).toBeUndefined();
  });

  test('a waiting pop receives the next push', async () => {
    const q = new MessageQueue<string>();
    const pending = q.pop(1000);
    q.push('a');
    expect(await pending).toBe('a');
    expect(q.size).toBe(0);
  });

  test('a waiting pop resolves undefined after its timeout', async () => {
    jest.useFakeTimers();
    const q = new MessageQueue<string>();
    const pending = q.pop(100);
    jest.advanceTimersByTime(100);
    expect(await pending).toBeUndefined();
    // a timed-out waiter no longer swallows pushes
    q.push('b');
    expect(q.size).toBe(1);
  });
});
