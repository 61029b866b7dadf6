import { LockTimeoutError } from '../../src/errors/lock-timeout.error';
import { UserLockRegistry } from '../../src/services/user-lock-registry.service';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('UserLockRegistry', () => {
  let registry: UserLockRegistry;

  beforeEach(() => {
    registry = new UserLockRegistry({ lockTimeoutMs: 1000 });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should run same-user calls one at a time', async () => {
    const order: string[] = [];
    const gate = deferred();

    const first = registry.withLock('u1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = registry.withLock('u1', async () => {
      order.push('second');
      return 2;
    });

    await flush();
    expect(order).toEqual(['first:start']);
    expect(registry.isLocked('u1')).toBe(true);
    expect(registry.queueLength('u1')).toBe(1);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(registry.isLocked('u1')).toBe(false);
  });

  it('should grant waiters in arrival order', async () => {
    const order: string[] = [];
    const gate = deferred();

    const holder = registry.withLock('u1', () => gate.promise);
    const waiters = ['a', 'b', 'c'].map((name) =>
      registry.withLock('u1', async () => {
        order.push(name);
      }),
    );

    await flush();
    expect(registry.queueLength('u1')).toBe(3);

    gate.resolve();
    await Promise.all([holder, ...waiters]);
    expect(order).toEqual(['a', 'b', 'c']);
  });

  it('should not block other users', async () => {
    const gate = deferred();
    const held = registry.withLock('u1', () => gate.promise);

    await expect(
      registry.withLock('u2', async () => 'u2 done'),
    ).resolves.toBe('u2 done');
    expect(registry.isLocked('u1')).toBe(true);
    expect(registry.size).toBe(2);

    gate.resolve();
    await held;
  });

  it('should release the lock when the callback throws', async () => {
    await expect(
      registry.withLock('u1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(registry.isLocked('u1')).toBe(false);
    await expect(registry.withLock('u1', async () => 'next')).resolves.toBe(
      'next',
    );
  });

  it('should time out a waiter without running its callback', async () => {
    jest.useFakeTimers();
    const gate = deferred();
    const fn = jest.fn().mockResolvedValue('late');

    const held = registry.withLock('u1', () => gate.promise);
    const waiting = registry.withLock('u1', fn, 500);
    const assertion = expect(waiting).rejects.toThrow(
      'Could not acquire session lock for user "u1" within 500ms. Retry the request.',
    );

    jest.advanceTimersByTime(500);
    await assertion;
    await expect(waiting).rejects.toBeInstanceOf(LockTimeoutError);
    expect(fn).not.toHaveBeenCalled();
    expect(registry.queueLength('u1')).toBe(0);

    gate.resolve();
    await held;
    expect(registry.isLocked('u1')).toBe(false);
  });

  it('should use the configured timeout by default', async () => {
    jest.useFakeTimers();
    const gate = deferred();

    const held = registry.withLock('u1', () => gate.promise);
    const waiting = registry.withLock('u1', async () => 'never');
    const assertion = expect(waiting).rejects.toThrow('within 1000ms');

    jest.advanceTimersByTime(999);
    expect(registry.queueLength('u1')).toBe(1);
    jest.advanceTimersByTime(1);
    await assertion;

    gate.resolve();
    await held;
  });
});
