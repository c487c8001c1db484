import { TargetLockManager } from '../../src/deploy/target-lock';
import { TargetBusyError } from '../../src/domain/errors';

describe('TargetLockManager', () => {
  test('grants a free target and refuses a held one', () => {
    const locks = new TargetLockManager();

    const lease = locks.tryAcquire('web', 'run_1');

    expect(lease?.holder).toBe('run_1');
    expect(locks.tryAcquire('web', 'run_2')).toBeNull();
    expect(locks.holder('web')).toBe('run_1');
    expect(locks.tryAcquire('api', 'run_2')).not.toBeNull();
  });

  test('release frees the target and is idempotent', () => {
    const locks = new TargetLockManager();
    const first = locks.tryAcquire('web', 'run_1');
    first?.release();
    const second = locks.tryAcquire('web', 'run_2');

    first?.release();

    expect(locks.holder('web')).toBe('run_2');
    second?.release();
    expect(locks.isLocked('web')).toBe(false);
  });

  test('fail-fast mode rejects a busy target with its holder', async () => {
    const locks = new TargetLockManager();
    locks.tryAcquire('web', 'run_1');

    let caught: unknown;
    try {
      await locks.acquire('web', { holder: 'run_2', mode: 'fail-fast' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TargetBusyError);
    if (!(caught instanceof TargetBusyError)) return;
    expect(caught.code).toBe('DEPLOYMENT.TARGET_BUSY');
    expect(caught.typedError.details).toEqual({ targetId: 'web', holder: 'run_1' });
  });

  test('block mode serves waiters in arrival order', async () => {
    const locks = new TargetLockManager({ mode: 'block', waitTimeoutMs: 1000 });
    const first = locks.tryAcquire('web', 'run_1');
    const order: string[] = [];

    const second = locks.acquire('web', { holder: 'run_2' }).then((lease) => {
      order.push(lease.holder);
      return lease;
    });
    const third = locks.acquire('web', { holder: 'run_3' }).then((lease) => {
      order.push(lease.holder);
      return lease;
    });
    expect(locks.waiting('web')).toBe(2);

    first?.release();
    (await second).release();
    (await third).release();

    expect(order).toEqual(['run_2', 'run_3']);
    expect(locks.isLocked('web')).toBe(false);
    expect(locks.waiting('web')).toBe(0);
  });

  test('block mode gives up after the wait bound', async () => {
    const locks = new TargetLockManager({ mode: 'block', waitTimeoutMs: 1000 });
    locks.tryAcquire('web', 'run_1');

    await expect(locks.acquire('web', { holder: 'run_2', waitTimeoutMs: 10 })).rejects.toBeInstanceOf(TargetBusyError);
    expect(locks.waiting('web')).toBe(0);
  });

  test('an aborted wait leaves the queue', async () => {
    const locks = new TargetLockManager({ mode: 'block', waitTimeoutMs: 1000 });
    const first = locks.tryAcquire('web', 'run_1');
    const controller = new AbortController();

    const waiting = locks.acquire('web', { holder: 'run_2', signal: controller.signal });
    controller.abort(new Error('run cancelled'));

    await expect(waiting).rejects.toThrow('run cancelled');
    first?.release();
    expect(locks.isLocked('web')).toBe(false);
  });
});
