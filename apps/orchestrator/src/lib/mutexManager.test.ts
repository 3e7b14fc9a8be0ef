import { describe, it, expect } from 'vitest';
import { mutexManager } from './mutexManager.js';

describe('mutexManager', () => {
  it('returns the same mutex for a deployment', () => {
    expect(mutexManager.getDeploymentMutex('dep-a')).toBe(mutexManager.getDeploymentMutex('dep-a'));
    expect(mutexManager.getDeploymentMutex('dep-a')).not.toBe(mutexManager.getDeploymentMutex('dep-b'));

    mutexManager.cleanupDeploymentMutex('dep-a');
    mutexManager.cleanupDeploymentMutex('dep-b');
  });

  it('runs work for one deployment one at a time', async () => {
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstBlocked = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = mutexManager.withDeploymentLock('dep-lock', async () => {
      order.push('first:start');
      await firstBlocked;
      order.push('first:end');
    });
    const second = mutexManager.withDeploymentLock('dep-lock', async () => {
      order.push('second');
    });

    await Promise.resolve();
    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    mutexManager.cleanupDeploymentMutex('dep-lock');
  });

  it('keeps a mutex that is still held', async () => {
    const before = mutexManager.getStats().deploymentMutexes;

    await mutexManager.withDeploymentLock('dep-held', async () => {
      mutexManager.cleanupDeploymentMutex('dep-held');
      expect(mutexManager.getStats().deploymentMutexes).toBe(before + 1);
    });

    mutexManager.cleanupDeploymentMutex('dep-held');
    expect(mutexManager.getStats().deploymentMutexes).toBe(before);
  });
});
