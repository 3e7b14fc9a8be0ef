import { Mutex } from 'async-mutex';

/**
 * Per-deployment mutexes.
 * Counter updates for one deployment run one at a time while different
 * deployments proceed in parallel.
 */
class MutexManager {
  private deploymentMutexes = new Map<string, Mutex>();

  /**
   * Get or create the mutex guarding a deployment's counters.
   */
  getDeploymentMutex(deploymentId: string): Mutex {
    let mutex = this.deploymentMutexes.get(deploymentId);
    if (!mutex) {
      mutex = new Mutex();
      this.deploymentMutexes.set(deploymentId, mutex);
    }
    return mutex;
  }

  /**
   * Run a read-modify-write of a deployment exclusively.
   */
  async withDeploymentLock<T>(deploymentId: string, fn: () => Promise<T>): Promise<T> {
    const mutex = this.getDeploymentMutex(deploymentId);
    return mutex.runExclusive(fn);
  }

  /**
   * Drop the mutex of a finished deployment once nothing holds it.
   */
  cleanupDeploymentMutex(deploymentId: string): void {
    const mutex = this.deploymentMutexes.get(deploymentId);
    if (mutex && !mutex.isLocked()) {
      this.deploymentMutexes.delete(deploymentId);
    }
  }

  getStats(): { deploymentMutexes: number } {
    return {
      deploymentMutexes: this.deploymentMutexes.size,
    };
  }
}

export const mutexManager = new MutexManager();
export type { MutexManager };
