import { DeviceBusyError } from './errors';

interface Waiter {
  grant: () => void;
  timer?: NodeJS.Timeout;
}

/**
 * Per-serial exclusive lock with FIFO hand-off. A release passes ownership
 * straight to the oldest waiter, so no third party can slip in between.
 */
export class DeviceLock {
  private readonly held = new Set<string>();
  private readonly waiters = new Map<string, Waiter[]>();

  isHeld(serial: string): boolean {
    return this.held.has(serial);
  }

  queueLength(serial: string): number {
    return this.waiters.get(serial)?.length ?? 0;
  }

  /**
   * Resolves with a release function once `serial` is owned by the caller.
   * Rejects with DeviceBusyError when `timeoutMs` elapses first.
   */
  acquire(serial: string, timeoutMs: number): Promise<() => void> {
    if (!this.held.has(serial)) {
      this.held.add(serial);
      return Promise.resolve(this.releaser(serial));
    }

    return new Promise((resolve, reject) => {
      const queue = this.waiters.get(serial) ?? [];
      const waiter: Waiter = {
        grant: () => {
          if (waiter.timer) clearTimeout(waiter.timer);
          resolve(this.releaser(serial));
        }
      };

      waiter.timer = setTimeout(() => {
        const pending = this.waiters.get(serial) ?? [];
        const index = pending.indexOf(waiter);
        if (index >= 0) {
          pending.splice(index, 1);
        }
        reject(new DeviceBusyError(serial, timeoutMs));
      }, timeoutMs);

      queue.push(waiter);
      this.waiters.set(serial, queue);
    });
  }

  private releaser(serial: string): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const queue = this.waiters.get(serial);
      const next = queue?.shift();
      if (queue && queue.length === 0) {
        this.waiters.delete(serial);
      }

      if (next) {
        next.grant();
      } else {
        this.held.delete(serial);
      }
    };
  }
}
