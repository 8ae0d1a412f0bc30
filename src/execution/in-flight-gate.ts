interface Waiter {
  resolve: (admitted: boolean) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Process-wide cap on submitted-but-unsettled legs. Permits are handed out
 * first come, first served. A waiter whose signal aborts leaves the queue and
 * resolves `false`.
 */
export class InFlightGate {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`In-flight capacity must be a positive integer, got ${capacity}`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);
    if (this.active < this.capacity && this.waiters.length === 0) {
      this.active++;
      return Promise.resolve(true);
    }

    return new Promise<boolean>(resolve => {
      const waiter: Waiter = { resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          const at = this.waiters.indexOf(waiter);
          if (at >= 0) this.waiters.splice(at, 1);
          resolve(false);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  release(): void {
    if (this.active === 0) {
      throw new Error('InFlightGate.release() without a matching acquire()');
    }
    const next = this.waiters.shift();
    if (next) {
      // Permit passes straight to the next waiter
      if (next.signal && next.onAbort) next.signal.removeEventListener('abort', next.onAbort);
      next.resolve(true);
      return;
    }
    this.active--;
  }
}
