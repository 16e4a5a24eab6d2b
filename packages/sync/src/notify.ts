import type { CancelToken } from "./cancel-token.js";

export type NotifyOutcome = "notified" | "canceled";

type CancelSignal = Pick<CancelToken, "isCanceled" | "onCancel">;

/**
 * Wake primitive with a single stored permit.
 *
 * `notifyOne()` releases the longest-parked waiter; when nobody is parked the
 * wake-up is kept as a permit and consumed by the next `notified()` call.
 * At most one permit is stored, however many times `notifyOne()` runs.
 * Waiters must re-check whatever condition they parked on after waking.
 */
export class Notify {
  private permit = false;
  private readonly waiters: ((outcome: NotifyOutcome) => void)[] = [];

  notifyOne(): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter("notified");
    } else {
      this.permit = true;
    }
  }

  notified(signal?: CancelSignal): Promise<NotifyOutcome> {
    if (signal?.isCanceled()) return Promise.resolve("canceled");
    if (this.permit) {
      this.permit = false;
      return Promise.resolve("notified");
    }

    return new Promise<NotifyOutcome>((resolve) => {
      let unsubscribe: () => void = () => {};
      const waiter = (outcome: NotifyOutcome) => {
        unsubscribe();
        resolve(outcome);
      };
      this.waiters.push(waiter);

      if (signal) {
        unsubscribe = signal.onCancel(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          resolve("canceled");
        });
      }
    });
  }

  waiterCount(): number {
    return this.waiters.length;
  }

  hasPermit(): boolean {
    return this.permit;
  }
}

export function createNotify(): Notify {
  return new Notify();
}
