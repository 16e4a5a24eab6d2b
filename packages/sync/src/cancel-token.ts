import { randomUUID } from "node:crypto";

export interface CancelToken {
  readonly id: string;
  isCanceled(): boolean;
  /** Fires immediately when already canceled. Returns an unsubscribe function. */
  onCancel(cb: () => void): () => void;
  cancel(reason?: unknown): void;
  reason(): unknown;
}

class CancelTokenImpl implements CancelToken {
  readonly id: string;
  private canceled = false;
  private cancelReason: unknown = undefined;
  private readonly callbacks: (() => void)[] = [];
  private parentUnsubscribe: (() => void) | undefined;

  constructor(parent?: CancelToken) {
    this.id = randomUUID();

    if (parent) {
      this.parentUnsubscribe = parent.onCancel(() => {
        this.cancel("parent-canceled");
      });
    }
  }

  isCanceled(): boolean {
    return this.canceled;
  }

  reason(): unknown {
    return this.cancelReason;
  }

  onCancel(cb: () => void): () => void {
    if (this.canceled) {
      cb();
      return () => {};
    }

    this.callbacks.push(cb);

    return () => {
      const index = this.callbacks.indexOf(cb);
      if (index !== -1) {
        this.callbacks.splice(index, 1);
      }
    };
  }

  cancel(reason?: unknown): void {
    if (this.canceled) return;

    this.canceled = true;
    this.cancelReason = reason;

    // Fire all callbacks exactly once
    const callbacks = this.callbacks.splice(0);
    for (const callback of callbacks) {
      try {
        callback();
      } catch (error) {
        console.error("Cancel callback error:", error);
      }
    }

    this.parentUnsubscribe?.();
    this.parentUnsubscribe = undefined;
  }
}

export function createCancelToken(parent?: CancelToken): CancelToken {
  return new CancelTokenImpl(parent);
}
