import type { DrainResult, PushChannel } from "./types";

export const SIGNAL_QUEUE_CAPACITY = 10;

/**
 * Bounded buffer between an async notification source and the tick loop.
 * Overflowing signals are dropped: one pending signal already forces a refresh.
 */
export class SignalQueue implements PushChannel {
  private pending = 0;
  private closed = false;
  private onClose: (() => void) | null;

  constructor(
    onClose?: () => void,
    private readonly capacity = SIGNAL_QUEUE_CAPACITY
  ) {
    this.onClose = onClose ?? null;
  }

  push(): boolean {
    if (this.closed || this.pending >= this.capacity) return false;
    this.pending++;
    return true;
  }

  drain(): DrainResult {
    const result = { signals: this.pending, closed: this.closed };
    this.pending = 0;
    return result;
  }

  /** Marks the channel dead from the producer side; buffered signals are kept. */
  end(): void {
    this.closed = true;
  }

  /** Consumer side: stop listening and release the underlying socket. */
  close(): void {
    this.closed = true;
    const onClose = this.onClose;
    this.onClose = null;
    onClose?.();
  }

  isClosed(): boolean {
    return this.closed;
  }
}
