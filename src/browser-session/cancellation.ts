// ============================================================================
// CANCELLATION — cooperative stop signal shared by the session and the task
// ============================================================================

type CancelListener = () => void;

/**
 * One-way, idempotent stop signal. Long-running loops sample `isCancelled`
 * at their suspension points; nothing is aborted preemptively.
 */
export class CancellationToken {
  private cancelled = false;
  private listeners: CancelListener[] = [];

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Request a stop. Safe to call any number of times from anywhere. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;

    const listeners = this.listeners;
    this.listeners = [];
    for (const listener of listeners) {
      try {
        listener();
      } catch (error) {
        console.log(`[CancellationToken] Cancel listener failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  /**
   * Run `listener` once when the token is cancelled (immediately if it already is).
   * Returns a function that removes the listener.
   */
  onCancel(listener: CancelListener): () => void {
    if (this.cancelled) {
      listener();
      return () => {};
    }
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }
}
