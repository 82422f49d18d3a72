/**
 * Process-wide cooperative shutdown flag. Set once, never reset.
 */
export class ShutdownSignal {
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isTriggered(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Idempotent; only the first reason is kept
   */
  trigger(reason = "shutdown requested"): void {
    if (this.isTriggered) {
      return;
    }
    this.controller.abort(reason);
  }

  /**
   * Wait for `ms`, or less if the signal is triggered in between.
   * Resolves true when the full time elapsed, false on shutdown.
   */
  sleep(ms: number): Promise<boolean> {
    if (this.isTriggered) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        this.signal.removeEventListener("abort", onAbort);
        resolve(true);
      }, ms);
      this.signal.addEventListener("abort", onAbort, { once: true });
    });
  }
}
