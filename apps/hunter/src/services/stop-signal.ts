export type StopReason = "matched" | "shutdown" | "deadline";

/**
 * Process-wide stop flag shared by the coordinator and every port lifecycle.
 *
 * Set once, never reset. `claim()` is the compare-and-set used by a lifecycle
 * that found a matching address: only the first caller wins.
 */
export class StopSignal {
  private controller = new AbortController();
  private stopReason: StopReason | null = null;
  private winner: string | null = null;
  private shutdown = false;

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): StopReason | null {
    return this.stopReason;
  }

  get shutdownRequested(): boolean {
    return this.shutdown;
  }

  get winningPortId(): string | null {
    return this.winner;
  }

  /** Aborts when the signal is set; used to wake sleeping loops */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Claim the hunt for a matched port. Returns false when another port already claimed it.
   */
  claim(portId: string): boolean {
    if (this.winner !== null) {
      return false;
    }
    this.winner = portId;
    this.stop("matched");
    return true;
  }

  requestShutdown(): void {
    this.shutdown = true;
    this.stop("shutdown");
  }

  expire(): void {
    this.stop("deadline");
  }

  private stop(reason: StopReason): void {
    if (this.stopped) {
      return;
    }
    this.stopReason = reason;
    this.controller.abort();
  }
}
