/**
 * One-shot broadcast stop notice. Closing is final; closing again is a no-op.
 * Waiters hand {@link StopSignal.signal} to anything that accepts an AbortSignal.
 */
export class StopSignal {
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  /** Returns true only for the call that actually closed the signal. */
  close(reason = "stop requested"): boolean {
    if (this.closed) {
      return false;
    }
    this.controller.abort(new StopSignalClosedError(reason));
    return true;
  }
}

export class StopSignalClosedError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = "StopSignalClosedError";
  }
}
