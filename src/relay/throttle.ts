import { systemClock, type Clock } from "./timing.js";

export interface CommandThrottleOptions {
  cooldownMs: number;
  clock?: Clock;
}

/**
 * Enforces a minimum gap between dispatches from one relay client. Callers
 * queue on a promise chain, so concurrent acquires are granted one at a time
 * and each recorded dispatch time is later than the previous by at least the
 * cooldown.
 */
export class CommandThrottle {
  private lastDispatchAt: number | undefined;
  private chain: Promise<void> = Promise.resolve();
  private readonly clock: Clock;

  constructor(private readonly options: CommandThrottleOptions) {
    this.clock = options.clock ?? systemClock;
  }

  get lastDispatch(): number | undefined {
    return this.lastDispatchAt;
  }

  /** Resolves with the dispatch time once the cooldown allows it. */
  acquire(signal?: AbortSignal): Promise<number> {
    const granted = this.chain.then(async () => {
      if (this.lastDispatchAt !== undefined) {
        const last = this.lastDispatchAt;
        let remaining = this.options.cooldownMs - (this.clock.now() - last);
        while (remaining > 0) {
          await this.clock.sleep(remaining, signal);
          remaining = this.options.cooldownMs - (this.clock.now() - last);
        }
      }
      this.lastDispatchAt = this.clock.now();
      return this.lastDispatchAt;
    });
    this.chain = granted.then(
      () => undefined,
      () => undefined
    );
    return granted;
  }
}
