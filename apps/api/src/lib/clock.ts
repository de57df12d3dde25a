// =====================================================
// Clock
// =====================================================
// Injectable time source. Services take a Clock instead of
// calling Date.now() directly so tests can move time by hand.

export interface Clock {
  /** Milliseconds since the Unix epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Manually advanced clock for tests and simulations.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
