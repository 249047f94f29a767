/** Source of the current Unix time in milliseconds, supplied per call */
export interface Clock {
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Date.now()),
};

/** Clock pinned to a value; advance it by hand */
export class ManualClock implements Clock {
  constructor(private current: bigint) {}

  now(): bigint {
    return this.current;
  }

  set(timeMs: bigint): void {
    this.current = timeMs;
  }

  advance(ms: bigint): void {
    this.current += ms;
  }
}
