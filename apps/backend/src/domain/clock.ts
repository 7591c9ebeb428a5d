/**
 * Wall clock in epoch seconds. Services take a Clock so holds, cart TTLs and
 * voucher windows can be driven deterministically in tests.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

export class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(epochSeconds: number): void {
    this.current = epochSeconds;
  }

  advanceMinutes(minutes: number): void {
    this.current += minutes * 60;
  }

  advanceSeconds(seconds: number): void {
    this.current += seconds;
  }
}
