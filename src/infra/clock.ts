/** Wall-clock source for payment timestamps and card expiry checks. */
export interface ClockPort {
  now(): Date;
  nowIso(): string;
}

export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }

  nowIso(): string {
    return this.now().toISOString();
  }
}
