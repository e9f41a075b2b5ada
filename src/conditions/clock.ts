export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that only moves when told to. Used wherever a deterministic
 * transition time is needed, tests in particular.
 */
export class ManualClock implements Clock {
  private current: Date;

  constructor(start: Date | string) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  set(time: Date | string): void {
    this.current = new Date(time);
  }

  advance(milliseconds: number): void {
    this.current = new Date(this.current.getTime() + milliseconds);
  }
}

/**
 * Formats a transition time as RFC 3339 in UTC, truncated to whole seconds,
 * e.g. `2024-03-01T10:15:30Z`. Serialized conditions keep second precision,
 * so anything finer would not survive a round trip.
 */
export function toTransitionTime(date: Date): string {
  const truncated = new Date(Math.floor(date.getTime() / 1000) * 1000);
  return truncated.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
