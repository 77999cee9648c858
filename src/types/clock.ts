/**
 * Clock interface
 * Abstracts time so resource names and run ids are deterministic in tests
 */

export interface Clock {
  now(): Date;

  /**
   * Current time as an ISO 8601 string
   */
  iso(): string;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  iso(): string {
    return new Date().toISOString();
  }
}

/**
 * Clock frozen at a fixed instant, advanced by hand
 */
export class MockClock implements Clock {
  private currentTime: Date;

  constructor(initialTime?: Date) {
    this.currentTime = initialTime ?? new Date('2025-01-01T00:00:00.000Z');
  }

  now(): Date {
    return new Date(this.currentTime);
  }

  iso(): string {
    return this.currentTime.toISOString();
  }

  advance(ms: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + ms);
  }
}

/**
 * UTC calendar date (YYYY-MM-DD) of the given instant
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
