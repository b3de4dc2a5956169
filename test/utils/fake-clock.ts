import { Clock } from '../../src/common/clock';

export const TEST_NOW = new Date('2026-03-10T12:00:00.000Z');

export class FakeClock implements Clock {
  private current: Date;

  constructor(start: Date = TEST_NOW) {
    this.current = new Date(start.getTime());
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }

  advanceMs(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  advanceMinutes(minutes: number): void {
    this.advanceMs(minutes * 60 * 1000);
  }

  advanceDays(days: number): void {
    this.advanceMinutes(days * 24 * 60);
  }
}
