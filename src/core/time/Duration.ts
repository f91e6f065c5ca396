import { TIME } from '../constants';

/**
 * Immutable span of time
 *
 * Values keep their fractional part; conversions to whole milliseconds happen
 * at the point of use, never here.
 *
 * @example
 * ```typescript
 * Duration.fromDays(30).totalDays; // 30
 * Duration.fromSeconds(1.5).totalMilliseconds; // 1500
 * ```
 */
export class Duration {
  private constructor(private readonly ms: number) {}

  static fromMilliseconds(milliseconds: number): Duration {
    return new Duration(milliseconds);
  }

  static fromSeconds(seconds: number): Duration {
    return new Duration(seconds * TIME.MS_PER_SECOND);
  }

  static fromMinutes(minutes: number): Duration {
    return new Duration(minutes * TIME.MS_PER_MINUTE);
  }

  static fromHours(hours: number): Duration {
    return new Duration(hours * TIME.MS_PER_HOUR);
  }

  static fromDays(days: number): Duration {
    return new Duration(days * TIME.MS_PER_DAY);
  }

  /**
   * The shorter of two durations (the first one on a tie)
   */
  static min(a: Duration, b: Duration): Duration {
    return b.compareTo(a) < 0 ? b : a;
  }

  get totalMilliseconds(): number {
    return this.ms;
  }

  get totalDays(): number {
    return this.ms / TIME.MS_PER_DAY;
  }

  /**
   * Negative, zero or positive as this duration is shorter than, equal to or longer than `other`
   */
  compareTo(other: Duration): number {
    return Math.sign(this.ms - other.ms);
  }
}
