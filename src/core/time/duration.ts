// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/**
 * A time-based amount of time, such as '34.5 seconds', held with millisecond resolution.
 *
 * This is a value-based class; use {@link Duration.equals} for comparisons.
 */
export class Duration {
  /**
   * A constant for a duration of zero.
   */
  public static readonly ZERO = new Duration(0);

  private constructor(private readonly millis: number) {
    if (!Number.isFinite(millis)) {
      throw new IllegalArgumentError('duration must be finite', millis);
    }
  }

  public static ofMillis(millis: number): Duration {
    return millis === 0 ? Duration.ZERO : new Duration(Math.trunc(millis));
  }

  public static ofSeconds(seconds: number): Duration {
    return Duration.ofMillis(seconds * 1000);
  }

  public static ofMinutes(minutes: number): Duration {
    return Duration.ofSeconds(minutes * 60);
  }

  /**
   * The amount of time elapsed between two instants; negative when `end` is before `start`.
   */
  public static between(start: Date, end: Date): Duration {
    return Duration.ofMillis(end.getTime() - start.getTime());
  }

  public isZero(): boolean {
    return this.millis === 0;
  }

  public isNegative(): boolean {
    return this.millis < 0;
  }

  public toMillis(): number {
    return this.millis;
  }

  /**
   * Whole seconds in this duration, truncated towards zero.
   */
  public toSeconds(): number {
    return Math.trunc(this.millis / 1000);
  }

  public plus(other: Duration): Duration {
    return other.isZero() ? this : Duration.ofMillis(this.millis + other.millis);
  }

  public multipliedBy(multiplicand: number): Duration {
    return multiplicand === 1 ? this : Duration.ofMillis(this.millis * multiplicand);
  }

  public compareTo(other: Duration): number {
    return Math.sign(this.millis - other.millis);
  }

  public equals(other: Duration): boolean {
    return this.millis === other.millis;
  }

  /**
   * A compact human readable form such as `2d3h`, `1h2m`, `45s` or `250ms`.
   */
  public toString(): string {
    const abs = Math.abs(this.millis);
    const sign = this.millis < 0 ? '-' : '';
    if (abs < 1000) {
      return `${sign}${abs}ms`;
    }

    const totalSeconds = Math.floor(abs / 1000);
    const days = Math.floor(totalSeconds / 86_400);
    const hours = Math.floor((totalSeconds % 86_400) / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = totalSeconds % 60;
    if (days > 0) {
      return `${sign}${days}d${hours}h`;
    }
    if (hours > 0) {
      return `${sign}${hours}h${minutes}m`;
    }
    if (minutes > 0) {
      return `${sign}${minutes}m${seconds}s`;
    }
    return `${sign}${seconds}s`;
  }
}
