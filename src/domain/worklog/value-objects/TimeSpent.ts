/**
 * Value Object representing logged time
 * Immutable, stored as whole seconds
 */
export class TimeSpent {
  private constructor(private readonly seconds: number) {
    if (!Number.isSafeInteger(seconds) || seconds < 0) {
      throw new Error(`TimeSpent must be a non-negative whole number of seconds, got ${seconds}`);
    }
  }

  static zero(): TimeSpent {
    return new TimeSpent(0);
  }

  static fromSeconds(seconds: number): TimeSpent {
    return new TimeSpent(seconds);
  }

  /**
   * Parse a Jira duration string such as "1w 2d 4h 30m".
   * Days and weeks follow the site's working-time settings, not calendar time.
   */
  static parse(text: string, hoursPerDay: number = 8, daysPerWeek: number = 5): TimeSpent {
    const trimmed = text.trim().toLowerCase();
    if (!/^(\d+(\.\d+)?\s*[wdhms]\s*)+$/.test(trimmed)) {
      throw new Error(`Unrecognised duration "${text}"`);
    }

    const unitSeconds: Record<string, number> = {
      w: daysPerWeek * hoursPerDay * 3600,
      d: hoursPerDay * 3600,
      h: 3600,
      m: 60,
      s: 1
    };

    let total = 0;
    for (const match of trimmed.matchAll(/(\d+(?:\.\d+)?)\s*([wdhms])/g)) {
      total += parseFloat(match[1]) * unitSeconds[match[2]];
    }
    return new TimeSpent(Math.round(total));
  }

  get toSeconds(): number {
    return this.seconds;
  }

  /**
   * Whole minutes, remainder seconds dropped
   */
  get toMinutes(): number {
    return Math.floor(this.seconds / 60);
  }

  add(other: TimeSpent): TimeSpent {
    return new TimeSpent(this.seconds + other.seconds);
  }

  /**
   * Format as "Xh Ym" (hours are never folded into days)
   */
  format(): string {
    const hours = Math.floor(this.toMinutes / 60);
    const minutes = this.toMinutes % 60;

    if (hours === 0) {
      return `${minutes}m`;
    }
    if (minutes === 0) {
      return `${hours}h`;
    }
    return `${hours}h ${minutes}m`;
  }

  toString(): string {
    return this.format();
  }
}
