import { DomainErrorCode, ValidationError } from '../errors/domain.errors';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * A calendar date with no time-of-day, stored as days since the Unix epoch (UTC).
 * Years run from 0 to 9999 so that every date formats as `YYYY-MM-DD`.
 */
export class CalendarDate {
  private constructor(private readonly epochDay: number | null) {}

  static of(year: number, month: number, day: number): CalendarDate {
    // setUTCFullYear, unlike Date.UTC, does not map years 0-99 onto 1900-1999
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    if (
      !Number.isInteger(year) ||
      year < 0 ||
      year > 9999 ||
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day
    ) {
      throw new ValidationError(
        DomainErrorCode.INVALID_DATE_FORMAT,
        `${year}-${month}-${day} is not a calendar date`,
      );
    }
    return new CalendarDate(Math.floor(date.getTime() / MS_PER_DAY));
  }

  /** Parses `YYYY-MM-DD`; anything else fails with INVALID_DATE_FORMAT. */
  static parse(value: string): CalendarDate {
    const match = ISO_DATE.exec(value);
    if (!match) {
      throw new ValidationError(
        DomainErrorCode.INVALID_DATE_FORMAT,
        'invalid date format, expected YYYY-MM-DD',
      );
    }
    const [, year, month, day] = match;
    try {
      return CalendarDate.of(Number(year), Number(month), Number(day));
    } catch {
      throw new ValidationError(
        DomainErrorCode.INVALID_DATE_FORMAT,
        'invalid date format, expected YYYY-MM-DD',
      );
    }
  }

  static zero(): CalendarDate {
    return new CalendarDate(null);
  }

  isZero(): boolean {
    return this.epochDay === null;
  }

  isBefore(other: CalendarDate): boolean {
    return this.ordinal() < other.ordinal();
  }

  isAfter(other: CalendarDate): boolean {
    return this.ordinal() > other.ordinal();
  }

  equals(other: CalendarDate): boolean {
    return this.epochDay === other.epochDay;
  }

  get year(): number {
    return this.toDate().getUTCFullYear();
  }

  get month(): number {
    return this.toDate().getUTCMonth() + 1;
  }

  get day(): number {
    return this.toDate().getUTCDate();
  }

  /** Whole calendar months from this date to `other`, ignoring days. */
  monthsUntil(other: CalendarDate): number {
    return (other.year - this.year) * 12 + (other.month - this.month);
  }

  toDate(): Date {
    return new Date(this.ordinal() * MS_PER_DAY);
  }

  toString(): string {
    if (this.epochDay === null) return '';
    return this.toDate().toISOString().slice(0, 10);
  }

  toJSON(): string {
    return this.toString();
  }

  // zero sorts before every real date, like the zero time does
  private ordinal(): number {
    return this.epochDay ?? Number.MIN_SAFE_INTEGER;
  }
}
