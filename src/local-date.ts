const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * A calendar date without a time of day or zone, the value a `date` field
 * holds. Serializes as `YYYY-MM-DD`.
 */
export class LocalDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;

  constructor(year: number, month: number, day: number) {
    const candidate = new Date(Date.UTC(year, month - 1, day));
    if (
      !Number.isInteger(year) ||
      candidate.getUTCFullYear() !== year ||
      candidate.getUTCMonth() !== month - 1 ||
      candidate.getUTCDate() !== day
    ) {
      throw new RangeError(`Invalid calendar date: ${year}-${month}-${day}`);
    }
    this.year = year;
    this.month = month;
    this.day = day;
    Object.freeze(this);
  }

  static parse(text: string): LocalDate {
    const match = ISO_DATE.exec(text);
    if (!match) {
      throw new RangeError(`Expected an ISO date (YYYY-MM-DD), got "${text}"`);
    }
    return new LocalDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  toString(): string {
    const pad = (n: number, width: number) => String(n).padStart(width, "0");
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
