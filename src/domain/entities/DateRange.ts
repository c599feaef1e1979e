/**
 * Textual date layouts understood by the API and the upstream source.
 */
export type DateFormat = 'DD-MM-YYYY' | 'YYYY-MM-DD';

export const DATE_FORMATS: readonly DateFormat[] = ['DD-MM-YYYY', 'YYYY-MM-DD'];

/**
 * A validated calendar date. Months and days are 1-based.
 */
export interface CalendarDate {
    readonly year: number;
    readonly month: number;
    readonly day: number;
}

/**
 * Inclusive date range queried from the upstream source.
 * Invariant: start <= end.
 */
export interface DateRange {
    readonly start: CalendarDate;
    readonly end: CalendarDate;
}

const DAY_FIRST = /^(\d{2})-(\d{2})-(\d{4})$/;
const YEAR_FIRST = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isDateFormat(value: string): value is DateFormat {
    return DATE_FORMATS.some((format) => format === value);
}

function daysInMonth(year: number, month: number): number {
    // Day 0 of the next month is the last day of this one
    return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
    if (year < 1 || month < 1 || month > 12 || day < 1) {
        return null;
    }
    if (day > daysInMonth(year, month)) {
        return null;
    }
    return Object.freeze({ year, month, day });
}

/**
 * Parses a date in the given layout. When no layout is given, both
 * DD-MM-YYYY and YYYY-MM-DD are accepted.
 * @returns null when the text is malformed or names a non-existent day
 */
export function parseCalendarDate(text: string, format?: DateFormat): CalendarDate | null {
    const value = text.trim();

    if (format !== 'YYYY-MM-DD') {
        const match = DAY_FIRST.exec(value);
        if (match) {
            return toCalendarDate(Number(match[3]), Number(match[2]), Number(match[1]));
        }
    }

    if (format !== 'DD-MM-YYYY') {
        const match = YEAR_FIRST.exec(value);
        if (match) {
            return toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
        }
    }

    return null;
}

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

export function formatCalendarDate(date: CalendarDate, format: DateFormat): string {
    const year = pad(date.year, 4);
    const month = pad(date.month, 2);
    const day = pad(date.day, 2);
    return format === 'DD-MM-YYYY' ? `${day}-${month}-${year}` : `${year}-${month}-${day}`;
}

/**
 * Canonical representation used in cache keys and logs.
 */
export function toIsoDate(date: CalendarDate): string {
    return formatCalendarDate(date, 'YYYY-MM-DD');
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
    return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function isValidRange(range: DateRange): boolean {
    return compareCalendarDates(range.start, range.end) <= 0;
}
