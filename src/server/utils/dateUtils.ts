/**
 * Date utility functions for calendar dates in agreement placeholders
 * Calendar dates carry no time of day and no time zone; conversions from
 * Date instances use the local calendar fields.
 */

function pad(value: number, length: number = 2): string {
    return String(value).padStart(length, '0');
}

/**
 * A calendar date (year, month, day)
 *
 * `new IsoDate()` is today's date and serves as the default when a
 * dataset records no date.
 */
export class IsoDate {
    readonly year: number;
    readonly month: number;
    readonly day: number;

    constructor(value?: string | Date) {
        if (typeof value === 'string') {
            const parsed = parseIsoCalendarDate(value);
            this.year = parsed.year;
            this.month = parsed.month;
            this.day = parsed.day;
        } else {
            const date = value ?? new Date();
            this.year = date.getFullYear();
            this.month = date.getMonth() + 1;
            this.day = date.getDate();
        }
    }

    /**
     * Local midnight of this calendar day
     */
    toDate(): Date {
        return new Date(this.year, this.month - 1, this.day);
    }

    compareTo(other: IsoDate): number {
        return (this.year - other.year) || (this.month - other.month) || (this.day - other.day);
    }

    isAfter(other: IsoDate): boolean {
        return this.compareTo(other) > 0;
    }

    toString(): string {
        return `${pad(this.year, 4)}-${pad(this.month)}-${pad(this.day)}`;
    }
}

/**
 * Parse an ISO 8601 calendar date (`YYYY-MM-DD`)
 *
 * @throws Error if the text is not a valid calendar date
 */
export function parseIsoCalendarDate(dateString: string): { year: number; month: number; day: number } {
    const match = dateString.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) {
        throw new Error(`Invalid ISO calendar date: ${dateString}. Expected format: YYYY-MM-DD`);
    }

    const year = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const day = parseInt(match[3], 10);

    const check = new Date(year, month - 1, day);
    if (check.getFullYear() !== year || check.getMonth() !== month - 1 || check.getDate() !== day) {
        throw new Error(`Invalid ISO calendar date: ${dateString}. No such day`);
    }

    return { year, month, day };
}

/**
 * Format a date with a year-month-day pattern
 *
 * Supported tokens: `YYYY`/`yyyy` (year), `MM` (month), `dd`/`DD` (day of month).
 * Any other character is copied as is.
 */
export function formatCalendarDate(date: Date, pattern: string): string {
    return pattern.replace(/YYYY|yyyy|MM|dd|DD/g, (token) => {
        switch (token) {
            case 'MM':
                return pad(date.getMonth() + 1);
            case 'dd':
            case 'DD':
                return pad(date.getDate());
            default:
                return pad(date.getFullYear(), 4);
        }
    });
}

/**
 * Format a date and time as `YYYY-MM-DD HH:mm:ss` in local time
 */
export function formatDateTime(date: Date): string {
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
    return `${formatCalendarDate(date, 'YYYY-MM-DD')} ${time}`;
}
