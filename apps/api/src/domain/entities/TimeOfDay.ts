/**
 * Wall-clock time helpers.
 *
 * Timestamps are exchanged as "YYYY-MM-DD HH:MM" without a time zone. They are
 * kept in Date objects whose UTC fields hold the wall-clock value, so nothing
 * here depends on the host's time zone.
 */

export interface TimeOfDay {
    readonly hour: number;
    readonly minute: number;
}

export const SECONDS_PER_DAY = 24 * 60 * 60;

const TIMESTAMP_REGEX = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/;

export function toSeconds(time: TimeOfDay): number {
    return time.hour * 3600 + time.minute * 60;
}

export function fromSeconds(seconds: number): TimeOfDay {
    const wrapped = ((Math.floor(seconds) % SECONDS_PER_DAY) + SECONDS_PER_DAY) % SECONDS_PER_DAY;
    return {
        hour: Math.floor(wrapped / 3600),
        minute: Math.floor((wrapped % 3600) / 60),
    };
}

export function timeOfDayOf(date: Date): TimeOfDay {
    return { hour: date.getUTCHours(), minute: date.getUTCMinutes() };
}

export function formatTimeOfDay(time: TimeOfDay): string {
    return `${pad(time.hour)}:${pad(time.minute)}`;
}

/**
 * Parses "YYYY-MM-DD HH:MM". Returns null for anything else, including
 * out-of-range fields such as "2025-02-30 10:00" or "2025-06-16 24:00".
 */
export function parseTimestamp(value: string): Date | null {
    const match = TIMESTAMP_REGEX.exec(value.trim());
    if (!match) return null;

    const [year, month, day, hour, minute] = match.slice(1).map(Number);
    if (hour > 23 || minute > 59) return null;

    const date = new Date(Date.UTC(year, month - 1, day, hour, minute));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

export function formatTimestamp(date: Date): string {
    const datePart = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
    return `${datePart} ${formatTimeOfDay(timeOfDayOf(date))}`;
}

function pad(value: number): string {
    return value.toString().padStart(2, '0');
}
