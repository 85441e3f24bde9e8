import type { CategoryType } from '@notehint/types';
import type { Note } from '../entities/Note';
import type { CategoryPattern, TimeSignature } from '../entities/TimeSignature';
import {
    SECONDS_PER_DAY,
    type TimeOfDay,
    fromSeconds,
    parseTimestamp,
    timeOfDayOf,
    toSeconds,
} from '../entities/TimeOfDay';

export type TimeAveraging = 'linear' | 'circular';

/**
 * Arithmetic mean of seconds since midnight, truncated to the second.
 * Times straddling midnight average toward midday (23:50 and 00:10 give 12:00).
 * Callers must not pass an empty list.
 */
export function averageTime(times: readonly TimeOfDay[]): TimeOfDay {
    if (times.length === 0) {
        throw new Error('Cannot average an empty list of times');
    }
    const total = times.reduce((sum, time) => sum + toSeconds(time), 0);
    return fromSeconds(Math.trunc(total / times.length));
}

/**
 * Mean on the 24h circle, so 23:50 and 00:10 give 00:00. Falls back to the
 * linear mean when the times cancel out and no direction is defined.
 */
export function averageTimeCircular(times: readonly TimeOfDay[]): TimeOfDay {
    if (times.length === 0) {
        throw new Error('Cannot average an empty list of times');
    }

    let sin = 0;
    let cos = 0;
    for (const time of times) {
        const angle = (toSeconds(time) / SECONDS_PER_DAY) * 2 * Math.PI;
        sin += Math.sin(angle);
        cos += Math.cos(angle);
    }

    if (Math.abs(sin) < 1e-9 && Math.abs(cos) < 1e-9) {
        return averageTime(times);
    }

    const angle = Math.atan2(sin, cos);
    return fromSeconds(Math.round((angle / (2 * Math.PI)) * SECONDS_PER_DAY));
}

export class TimePatternAnalyzer {
    constructor(private readonly averaging: TimeAveraging = 'linear') {}

    average(times: readonly TimeOfDay[]): TimeOfDay {
        return this.averaging === 'circular' ? averageTimeCircular(times) : averageTime(times);
    }

    /**
     * Temporal signature of a group of notes. Location triggers and Time
     * triggers whose value does not parse are left out.
     */
    signatureOf(notes: readonly Note[]): TimeSignature {
        const triggerTimes = notes.flatMap((note) => this.timeTriggersOf(note));

        return {
            avgCreationTime: this.average(notes.map((note) => timeOfDayOf(note.createdAt))),
            avgTriggerTime: triggerTimes.length > 0 ? this.average(triggerTimes) : null,
            sampleCount: notes.length,
            triggerCount: triggerTimes.length,
        };
    }

    /**
     * Time-trigger count and mean per category, in order of first appearance.
     * Categories without a usable time trigger are absent from the result.
     */
    categoryPatterns(notes: readonly Note[]): Map<CategoryType, CategoryPattern> {
        const timesByCategory = new Map<CategoryType, TimeOfDay[]>();

        for (const note of notes) {
            const times = this.timeTriggersOf(note);
            if (times.length === 0) continue;

            const bucket = timesByCategory.get(note.category) ?? [];
            bucket.push(...times);
            timesByCategory.set(note.category, bucket);
        }

        const patterns = new Map<CategoryType, CategoryPattern>();
        for (const [category, times] of timesByCategory) {
            patterns.set(category, { category, count: times.length, avgTime: this.average(times) });
        }
        return patterns;
    }

    private timeTriggersOf(note: Note): TimeOfDay[] {
        const times: TimeOfDay[] = [];
        for (const trigger of note.triggers) {
            if (trigger.kind !== 'Time') continue;
            const at = parseTimestamp(trigger.value);
            if (at) times.push(timeOfDayOf(at));
        }
        return times;
    }
}
