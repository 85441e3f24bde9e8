import type { CategoryType } from '@notehint/types';
import { Note, Trigger } from '../src/domain/entities/Note';
import { parseTimestamp } from '../src/domain/entities/TimeOfDay';

export function at(value: string): Date {
    const date = parseTimestamp(value);
    if (!date) throw new Error(`Bad test timestamp: ${value}`);
    return date;
}

export function createNote(
    text: string,
    category: CategoryType,
    createdAt: string,
    triggerTimes: string[] = [],
    locations: string[] = [],
): Note {
    return new Note(
        text,
        category,
        at(createdAt),
        null,
        [
            ...triggerTimes.map((value) => new Trigger('Time', value)),
            ...locations.map((value) => new Trigger('Location', value)),
        ],
    );
}

/**
 * Three near-identical shopping notes created around 17:00 and firing around
 * 18:00, plus single notes in other categories.
 */
export function shoppingHistory(): Note[] {
    return [
        createNote('Buy milk and bread', 'Shopping', '2025-06-10 17:00', ['2025-06-10 18:00']),
        createNote('Buy milk and bread', 'Shopping', '2025-06-11 17:10', ['2025-06-11 18:10']),
        createNote('Buy milk and fresh bread', 'Shopping', '2025-06-12 16:50', ['2025-06-12 17:50']),
        createNote('Call mom about the weekend', 'Call', '2025-06-12 09:00', ['2025-06-12 10:00']),
        createNote('Take vitamins after breakfast', 'Health', '2025-06-13 08:00', ['2025-06-13 08:30']),
    ];
}
