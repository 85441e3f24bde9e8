import type { CategoryType } from '@notehint/types';
import type { Note } from './Note';

/**
 * Notes of one category whose texts were judged near-duplicates.
 * Holds references to the caller's notes; nothing is copied.
 */
export interface NoteCluster {
    readonly category: CategoryType;
    readonly notes: readonly Note[];
}
