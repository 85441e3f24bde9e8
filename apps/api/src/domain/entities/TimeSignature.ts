import type { CategoryType } from '@notehint/types';
import type { TimeOfDay } from './TimeOfDay';

export interface TimeSignature {
    readonly avgCreationTime: TimeOfDay;
    /** Null when no member carries a parseable time trigger. */
    readonly avgTriggerTime: TimeOfDay | null;
    /** Number of member notes. */
    readonly sampleCount: number;
    /** Number of time triggers that went into avgTriggerTime. */
    readonly triggerCount: number;
}

export interface CategoryPattern {
    readonly category: CategoryType;
    readonly count: number;
    readonly avgTime: TimeOfDay;
}
