import type { CategoryType, TriggerType } from '@notehint/types';

export class Trigger {
    constructor(
        public readonly kind: TriggerType,
        public readonly value: string, // timestamp for Time, opaque for Location
    ) {}
}

export class Note {
    constructor(
        public readonly text: string,
        public readonly category: CategoryType,
        public readonly createdAt: Date,
        public readonly updatedAt: Date | null,
        public readonly triggers: readonly Trigger[],
    ) {}
}
