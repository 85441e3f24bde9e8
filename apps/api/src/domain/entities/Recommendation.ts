import type { NoteCluster } from './NoteCluster';
import type { TimeOfDay } from './TimeOfDay';
import type { TimeSignature } from './TimeSignature';

export interface Recommendation {
    readonly cluster: NoteCluster;
    readonly signature: TimeSignature & { readonly avgTriggerTime: TimeOfDay };
    readonly score: number;
}
