import type { Note } from './Note';

export type HintTextSource = 'template' | 'rewritten';

export interface HintResult {
    readonly note: Note;
    readonly hintText: string;
    readonly source: HintTextSource;
}
