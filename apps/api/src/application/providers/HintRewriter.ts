import type { Note } from '../../domain/entities/Note';

export type HintRewriterKind = 'llm' | 'template';

/**
 * Rephrases a synthesized hint in natural language.
 * Implementations may reject; callers fall back to templateText.
 */
export interface HintRewriter {
    readonly kind: HintRewriterKind;
    rewrite(note: Note, currentTime: Date, templateText: string): Promise<string>;
}
