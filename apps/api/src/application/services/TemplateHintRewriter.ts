import type { Note } from '../../domain/entities/Note';
import type { HintRewriter } from '../providers/HintRewriter';

/** Keeps the template text. Used when no language model is configured. */
export class TemplateHintRewriter implements HintRewriter {
    readonly kind = 'template' as const;

    async rewrite(_note: Note, _currentTime: Date, templateText: string): Promise<string> {
        return templateText;
    }
}
