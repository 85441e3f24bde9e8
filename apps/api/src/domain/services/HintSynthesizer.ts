import type { HintRewriter } from '../../application/providers/HintRewriter';
import type { HintResult } from '../entities/HintResult';
import { Note, Trigger } from '../entities/Note';
import type { Recommendation } from '../entities/Recommendation';
import { type TimeOfDay, formatTimeOfDay, formatTimestamp } from '../entities/TimeOfDay';
import logger from '../../infrastructure/logger';

export function buildHintText(text: string, count: number, avgCreation: TimeOfDay, avgTrigger: TimeOfDay): string {
    return `You often set reminder '${text}' (${count} similar notes found). ` +
        `You usually create such reminders around ${formatTimeOfDay(avgCreation)}, ` +
        `and they fire at ${formatTimeOfDay(avgTrigger)}.`;
}

/**
 * currentTime moved to the given time of day; a result not strictly after
 * currentTime is pushed to the next calendar day.
 */
export function nextOccurrence(currentTime: Date, time: TimeOfDay): Date {
    const next = new Date(currentTime.getTime());
    next.setUTCHours(time.hour, time.minute, 0, 0);
    if (next.getTime() <= currentTime.getTime()) {
        next.setUTCDate(next.getUTCDate() + 1);
    }
    return next;
}

export class HintSynthesizer {
    constructor(private readonly rewriter: HintRewriter) {}

    async synthesize(recommendation: Recommendation, currentTime: Date): Promise<HintResult> {
        const { cluster, signature } = recommendation;
        const representative = cluster.notes[0];

        const triggerAt = nextOccurrence(currentTime, signature.avgTriggerTime);
        const note = new Note(
            representative.text,
            cluster.category,
            currentTime,
            null,
            [new Trigger('Time', formatTimestamp(triggerAt))],
        );

        const templateText = buildHintText(
            representative.text,
            signature.sampleCount,
            signature.avgCreationTime,
            signature.avgTriggerTime,
        );

        return { note, ...(await this.phrase(note, currentTime, templateText)) };
    }

    private async phrase(note: Note, currentTime: Date, templateText: string): Promise<Pick<HintResult, 'hintText' | 'source'>> {
        try {
            const rewritten = (await this.rewriter.rewrite(note, currentTime, templateText)).trim();
            if (rewritten) {
                return { hintText: rewritten, source: this.rewriter.kind === 'llm' ? 'rewritten' : 'template' };
            }
            logger.warn('Hint rewriter returned empty text, using template', { category: note.category });
        } catch (error) {
            logger.warn('Hint rewriter failed, using template', {
                error: error instanceof Error ? error.message : 'Unknown error',
                category: note.category,
            });
        }

        return { hintText: templateText, source: 'template' };
    }
}
