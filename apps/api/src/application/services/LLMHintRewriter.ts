import type { ChatMessage } from '@notehint/types';
import type { Note } from '../../domain/entities/Note';
import { formatTimestamp } from '../../domain/entities/TimeOfDay';
import type { HintRewriter } from '../providers/HintRewriter';
import type { LLMProvider } from '../providers/LLMProvider';
import { NoteMapper } from '../mappers/NoteMapper';
import { sanitizeInput } from '../utils/sanitizeInput';
import logger from '../../infrastructure/logger';

export interface LLMHintRewriterConfig {
    timeoutMs: number;
}

export class LLMHintRewriter implements HintRewriter {
    readonly kind = 'llm' as const;
    private config: LLMHintRewriterConfig;

    constructor(
        private llmProvider: LLMProvider,
        config?: Partial<LLMHintRewriterConfig>
    ) {
        this.config = {
            timeoutMs: config?.timeoutMs ?? 30000,
        };
    }

    async rewrite(note: Note, currentTime: Date, _templateText: string): Promise<string> {
        const now = formatTimestamp(currentTime);
        const dto = NoteMapper.toDto(note);
        const payload = { ...dto, text: sanitizeInput(dto.text, { maxLength: 500 }) };

        const messages: ChatMessage[] = [
            { role: 'system', content: LLMHintRewriter.buildPrompt(now) },
            { role: 'user', content: `Input:\n${JSON.stringify(payload, null, 2)}` },
        ];

        const startTime = Date.now();
        const response = await this.withTimeout(
            (signal) => this.llmProvider.generateResponse(messages, signal),
            this.config.timeoutMs,
        );
        const hint = LLMHintRewriter.firstLine(response);

        if (!hint) {
            throw new Error('LLM returned an empty hint');
        }

        logger.debug('Hint rewritten', { latency: Date.now() - startTime, category: note.category });
        return hint;
    }

    static buildPrompt(currentTime: string): string {
        return `You are an assistant that writes "smart" reminder hints. You receive a reminder in JSON format that should be offered to the user, taking their current time into account: ${currentTime}.
Reply with a single short sentence.

### Allowed values:
- \`categoryType\`: Time, Location, Event, Shopping, Call, Meeting, Deadline, Health, Routine, Other
- \`triggerType\`: Time, Location

### Rules:
1. \`categoryType\` follows the meaning of the reminder:
   - "buy milk" → Shopping
   - "call mom" → Call
   - "meeting at the cafe" → Meeting
2. \`triggerType\` depends on the condition:
   - "at 18:00" → Time
   - "in 2 hours" → Time
   - "when I get to the grocery store" → Location
3. Relative times ("tomorrow", "in an hour") always refer to an absolute time in the format "YYYY-MM-DD HH:MM".

### Example 1 (current time "2025-06-16 15:00"):
Input:
{
    "text": "Walk the dog",
    "categoryType": "Routine",
    "triggers": [{ "triggerType": "Time", "triggerValue": "2025-06-16 18:00" }]
}
Output:
Remind you to walk the dog in 3 hours?

### Example 2 (current time "2025-06-16 09:00"):
Input:
{
    "text": "Call the doctor",
    "categoryType": "Health",
    "triggers": [{ "triggerType": "Time", "triggerValue": "2025-06-17 10:00" }]
}
Output:
Remind you to call the doctor tomorrow at 10:00?

Now write the hint for the following reminder (current time: ${currentTime}).`;
    }

    static firstLine(text: string): string {
        const line = text.split(/\r?\n/).map((l) => l.trim()).find((l) => l.length > 0);
        return line ?? '';
    }

    /** Aborts the provider call once the timeout fires, so it does not keep running. */
    private async withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        const timeoutPromise = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new Error(`Hint rewrite timeout after ${timeoutMs}ms`));
            }, timeoutMs);
        });

        try {
            return await Promise.race([run(controller.signal), timeoutPromise]);
        } finally {
            clearTimeout(timer);
        }
    }
}
