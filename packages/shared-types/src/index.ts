import type { z } from 'zod';
import type {
  categoryTypeSchema,
  noteSchema,
  textBasedHintSchema,
  timePatternsSchema,
  triggerSchema,
  triggerTypeSchema,
} from './schemas';

export * from './schemas';

export type CategoryType = z.infer<typeof categoryTypeSchema>;
export type TriggerType = z.infer<typeof triggerTypeSchema>;

/**
 * Trigger as it travels over the wire. Time values use "YYYY-MM-DD HH:MM".
 */
export type TriggerDto = z.infer<typeof triggerSchema>;

/**
 * Note shared between the API and its clients
 */
export type NoteDto = z.infer<typeof noteSchema>;

export type TextBasedHintRequest = z.infer<typeof textBasedHintSchema>;
export type TimePatternsRequest = z.infer<typeof timePatternsSchema>;

export interface TextBasedHintResponse {
  note: NoteDto;
  hint_text: string;
}

export interface CategoryPatternDto {
  categoryType: CategoryType;
  count: number;
  avgTime: string; // HH:MM
}

export interface TimePatternsResponse {
  patterns: CategoryPatternDto[];
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}
