import type { ChatMessage } from '@notehint/types';

export interface LLMProvider {
    generateResponse(messages: ChatMessage[], signal?: AbortSignal): Promise<string>;
}
