import { ChatOllama } from '@langchain/ollama';
import { AIMessage, HumanMessage, SystemMessage, type MessageContent } from '@langchain/core/messages';
import type { ChatMessage } from '@notehint/types';
import type { LLMProvider } from '../../application/providers/LLMProvider';
import logger from '../logger';

export interface OllamaOptions {
    model: string;
    baseUrl: string;
}

export class OllamaLLMProvider implements LLMProvider {
    private model: ChatOllama;

    constructor(options?: Partial<OllamaOptions>) {
        this.model = new ChatOllama({
            model: options?.model || process.env.OLLAMA_MODEL || "phi3:mini",
            baseUrl: options?.baseUrl || process.env.OLLAMA_BASE_URL || "http://127.0.0.1:11434",
            temperature: 0.1,
        });
    }

    async generateResponse(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
        const langChainMessages = messages.map((m) => {
            if (m.role === "system") return new SystemMessage(m.content);
            if (m.role === "assistant") return new AIMessage(m.content);
            return new HumanMessage(m.content);
        });

        const response = await this.model.invoke(langChainMessages, { signal });
        const text = OllamaLLMProvider.toText(response.content);

        logger.debug('Ollama response received', { length: text.length });
        return text;
    }

    static toText(content: MessageContent): string {
        if (typeof content === 'string') return content;
        return content
            .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
            .join('');
    }
}
