/**
 * Cleans note text before it is placed in an LLM prompt.
 *
 * - Strips HTML tags
 * - Replaces prompt injection phrases with a placeholder
 * - Caps the length (10,000 characters unless told otherwise)
 */

const MAX_CONTENT_LENGTH = 10000;

export const BLOCKED_PLACEHOLDER = '[BLOCKED]';

// Patterns that could be used for prompt injection
const DANGEROUS_PATTERNS = [
    /system:/gi,
    /assistant:/gi,
    /ignore previous/gi,
    /ignore all previous/gi,
    /disregard previous/gi,
    /forget previous/gi,
    /new instructions:/gi,
    /override instructions/gi,
];

export interface SanitizeOptions {
    maxLength?: number;
    stripHtml?: boolean;
    blockPatterns?: RegExp[];
}

export function sanitizeInput(
    content: string,
    options: SanitizeOptions = {}
): string {
    const {
        maxLength = MAX_CONTENT_LENGTH,
        stripHtml = true,
        blockPatterns = DANGEROUS_PATTERNS,
    } = options;

    if (!content) {
        return '';
    }

    let sanitized = content;

    if (stripHtml) {
        sanitized = sanitized.replace(/<[^>]*>/g, '');
    }

    for (const pattern of blockPatterns) {
        sanitized = sanitized.replace(pattern, BLOCKED_PLACEHOLDER);
    }

    if (sanitized.length > maxLength) {
        sanitized = sanitized.substring(0, maxLength);
    }

    return sanitized.trim();
}
