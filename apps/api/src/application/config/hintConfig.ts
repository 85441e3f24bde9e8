/**
 * Hint engine configuration from environment variables
 */

import type { TimeAveraging } from '../../domain/services/TimePatternAnalyzer';

const TIME_AVERAGINGS: readonly TimeAveraging[] = ['linear', 'circular'];
const REWRITER_MODES = ['none', 'ollama'] as const;

export type RewriterMode = (typeof REWRITER_MODES)[number];

/** Modes are kept as read so that validation can reject unknown values. */
export interface HintConfig {
    similarityThreshold: number;
    tfidfMinDf: number;
    tfidfMaxDf: number;
    decayWindowHours: number;
    countSaturation: number;
    timeAveraging: string;
    rewriter: string;
    rewriterTimeoutMs: number;
    ollamaModel: string;
    ollamaBaseUrl: string;
}

export function readHintConfig(env: NodeJS.ProcessEnv = process.env): HintConfig {
    return {
        similarityThreshold: parseFloat(env.SIMILARITY_THRESHOLD || '0.7'),
        tfidfMinDf: parseFloat(env.TFIDF_MIN_DF || '0.1'),
        tfidfMaxDf: parseFloat(env.TFIDF_MAX_DF || '0.9'),
        decayWindowHours: parseFloat(env.DECAY_WINDOW_HOURS || '12'),
        countSaturation: parseInt(env.COUNT_SATURATION || '5', 10),
        timeAveraging: env.TIME_AVERAGING || 'linear',
        rewriter: env.HINT_REWRITER || 'none',
        rewriterTimeoutMs: parseInt(env.HINT_REWRITER_TIMEOUT_MS || '30000', 10),
        ollamaModel: env.OLLAMA_MODEL || 'phi3:mini',
        ollamaBaseUrl: env.OLLAMA_BASE_URL || 'http://127.0.0.1:11434',
    };
}

export const hintConfig = readHintConfig();

/**
 * Validates hint engine configuration
 * Throws error if configuration is invalid
 */
export interface ValidHintConfig extends HintConfig {
    timeAveraging: TimeAveraging;
    rewriter: RewriterMode;
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
    return values.some((candidate) => candidate === value);
}

export function validateHintConfig(config: HintConfig = readHintConfig()): asserts config is ValidHintConfig {
    if (!(config.similarityThreshold > 0 && config.similarityThreshold < 1)) {
        throw new Error('SIMILARITY_THRESHOLD must be between 0 and 1 (exclusive)');
    }

    if (!(config.tfidfMaxDf > 0 && config.tfidfMaxDf <= 1)) {
        throw new Error('TFIDF_MAX_DF must be greater than 0 and at most 1');
    }

    if (!(config.tfidfMinDf >= 0 && config.tfidfMinDf < config.tfidfMaxDf)) {
        throw new Error('TFIDF_MIN_DF must be at least 0 and lower than TFIDF_MAX_DF');
    }

    if (!(config.decayWindowHours > 0 && config.decayWindowHours <= 24)) {
        throw new Error('DECAY_WINDOW_HOURS must be greater than 0 and at most 24');
    }

    if (!Number.isInteger(config.countSaturation) || config.countSaturation < 1) {
        throw new Error('COUNT_SATURATION must be a positive integer');
    }

    if (!(config.rewriterTimeoutMs >= 100 && config.rewriterTimeoutMs <= 120000)) {
        throw new Error('HINT_REWRITER_TIMEOUT_MS must be between 100 and 120000');
    }

    if (!isOneOf(TIME_AVERAGINGS, config.timeAveraging)) {
        throw new Error(`TIME_AVERAGING must be one of ${TIME_AVERAGINGS.join(', ')} (got '${config.timeAveraging}')`);
    }

    if (!isOneOf(REWRITER_MODES, config.rewriter)) {
        throw new Error(`HINT_REWRITER must be one of ${REWRITER_MODES.join(', ')} (got '${config.rewriter}')`);
    }
}
