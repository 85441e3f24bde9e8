import type { Note } from '../../domain/entities/Note';
import type { HintResult } from '../../domain/entities/HintResult';
import type { Recommendation } from '../../domain/entities/Recommendation';
import type { SimilarityGrouper } from '../../domain/services/SimilarityGrouper';
import type { RecommendationScorer } from '../../domain/services/RecommendationScorer';
import type { HintSynthesizer } from '../../domain/services/HintSynthesizer';
import { formatTimestamp } from '../../domain/entities/TimeOfDay';
import logger from '../../infrastructure/logger';

export type HintEngineState = 'idle' | 'grouping' | 'scoring' | 'synthesizing' | 'done' | 'noRecommendation';

export type NoRecommendationReason = 'emptyHistory' | 'noRecurringPattern';

export type HintOutcome =
    | { status: 'recommended'; result: HintResult; recommendation: Recommendation; trace: HintEngineState[] }
    | { status: 'noRecommendation'; reason: NoRecommendationReason; trace: HintEngineState[] };

/**
 * Runs idle → grouping → scoring → synthesizing → done, or stops in
 * noRecommendation. The path is linear and never returns a partial result.
 */
export class GenerateHint {
    constructor(
        private grouper: SimilarityGrouper,
        private scorer: RecommendationScorer,
        private synthesizer: HintSynthesizer,
    ) {}

    async execute(notes: readonly Note[], currentTime: Date): Promise<HintOutcome> {
        const trace: HintEngineState[] = ['idle'];
        const startTime = Date.now();
        const advance = (next: HintEngineState) => {
            logger.debug('Hint engine transition', { from: trace[trace.length - 1], to: next });
            trace.push(next);
        };

        advance('grouping');
        if (notes.length === 0) {
            advance('noRecommendation');
            logger.info('No recommendation', { reason: 'emptyHistory' });
            return { status: 'noRecommendation', reason: 'emptyHistory', trace };
        }
        const clusters = this.grouper.group(notes);

        advance('scoring');
        const recommendation = this.scorer.selectBest(clusters, currentTime);
        if (!recommendation) {
            advance('noRecommendation');
            logger.info('No recommendation', { reason: 'noRecurringPattern', notes: notes.length });
            return { status: 'noRecommendation', reason: 'noRecurringPattern', trace };
        }

        advance('synthesizing');
        const result = await this.synthesizer.synthesize(recommendation, currentTime);

        advance('done');
        logger.info('Hint generated', {
            category: recommendation.cluster.category,
            score: recommendation.score,
            sampleCount: recommendation.signature.sampleCount,
            currentTime: formatTimestamp(currentTime),
            source: result.source,
            latency: Date.now() - startTime,
        });

        return { status: 'recommended', result, recommendation, trace };
    }
}
