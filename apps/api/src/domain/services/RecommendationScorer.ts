import type { CategoryType } from '@notehint/types';
import type { NoteCluster } from '../entities/NoteCluster';
import type { Recommendation } from '../entities/Recommendation';
import type { TimeSignature } from '../entities/TimeSignature';
import { timeOfDayOf, toSeconds } from '../entities/TimeOfDay';
import type { TimePatternAnalyzer } from './TimePatternAnalyzer';

export interface ScoringConfig {
    /** Hours of distance at which the time factor reaches zero. */
    decayWindowHours: number;
    /** Number of notes at which the count factor saturates. */
    countSaturation: number;
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
    decayWindowHours: 12,
    countSaturation: 5,
};

export class RecommendationScorer {
    constructor(
        private readonly analyzer: TimePatternAnalyzer,
        private readonly config: ScoringConfig = DEFAULT_SCORING_CONFIG,
    ) {}

    /**
     * timeFactor × countFactor, both in [0, 1]. The time distance is taken
     * within one day, without wrapping around midnight.
     */
    score(signature: TimeSignature, currentTime: Date): number {
        const distanceHours = Math.abs(toSeconds(timeOfDayOf(currentTime)) - toSeconds(signature.avgCreationTime)) / 3600;
        const timeFactor = Math.max(0, 1 - distanceHours / this.config.decayWindowHours);
        const countFactor = Math.min(1, signature.sampleCount / this.config.countSaturation);
        return timeFactor * countFactor;
    }

    /**
     * Highest-scoring cluster across all categories. Ties keep the cluster
     * met first. Singletons, clusters without a time trigger and clusters
     * scoring zero are never returned.
     */
    selectBest(clustersByCategory: ReadonlyMap<CategoryType, readonly NoteCluster[]>, currentTime: Date): Recommendation | null {
        let best: Recommendation | null = null;

        for (const clusters of clustersByCategory.values()) {
            for (const cluster of clusters) {
                if (cluster.notes.length < 2) continue;

                const signature = this.analyzer.signatureOf(cluster.notes);
                const avgTriggerTime = signature.avgTriggerTime;
                if (avgTriggerTime === null) continue;

                const score = this.score(signature, currentTime);
                if (score > 0 && (best === null || score > best.score)) {
                    best = { cluster, signature: { ...signature, avgTriggerTime }, score };
                }
            }
        }

        return best;
    }
}
