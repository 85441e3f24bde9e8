import { describe, it, expect } from 'vitest';
import type { CategoryType } from '@notehint/types';
import { RecommendationScorer } from '../src/domain/services/RecommendationScorer';
import { TimePatternAnalyzer } from '../src/domain/services/TimePatternAnalyzer';
import { SimilarityGrouper } from '../src/domain/services/SimilarityGrouper';
import type { NoteCluster } from '../src/domain/entities/NoteCluster';
import type { TimeSignature } from '../src/domain/entities/TimeSignature';
import { at, createNote, shoppingHistory } from './helpers';

const signature = (hour: number, minute: number, sampleCount: number): TimeSignature => ({
    avgCreationTime: { hour, minute },
    avgTriggerTime: { hour: 18, minute: 0 },
    sampleCount,
    triggerCount: sampleCount,
});

const cluster = (category: CategoryType, createdAt: string[], trigger: string | null = '2025-06-10 18:00'): NoteCluster => ({
    category,
    notes: createdAt.map((c) => createNote(`${category} reminder`, category, c, trigger ? [trigger] : [])),
});

describe('RecommendationScorer', () => {
    const scorer = new RecommendationScorer(new TimePatternAnalyzer());

    describe('score', () => {
        const nine = at('2025-06-14 09:00');

        it('should reach 1 for a saturated cluster created at the current hour', () => {
            expect(scorer.score(signature(9, 0, 5), nine)).toBe(1);
        });

        it('should discount small clusters proportionally', () => {
            expect(scorer.score(signature(9, 0, 2), nine)).toBeCloseTo(0.4, 10);
        });

        it('should saturate above five notes', () => {
            expect(scorer.score(signature(9, 0, 8), nine)).toBe(1);
        });

        it('should decay linearly with the distance to the creation time', () => {
            expect(scorer.score(signature(15, 0, 5), nine)).toBeCloseTo(0.5, 10);
            expect(scorer.score(signature(6, 0, 5), nine)).toBeCloseTo(0.75, 10);
        });

        it('should drop to zero twelve or more hours away', () => {
            expect(scorer.score(signature(21, 0, 5), nine)).toBe(0);
            expect(scorer.score(signature(23, 0, 5), at('2025-06-14 01:00'))).toBe(0);
        });

        it('should use the configured window and saturation', () => {
            const custom = new RecommendationScorer(new TimePatternAnalyzer(), { decayWindowHours: 6, countSaturation: 2 });
            expect(custom.score(signature(12, 0, 2), nine)).toBeCloseTo(0.5, 10);
        });
    });

    describe('selectBest', () => {
        const now = at('2025-06-14 17:10');

        it('should return null for an empty map', () => {
            expect(scorer.selectBest(new Map(), now)).toBeNull();
        });

        it('should ignore singleton clusters', () => {
            const clusters = new Map<CategoryType, NoteCluster[]>([['Shopping', [cluster('Shopping', ['2025-06-10 17:00'])]]]);
            expect(scorer.selectBest(clusters, now)).toBeNull();
        });

        it('should ignore clusters without a time trigger', () => {
            const clusters = new Map<CategoryType, NoteCluster[]>([['Shopping', [cluster('Shopping', ['2025-06-10 17:00', '2025-06-11 17:00'], null)]]]);
            expect(scorer.selectBest(clusters, now)).toBeNull();
        });

        it('should ignore clusters scoring zero', () => {
            const clusters = new Map<CategoryType, NoteCluster[]>([['Health', [cluster('Health', ['2025-06-10 05:00', '2025-06-11 05:00'])]]]);
            expect(scorer.selectBest(clusters, now)).toBeNull();
        });

        it('should pick the highest score across categories', () => {
            const call = cluster('Call', ['2025-06-10 09:00', '2025-06-11 09:00']);
            const shopping = cluster('Shopping', ['2025-06-10 17:00', '2025-06-11 17:20', '2025-06-12 17:10']);
            const clusters = new Map<CategoryType, NoteCluster[]>([
                ['Call', [call]],
                ['Shopping', [shopping]],
            ]);

            const best = scorer.selectBest(clusters, now);

            expect(best?.cluster).toBe(shopping);
            expect(best?.score).toBeCloseTo(0.6, 10);
            expect(best?.signature.avgTriggerTime).toEqual({ hour: 18, minute: 0 });
        });

        it('should keep the first cluster on a tie', () => {
            const first = cluster('Call', ['2025-06-10 17:10', '2025-06-11 17:10']);
            const second = cluster('Meeting', ['2025-06-10 17:10', '2025-06-11 17:10']);
            const clusters = new Map<CategoryType, NoteCluster[]>([
                ['Call', [first]],
                ['Meeting', [second]],
            ]);

            expect(scorer.selectBest(clusters, now)?.cluster).toBe(first);
        });

        it('should find nothing in a history without time triggers', () => {
            const history = shoppingHistory().map((n) => createNote(n.text, n.category, '2025-06-10 17:00'));
            const clusters = new SimilarityGrouper().group(history);

            expect(clusters.get('Shopping')?.[0].notes).toHaveLength(3);
            expect(scorer.selectBest(clusters, now)).toBeNull();
        });
    });
});
