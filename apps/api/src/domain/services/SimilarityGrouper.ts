import type { CategoryType } from '@notehint/types';
import type { Note } from '../entities/Note';
import type { NoteCluster } from '../entities/NoteCluster';
import { TfIdfVectorizer, type TfIdfOptions } from './TfIdfVectorizer';
import { similarityMatrix } from './similarity';

export interface SimilarityGrouperConfig extends TfIdfOptions {
    /** A note joins a cluster when its similarity to the anchor is strictly above this. */
    threshold: number;
}

export const DEFAULT_GROUPER_CONFIG: SimilarityGrouperConfig = {
    threshold: 0.7,
    minDf: 0.1,
    maxDf: 0.9,
};

/**
 * Splits each category's notes into clusters of near-duplicate text.
 *
 * Clustering is greedy in input order: every note not yet assigned anchors a
 * new cluster holding itself and every other note above the threshold, even
 * notes already placed in an earlier cluster. Similarity is not transitive
 * (A~B and B~C without A~C), so membership depends on the order of the input.
 */
export class SimilarityGrouper {
    constructor(private readonly config: SimilarityGrouperConfig = DEFAULT_GROUPER_CONFIG) {}

    group(notes: readonly Note[]): Map<CategoryType, NoteCluster[]> {
        const clusters = new Map<CategoryType, NoteCluster[]>();
        if (notes.length === 0) return clusters;

        // Fitted on the whole request, never reused across requests
        const vectorizer = new TfIdfVectorizer({
            minDf: this.config.minDf,
            maxDf: this.config.maxDf,
        }).fit(notes.map((note) => note.text));

        for (const [category, members] of this.byCategory(notes)) {
            if (members.length < 2) continue;

            const vectors = vectorizer.transform(members.map((note) => note.text));
            clusters.set(category, this.clusterGreedily(category, members, similarityMatrix(vectors)));
        }

        return clusters;
    }

    private clusterGreedily(
        category: CategoryType,
        members: readonly Note[],
        similarities: number[][],
    ): NoteCluster[] {
        const assigned = new Array<boolean>(members.length).fill(false);
        const result: NoteCluster[] = [];

        for (let anchor = 0; anchor < members.length; anchor++) {
            if (assigned[anchor]) continue;

            const notes: Note[] = [members[anchor]];
            assigned[anchor] = true;

            for (let other = 0; other < members.length; other++) {
                if (other === anchor || similarities[anchor][other] <= this.config.threshold) continue;
                notes.push(members[other]);
                assigned[other] = true;
            }

            result.push({ category, notes });
        }

        return result;
    }

    private byCategory(notes: readonly Note[]): Map<CategoryType, Note[]> {
        const groups = new Map<CategoryType, Note[]>();
        for (const note of notes) {
            const group = groups.get(note.category) ?? [];
            group.push(note);
            groups.set(note.category, group);
        }
        return groups;
    }
}
