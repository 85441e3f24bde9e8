/**
 * Cosine similarity between two vectors of the same length.
 *
 * A zero vector has similarity 0 with everything, itself included: a note
 * whose terms were all pruned from the vocabulary matches nothing.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
    }

    let dot = 0;
    let magA = 0;
    let magB = 0;

    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        magA += a[i] * a[i];
        magB += b[i] * b[i];
    }

    const magnitude = Math.sqrt(magA) * Math.sqrt(magB);
    return magnitude === 0 ? 0 : dot / magnitude;
}

/** Full pairwise similarity matrix of a list of vectors. */
export function similarityMatrix(vectors: readonly (readonly number[])[]): number[][] {
    return vectors.map((a) => vectors.map((b) => cosineSimilarity(a, b)));
}
