export interface TfIdfOptions {
    /** Terms found in fewer than minDf × N documents are dropped. */
    minDf: number;
    /** Terms found in more than maxDf × N documents are dropped. */
    maxDf: number;
}

export const DEFAULT_TFIDF_OPTIONS: TfIdfOptions = { minDf: 0.1, maxDf: 0.9 };

const TOKEN_REGEX = /[\p{L}\p{N}_]{2,}/gu;

/**
 * TF–IDF term weighting over a small corpus.
 *
 * Raw term counts, smoothed idf = ln((1 + N) / (1 + df)) + 1, and rows
 * scaled to unit length. An instance is fitted once and then only
 * transforms; build a new one for every corpus.
 */
export class TfIdfVectorizer {
    private vocabulary = new Map<string, number>();
    private idf: number[] = [];
    private fitted = false;

    constructor(private readonly options: TfIdfOptions = DEFAULT_TFIDF_OPTIONS) {}

    static tokenize(text: string): string[] {
        return text.toLowerCase().match(TOKEN_REGEX) ?? [];
    }

    get terms(): string[] {
        return [...this.vocabulary.keys()];
    }

    fit(documents: readonly string[]): this {
        if (this.fitted) {
            throw new Error('TfIdfVectorizer is already fitted; create a new instance per corpus');
        }

        const total = documents.length;
        const documentFrequency = new Map<string, number>();

        for (const document of documents) {
            for (const term of new Set(TfIdfVectorizer.tokenize(document))) {
                documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
            }
        }

        const minCount = this.options.minDf * total;
        const maxCount = this.options.maxDf * total;

        const kept = [...documentFrequency.entries()]
            .filter(([, df]) => df >= minCount && df <= maxCount)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

        kept.forEach(([term, df], index) => {
            this.vocabulary.set(term, index);
            this.idf[index] = Math.log((1 + total) / (1 + df)) + 1;
        });

        this.fitted = true;
        return this;
    }

    transform(documents: readonly string[]): number[][] {
        if (!this.fitted) {
            throw new Error('TfIdfVectorizer must be fitted before transform');
        }

        return documents.map((document) => {
            const vector = new Array<number>(this.vocabulary.size).fill(0);

            for (const term of TfIdfVectorizer.tokenize(document)) {
                const index = this.vocabulary.get(term);
                if (index !== undefined) vector[index] += 1;
            }

            let norm = 0;
            for (let i = 0; i < vector.length; i++) {
                vector[i] *= this.idf[i];
                norm += vector[i] * vector[i];
            }

            norm = Math.sqrt(norm);
            return norm === 0 ? vector : vector.map((value) => value / norm);
        });
    }
}
