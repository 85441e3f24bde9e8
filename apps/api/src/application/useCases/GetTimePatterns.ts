import type { Note } from '../../domain/entities/Note';
import type { CategoryPattern } from '../../domain/entities/TimeSignature';
import type { TimePatternAnalyzer } from '../../domain/services/TimePatternAnalyzer';

export class GetTimePatterns {
    constructor(private analyzer: TimePatternAnalyzer) {}

    execute(notes: readonly Note[]): CategoryPattern[] {
        return [...this.analyzer.categoryPatterns(notes).values()];
    }
}
