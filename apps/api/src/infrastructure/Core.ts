import { hintConfig, validateHintConfig, type HintConfig, type ValidHintConfig } from '../application/config/hintConfig';
import { type SConstructor, UseCaseProvider } from '../application/useCases/UseCaseProvider';
import type { HintRewriter } from '../application/providers/HintRewriter';
import { LLMHintRewriter } from '../application/services/LLMHintRewriter';
import { TemplateHintRewriter } from '../application/services/TemplateHintRewriter';
import { GenerateHint } from '../application/useCases/GenerateHint';
import { GetTimePatterns } from '../application/useCases/GetTimePatterns';
import { TimePatternAnalyzer } from '../domain/services/TimePatternAnalyzer';
import { SimilarityGrouper } from '../domain/services/SimilarityGrouper';
import { RecommendationScorer } from '../domain/services/RecommendationScorer';
import { HintSynthesizer } from '../domain/services/HintSynthesizer';
import { OllamaLLMProvider } from './providores/OllamaLLMProvider';

export class Core {
    public useCases = new UseCaseProvider();
    public readonly rewriter: HintRewriter;
    private analyzer: TimePatternAnalyzer;
    private config: ValidHintConfig;

    constructor(config: HintConfig = hintConfig) {
        validateHintConfig(config);
        this.config = config;
        this.analyzer = new TimePatternAnalyzer(config.timeAveraging);
        this.rewriter = this.createRewriter();
        this.initializeServices();
    }

    private createRewriter(): HintRewriter {
        if (this.config.rewriter === 'ollama') {
            const llmProvider = new OllamaLLMProvider({
                model: this.config.ollamaModel,
                baseUrl: this.config.ollamaBaseUrl,
            });
            return new LLMHintRewriter(llmProvider, { timeoutMs: this.config.rewriterTimeoutMs });
        }
        return new TemplateHintRewriter();
    }

    private initializeServices() {
        this.useCases.register(GenerateHint, () => new GenerateHint(
            new SimilarityGrouper({
                threshold: this.config.similarityThreshold,
                minDf: this.config.tfidfMinDf,
                maxDf: this.config.tfidfMaxDf,
            }),
            new RecommendationScorer(this.analyzer, {
                decayWindowHours: this.config.decayWindowHours,
                countSaturation: this.config.countSaturation,
            }),
            new HintSynthesizer(this.rewriter),
        ));
        this.useCases.register(GetTimePatterns, () => new GetTimePatterns(this.analyzer));
    }

    public getUseCase<T>(serviceType: SConstructor<T>): T {
        return this.useCases.get(serviceType);
    }
}
