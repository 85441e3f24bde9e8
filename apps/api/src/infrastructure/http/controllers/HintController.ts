import { Request, Response, NextFunction, Router } from 'express';
import {
    textBasedHintSchema,
    timePatternsSchema,
    type TextBasedHintRequest,
    type TextBasedHintResponse,
    type TimePatternsRequest,
    type TimePatternsResponse,
} from '@notehint/types';
import type { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';
import { hintRateLimiter } from '../middleware/rateLimiter';
import type { GenerateHint } from '../../../application/useCases/GenerateHint';
import type { GetTimePatterns } from '../../../application/useCases/GetTimePatterns';
import type { HintRewriterKind } from '../../../application/providers/HintRewriter';
import { NoteMapper } from '../../../application/mappers/NoteMapper';
import { formatTimeOfDay } from '../../../domain/entities/TimeOfDay';

export class HintController implements Controller {
    public path = '/entities';
    public router = Router();

    constructor(
        private generateHint: GenerateHint,
        private getTimePatterns: GetTimePatterns,
        private rewriterKind: HintRewriterKind,
    ) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(
            `${this.path}/get_text_based_hint`,
            hintRateLimiter,
            validateRequest(textBasedHintSchema),
            this.getTextBasedHint.bind(this),
        );
        this.router.post(
            `${this.path}/get_time_patterns`,
            hintRateLimiter,
            validateRequest(timePatternsSchema),
            this.getPatterns.bind(this),
        );
        this.router.get('/health', this.getHealth.bind(this));
    }

    async getTextBasedHint(req: Request, res: Response, next: NextFunction) {
        try {
            const { context, current_time }: TextBasedHintRequest = req.body;
            const currentTime = NoteMapper.requireTimestamp(current_time, 'current_time');
            const notes = context.map((dto) => NoteMapper.toDomain(dto));

            const outcome = await this.generateHint.execute(notes, currentTime);

            if (outcome.status === 'noRecommendation') {
                return res.status(404).json({
                    status: 'error',
                    message: 'No recommendation available',
                    reason: outcome.reason,
                });
            }

            const body: TextBasedHintResponse = {
                note: NoteMapper.toDto(outcome.result.note),
                hint_text: outcome.result.hintText,
            };
            return res.status(200).json(body);
        } catch (error) {
            next(error);
        }
    }

    async getPatterns(req: Request, res: Response, next: NextFunction) {
        try {
            const { context }: TimePatternsRequest = req.body;
            const patterns = this.getTimePatterns.execute(context.map((dto) => NoteMapper.toDomain(dto)));

            const body: TimePatternsResponse = {
                patterns: patterns.map((p) => ({
                    categoryType: p.category,
                    count: p.count,
                    avgTime: formatTimeOfDay(p.avgTime),
                })),
            };
            return res.status(200).json(body);
        } catch (error) {
            next(error);
        }
    }

    async getHealth(_req: Request, res: Response) {
        return res.status(200).json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            rewriter: this.rewriterKind,
        });
    }
}
