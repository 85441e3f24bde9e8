import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { errorHandler } from './infrastructure/http/middleware/errorHandler';
import { Core } from './infrastructure/Core';
import { HintController } from './infrastructure/http/controllers/HintController';
import { GenerateHint } from './application/useCases/GenerateHint';
import { GetTimePatterns } from './application/useCases/GetTimePatterns';
import logger from './infrastructure/logger';

export class App {
    public app: express.Application;

    constructor(private core: Core = new Core()) {
        this.app = express();

        this.initializeMiddlewares();
        this.initializeControllers();
        this.initializeErrorHandling();
    }

    private initializeMiddlewares() {
        this.app.use(helmet());
        this.app.use(express.json({ limit: '1mb' }));

        const limiter = rateLimit({
            windowMs: 15 * 60 * 1000, // 15 minutes
            limit: 100, // Limit each IP to 100 requests per windowMs
            standardHeaders: true,
            legacyHeaders: false,
        });
        this.app.use(limiter);

        this.app.use(cors({
            origin: process.env.CORS_ORIGIN || '*',
            methods: ['GET', 'POST', 'OPTIONS'],
        }));
    }

    private initializeControllers() {
        const hintController = new HintController(
            this.core.getUseCase(GenerateHint),
            this.core.getUseCase(GetTimePatterns),
            this.core.rewriter.kind,
        );
        this.app.use('/', hintController.router);
    }

    private initializeErrorHandling() {
        this.app.use(errorHandler);
    }

    public listen() {
        const port = process.env.PORT || 6060;
        this.app.listen(port, () => {
            logger.info(`Server running on http://localhost:${port}`, { rewriter: this.core.rewriter.kind });
        });
    }
}
