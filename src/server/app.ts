import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import type { Request, Response } from 'express';
import { getEnv } from './config/env.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createComplianceRoutes } from './routes/complianceRoutes.js';
import { ComplianceVerificationService } from './services/compliance/ComplianceVerificationService.js';
import { logger } from './utils/logger.js';

const defaultOrigins = ['http://localhost:5173', 'http://localhost:3000', 'http://127.0.0.1:5173'];

function createCorsOptions(): cors.CorsOptions {
    const env = getEnv();
    const allowedOrigins = env.ALLOWED_ORIGINS?.trim()
        ? env.ALLOWED_ORIGINS.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)
        : defaultOrigins;

    return {
        origin: (origin, callback) => {
            // Allow requests with no origin (curl, server-to-server)
            if (!origin || allowedOrigins.includes(origin)) {
                return callback(null, true);
            }
            if (env.NODE_ENV === 'development' && (origin.includes('localhost') || origin.includes('127.0.0.1'))) {
                return callback(null, true);
            }
            logger.warn({ origin, allowedOrigins }, 'CORS: Origin not allowed');
            callback(null, false);
        },
        optionsSuccessStatus: 200,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'X-Request-ID'],
    };
}

export interface AppOptions {
    service?: ComplianceVerificationService;
}

export function createApp(options: AppOptions = {}): express.Express {
    const app = express();
    const service = options.service ?? new ComplianceVerificationService();

    app.use(requestIdMiddleware); // Request ID and logging context - must be first
    app.use(helmet());
    app.use(cors(createCorsOptions()));
    // Base64 workbooks inflate bodies by a third
    app.use(express.json({ limit: '50mb' }));

    const healthHandler = (_req: Request, res: Response) => {
        res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
    };
    app.get('/health', healthHandler);
    app.head('/health', healthHandler);

    app.use('/api/compliance', createComplianceRoutes(service));

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}
