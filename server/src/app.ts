import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import type { ConnectionHub } from './infra/hub/connection-hub.js';
import { healthHandler } from './controllers/health.controller.js';
import { createSessionsRouter } from './controllers/sessions.controller.js';
import { createHubRouter } from './controllers/hub.controller.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorMiddleware, notFoundHandler } from './middleware/error.middleware.js';

export interface AppDeps {
    hub: ConnectionHub;
    corsOrigins?: string[];
}

export function createApp({ hub, corsOrigins = ['*'] }: AppDeps): Express {
    const app = express();
    app.use(helmet());
    app.use(compression());
    app.use(cors({ origin: corsOrigins.includes('*') ? '*' : corsOrigins }));

    // Request context & logging (BEFORE body parsing so its errors carry a traceId)
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);
    app.use(express.json({ limit: '1mb' }));

    app.get('/api/health', healthHandler);
    app.use('/api/sessions', createSessionsRouter(hub));
    app.use('/api/hub', createHubRouter(hub));

    app.use(notFoundHandler);
    app.use(errorMiddleware);

    return app;
}
