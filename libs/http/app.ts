import express, { Express } from 'express';
import type { BearerTokenVerifier } from '../auth/bearerToken.js';
import type { SchoolRequest } from '../catalog/requests.js';
import type { RequestDispatcher } from '../dispatch/dispatcher.js';
import { createAuthenticationMiddleware } from './authenticate.js';
import { createDispatchRouter } from './dispatchRoute.js';

export interface HttpAppDeps {
    readonly dispatcher: RequestDispatcher<SchoolRequest>;
    readonly verifier: BearerTokenVerifier;
}

export function createHttpApp(deps: HttpAppDeps): Express {
    const app = express();
    app.disable('x-powered-by');
    app.use(express.json({ limit: '64kb' }));

    app.get('/health', (_req, res) => {
        res.status(200).json({ status: 'ok' });
    });

    app.use(
        '/api/v1/requests',
        createAuthenticationMiddleware(deps.verifier),
        createDispatchRouter(deps.dispatcher)
    );

    return app;
}
