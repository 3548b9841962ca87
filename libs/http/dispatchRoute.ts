import express, { Request, Response, Router } from 'express';
import { REQUEST_SCHEMAS, SchoolRequest, isSchoolRequestType } from '../catalog/requests.js';
import type { RequestDispatcher } from '../dispatch/dispatcher.js';
import { validate } from '../validation/zod-middleware.js';
import { errorToHttpRejection, NOT_FOUND, toHttpRejection } from './rejection.js';

function headerRequestId(req: Request): string | undefined {
    const header = req.headers['x-request-id'];
    return typeof header === 'string' && header.trim() ? header.trim() : undefined;
}

/**
 * POST /:requestType, body is the request payload.
 * Unknown request types answer exactly like a missing resource.
 */
export function createDispatchRouter(dispatcher: RequestDispatcher<SchoolRequest>): Router {
    const router = express.Router();

    router.post('/:requestType', async (req: Request, res: Response): Promise<void> => {
        const controller = new AbortController();
        const onClose = () => {
            if (!res.writableEnded) {
                controller.abort(new Error('Client disconnected'));
            }
        };
        res.on('close', onClose);

        try {
            const requestType = req.params.requestType ?? '';
            if (!isSchoolRequestType(requestType)) {
                res.status(NOT_FOUND.status).json(NOT_FOUND.body);
                return;
            }

            const body: unknown = req.body ?? {};
            const request = validate<SchoolRequest>(REQUEST_SCHEMAS[requestType], body, `Http:${requestType}`);
            const claims: unknown = res.locals.claims;

            const result = await dispatcher.dispatch(request, claims, {
                requestId: headerRequestId(req),
                signal: controller.signal
            });

            res.setHeader('x-request-id', result.requestId);
            if (!result.ok) {
                const rejection = toHttpRejection(result.failure);
                res.status(rejection.status).json(rejection.body);
                return;
            }
            res.status(200).json({ data: result.value ?? null });
        } catch (error) {
            const rejection = errorToHttpRejection(error);
            res.status(rejection.status).json(rejection.body);
        } finally {
            res.off('close', onClose);
        }
    });

    return router;
}
