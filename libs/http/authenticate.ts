import { Request, Response, NextFunction, RequestHandler } from 'express';
import { BearerTokenVerifier, extractBearerToken } from '../auth/bearerToken.js';
import { UNAUTHORIZED } from './rejection.js';

/**
 * Terminates the bearer token and leaves the verified claims on
 * `res.locals.claims`. Claims are shaped into an identity later, per dispatch.
 */
export function createAuthenticationMiddleware(verifier: BearerTokenVerifier): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const token = extractBearerToken(req.headers.authorization);
            if (!token) {
                res.status(UNAUTHORIZED.status).json(UNAUTHORIZED.body);
                return;
            }

            const result = await verifier.verify(token);
            if (!result.success) {
                res.status(UNAUTHORIZED.status).json(UNAUTHORIZED.body);
                return;
            }

            res.locals.claims = result.claims;
            next();
        } catch (error) {
            next(error);
        }
    };
}
