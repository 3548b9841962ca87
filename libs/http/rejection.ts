/**
 * Transport mapping for dispatch failures.
 *
 * The body never says which check failed. Access denials share one 403 body,
 * tenant-boundary denials share the 404 body of a missing resource, and
 * wiring defects become a generic 500 carrying only an incident id.
 */

import { classifyDenial } from '../authz/decision.js';
import type { DispatchFailure } from '../dispatch/dispatcher.js';
import { AuthorizationCancelledError } from '../errors/authorizationErrors.js';
import { AppError, ErrorSanitizer } from '../errors/sanitizer.js';
import { ValidationError, ValidationIssue } from '../validation/zod-middleware.js';

export interface HttpRejection {
    status: number;
    body: {
        error: string;
        incidentId?: string;
        issues?: ValidationIssue[];
    };
}

export const UNAUTHORIZED: HttpRejection = { status: 401, body: { error: 'Unauthorized' } };
export const FORBIDDEN: HttpRejection = { status: 403, body: { error: 'Forbidden' } };
export const NOT_FOUND: HttpRejection = { status: 404, body: { error: 'Not Found' } };

export function toHttpRejection(failure: DispatchFailure): HttpRejection {
    if (failure.reason === 'Unauthenticated') {
        return UNAUTHORIZED;
    }

    switch (classifyDenial(failure.reason)) {
        case 'access':
            return FORBIDDEN;
        case 'not_found':
            return NOT_FOUND;
        case 'configuration': {
            const incident = new AppError(
                'Authorization is misconfigured for this request type',
                { failure },
                'CONFIG',
                { contextLabel: 'Authorization:WiringDefect' }
            );
            return { status: 500, body: { error: 'Internal Server Error', incidentId: incident.incidentId } };
        }
    }
}

export function errorToHttpRejection(error: unknown): HttpRejection {
    if (error instanceof ValidationError) {
        return { status: 400, body: { error: 'Bad Request', issues: error.issues } };
    }
    if (error instanceof AuthorizationCancelledError) {
        return { status: 503, body: { error: 'Service Unavailable' } };
    }
    const sanitized = ErrorSanitizer.sanitize(error, 'Http:UnhandledError');
    return { status: 500, body: { error: 'Internal Server Error', incidentId: sanitized.incidentId } };
}
