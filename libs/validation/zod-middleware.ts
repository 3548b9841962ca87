import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    path: string;
    message: string;
}

export class ValidationError extends Error {
    constructor(public readonly context: string, public readonly issues: ValidationIssue[]) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationError';
    }
}

/**
 * Fail-closed ingress validation. Throws ValidationError on failure.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Payload itself is not logged; it may carry student data.
        logger.warn({ context, errors: issues }, "Input Validation Failure");

        throw new ValidationError(context, issues);
    }

    return result.data;
}
