import { logger } from '../logging/logger.js';
import crypto from 'crypto';

export type ErrorCategory = 'SEC' | 'OPS' | 'CONFIG';

/**
 * Internal error with a public message and an incident id for log correlation.
 * The internal details are logged once, at construction.
 */
export class AppError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: ErrorCategory = 'OPS',
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage);
        this.name = 'AppError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Wraps any error into an AppError that hides raw DB/stack details.
     */
    sanitize: (err: unknown, contextLabel: string, category: ErrorCategory = 'OPS'): AppError => {
        if (err instanceof AppError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let sqlState: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
            const code: unknown = Reflect.get(err, 'code');
            sqlState = typeof code === 'string' ? code : undefined;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new AppError(
            `An internal system error occurred (${contextLabel})`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            category,
            { cause: err, contextLabel, sqlState }
        );
    }
};
