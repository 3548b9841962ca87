/**
 * Raised when the surrounding request is cancelled or times out while an
 * authorization is in flight. The partial decision is discarded.
 */
export class AuthorizationCancelledError extends Error {
    public override cause?: unknown;

    constructor(public readonly requestType: string, cause?: unknown) {
        super(`Authorization cancelled for ${requestType}`);
        this.name = 'AuthorizationCancelledError';
        this.cause = cause;
    }
}
