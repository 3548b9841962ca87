/**
 * Bearer Token Verification
 *
 * Verifies the issuer's HS256 signature, issuer, audience and lifetime, then
 * hands the raw claims to identity resolution. Claim shape is not checked here.
 */

import { jwtVerify, JWTPayload } from 'jose';
import { logger } from '../logging/logger.js';

export interface BearerTokenSettings {
    readonly secret: string;
    readonly issuer: string;
    readonly audience: string;
    readonly clockToleranceSeconds?: number;
}

export type BearerVerificationResult =
    | { success: true; claims: JWTPayload }
    | { success: false; reason: 'Unauthenticated'; details: string };

export interface BearerTokenVerifier {
    verify(token: string): Promise<BearerVerificationResult>;
}

export function extractBearerToken(header: string | undefined): string | null {
    if (!header) return null;
    const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
    return match?.[1] ?? null;
}

export function createBearerTokenVerifier(settings: BearerTokenSettings): BearerTokenVerifier {
    const key = new TextEncoder().encode(settings.secret);

    return {
        async verify(token: string): Promise<BearerVerificationResult> {
            if (!token) {
                return { success: false, reason: 'Unauthenticated', details: 'Missing bearer token' };
            }

            try {
                const { payload } = await jwtVerify(token, key, {
                    issuer: settings.issuer,
                    audience: settings.audience,
                    clockTolerance: settings.clockToleranceSeconds ?? 30,
                    requiredClaims: ['sub', 'exp'],
                    algorithms: ['HS256'] // SECURITY: Prevent alg confusion
                });
                return { success: true, claims: payload };
            } catch (error: unknown) {
                const details = error instanceof Error ? error.message : String(error);
                logger.warn({ error: details }, 'Bearer token verification failed');
                return { success: false, reason: 'Unauthenticated', details };
            }
        }
    };
}
