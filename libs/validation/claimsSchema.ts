import { z } from 'zod';

const StringList = z.union([
    z.array(z.string()),
    z.string().transform((value) => [value])
]);

/**
 * Verified bearer-token claims as handed over by the token verifier.
 * Unknown claims pass through untouched; only the ones below are read.
 */
export const VerifiedClaimsSchema = z.object({
    sub: z.string().trim().min(1),
    tenant_id: z.string().trim().min(1),
    roles: StringList.default([]),
    permissions: StringList.optional(),
});
