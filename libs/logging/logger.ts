import pino from "pino";
import { IdentityContext } from "../context/identity.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "school-authz"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export type Logger = typeof logger;

/**
 * Returns a child logger with identity context attached.
 */
export function getContextLogger(identity: IdentityContext, requestId: string): Logger {
  return logger.child({
    requestId,
    userId: identity.userId,
    tenantId: identity.tenantId
  });
}
