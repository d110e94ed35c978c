import { pino } from "pino";
import type { Tier } from "../access/tier.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "tiered-exec-gateway"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export interface RequestLogContext {
  readonly requestId: string;
  readonly tier?: Tier;
}

/**
 * Returns a child logger with request context attached.
 */
export function getRequestLogger(context: RequestLogContext) {
  return logger.child({
    requestId: context.requestId,
    tier: context.tier
  });
}

/**
 * Short, non-reversible hint of a credential for log correlation.
 */
export function credentialHint(credential: string): string {
  return credential.length <= 8 ? '***' : `${credential.substring(0, 8)}...`;
}
