import type { RequestContext } from "./request-context.js";

import { findClaim, SUBJECT_CLAIM_TYPE } from "../access/principal.js";

export const NO_USER = null;

/**
 * Read-only handle modules use to learn who is calling. The request context is passed
 * in explicitly; calls made without one (startup, background work) see `NO_USER`.
 */
export interface ExecutionContextAccessor {
  currentUserId(context?: RequestContext | null): string | typeof NO_USER;
  correlationId(context?: RequestContext | null): string | null;
  isAvailable(context?: RequestContext | null): boolean;
}

export function createExecutionContextAccessor(): ExecutionContextAccessor {
  return Object.freeze({
    currentUserId(context?: RequestContext | null) {
      if (!context) {
        return NO_USER;
      }
      if (context.resolvedUserId !== undefined) {
        return context.resolvedUserId;
      }
      if (!context.principal) {
        return NO_USER;
      }

      const subject = findClaim(context.principal, SUBJECT_CLAIM_TYPE);
      if (subject === null) {
        return NO_USER;
      }
      context.resolvedUserId = subject;
      return subject;
    },

    correlationId(context?: RequestContext | null) {
      return context?.correlationId ?? null;
    },

    isAvailable(context?: RequestContext | null) {
      return Boolean(context?.principal);
    },
  });
}
