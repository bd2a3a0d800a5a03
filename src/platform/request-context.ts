import type { Principal } from "../access/principal.js";

export interface RequestContext {
  requestId: string;
  correlationId: string;
  principal: Principal | null;
  /** Filled by the execution context accessor on first read after authentication. */
  resolvedUserId?: string;
}

export function createRequestContext(requestId: string, correlationId?: string): RequestContext {
  return {
    requestId,
    correlationId: correlationId ?? requestId,
    principal: null,
  };
}
