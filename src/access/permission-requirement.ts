import type { Principal } from "./principal.js";

import { PERMISSION_CLAIM_TYPE } from "./principal.js";

export interface PermissionRequirement {
  readonly requiredPermission: string;
}

export interface AuthorizationDecision {
  readonly succeeded: boolean;
}

const SUCCEEDED: AuthorizationDecision = Object.freeze({ succeeded: true });
const DENIED: AuthorizationDecision = Object.freeze({ succeeded: false });

export function permissionRequirement(requiredPermission: string): PermissionRequirement {
  return Object.freeze({ requiredPermission });
}

/**
 * Succeeds only when the principal holds a `permission` claim whose value equals the
 * required permission exactly. A blank requirement or a missing principal denies.
 */
export function evaluatePermission(
  requirement: PermissionRequirement,
  principal: Principal | null,
): AuthorizationDecision {
  const required = requirement.requiredPermission;
  if (!principal || typeof required !== "string" || required.trim().length === 0) {
    return DENIED;
  }

  const granted = principal.claims.some(
    (claim) => claim.type === PERMISSION_CLAIM_TYPE && claim.value === required,
  );
  return granted ? SUCCEEDED : DENIED;
}
