import type { JWTPayload } from "jose";

export const SUBJECT_CLAIM_TYPE = "sub";
export const PERMISSION_CLAIM_TYPE = "permission";

export interface Claim {
  readonly type: string;
  readonly value: string;
}

export interface Principal {
  readonly claims: readonly Claim[];
}

export function createPrincipal(claims: readonly Claim[]): Principal {
  return Object.freeze({
    claims: Object.freeze(claims.map((claim) => Object.freeze({ type: claim.type, value: claim.value }))),
  });
}

/**
 * Flattens a verified JWT payload into claims. Array claims yield one claim per
 * string element; nested objects are not representable and are skipped.
 */
export function principalFromPayload(payload: JWTPayload): Principal {
  const claims: Claim[] = [];
  for (const [type, value] of Object.entries(payload)) {
    if (typeof value === "string") {
      claims.push({ type, value });
    } else if (typeof value === "number" || typeof value === "boolean") {
      claims.push({ type, value: String(value) });
    } else if (Array.isArray(value)) {
      for (const item of value) {
        if (typeof item === "string") {
          claims.push({ type, value: item });
        }
      }
    }
  }
  return createPrincipal(claims);
}

export function findClaim(principal: Principal, type: string): string | null {
  return principal.claims.find((claim) => claim.type === type)?.value ?? null;
}

export function claimValues(principal: Principal, type: string): string[] {
  return principal.claims.filter((claim) => claim.type === type).map((claim) => claim.value);
}
