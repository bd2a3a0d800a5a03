import type { FastifyRequest } from "fastify";

import { createRemoteJWKSet, jwtVerify } from "jose";

import type { EnvConfig } from "../../config/index.js";
import type { Principal } from "../../access/principal.js";

import { principalFromPayload } from "../../access/principal.js";
import { UnauthorizedError } from "../../shared/errors.js";

export interface TokenValidator {
  validate(token: string): Promise<Principal>;
}

type TokenValidatorConfig = Pick<
  EnvConfig,
  "AUTH_AUTHORITY" | "AUTH_AUDIENCE" | "AUTH_JWKS_URI" | "AUTH_SIGNING_SECRET"
>;

export function defaultJwksUri(authority: string): URL {
  const base = authority.endsWith("/") ? authority : `${authority}/`;
  return new URL(".well-known/openid-configuration/jwks", base);
}

export function createTokenValidator(config: TokenValidatorConfig): TokenValidator {
  const verifyOptions = {
    issuer: config.AUTH_AUTHORITY,
    audience: config.AUTH_AUDIENCE,
  };

  if (config.AUTH_SIGNING_SECRET) {
    const secret = new TextEncoder().encode(config.AUTH_SIGNING_SECRET);
    return {
      async validate(token) {
        const { payload } = await jwtVerify(token, secret, { ...verifyOptions, algorithms: ["HS256"] });
        return principalFromPayload(payload);
      },
    };
  }

  const jwks = createRemoteJWKSet(
    config.AUTH_JWKS_URI ? new URL(config.AUTH_JWKS_URI) : defaultJwksUri(config.AUTH_AUTHORITY),
  );
  return {
    async validate(token) {
      const { payload } = await jwtVerify(token, jwks, verifyOptions);
      return principalFromPayload(payload);
    },
  };
}

export function extractBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header?.startsWith("Bearer ")) {
    return null;
  }
  const token = header.slice("Bearer ".length).trim();
  return token.length > 0 ? token : null;
}

export async function authenticateRequest(request: FastifyRequest, validator: TokenValidator): Promise<Principal> {
  const token = extractBearerToken(request);
  if (!token) {
    throw new UnauthorizedError();
  }

  try {
    return await validator.validate(token);
  } catch (error) {
    request.log.debug({ err: error }, "Bearer token rejected");
    throw new UnauthorizedError();
  }
}
