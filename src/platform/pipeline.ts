import type { FastifyInstance, FastifyRequest } from "fastify";

import type { EndpointPolicyTable } from "../access/policy-registry.js";
import type { TokenValidator } from "../web/plugins/auth-user.js";
import type { RequestContext } from "./request-context.js";

import { evaluatePermission } from "../access/permission-requirement.js";
import { ForbiddenError } from "../shared/errors.js";
import { authenticateRequest } from "../web/plugins/auth-user.js";
import { createRequestContext } from "./request-context.js";

export const CORRELATION_HEADER = "x-correlation-id";

declare module "fastify" {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export interface PipelineOptions {
  tokenValidator: TokenValidator;
  endpointPolicies: EndpointPolicyTable;
}

function readCorrelationId(request: FastifyRequest): string | undefined {
  const header = request.headers[CORRELATION_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

export function registerPipeline(app: FastifyInstance, options: PipelineOptions) {
  app.decorateRequest("requestContext", null as unknown as RequestContext);

  app.addHook("onRequest", async (request, reply) => {
    request.requestContext = createRequestContext(request.id, readCorrelationId(request));
    reply.header(CORRELATION_HEADER, request.requestContext.correlationId);
  });

  app.addHook("onRequest", async (request) => {
    const requirement = options.endpointPolicies.requirementFor(request.method, request.routeOptions.url);
    if (!requirement) {
      return;
    }

    request.requestContext.principal = await authenticateRequest(request, options.tokenValidator);

    const decision = evaluatePermission(requirement, request.requestContext.principal);
    if (!decision.succeeded) {
      request.log.info({ requiredPermission: requirement.requiredPermission }, "Permission denied");
      throw new ForbiddenError();
    }
  });
}
