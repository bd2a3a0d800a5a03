import type { FastifyInstance } from "fastify";

import type { EndpointPolicyTable, PolicyRegistry } from "../../access/policy-registry.js";
import type { ModuleHandle } from "../../composition/module-descriptor.js";

import { registerHealthRoutes } from "./health.js";

export const API_PREFIX = "/api/v1";

function toStringRecord(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (typeof value !== "object" || value === null) {
    return result;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      result[key] = entry;
    }
  }
  return result;
}

export function registerModulePolicies(registry: PolicyRegistry, modules: readonly ModuleHandle[]) {
  for (const module of modules) {
    for (const [name, permission] of Object.entries(module.policies)) {
      registry.addPolicy(name, permission);
    }
  }
}

/**
 * Mounts every module endpoint under the API prefix and binds it to its policy, so the
 * pipeline can authorize the request before the module sees it.
 */
export function registerModuleEndpoints(
  app: FastifyInstance,
  modules: readonly ModuleHandle[],
  endpointPolicies: EndpointPolicyTable,
) {
  for (const module of modules) {
    for (const endpoint of module.endpoints) {
      const url = `${API_PREFIX}${endpoint.url}`;
      endpointPolicies.bind(endpoint.method, url, endpoint.policy);

      app.route({
        method: endpoint.method,
        url,
        exposeHeadRoute: false,
        schema: {
          tags: [module.name],
          ...(endpoint.summary ? { summary: endpoint.summary } : {}),
          security: [{ bearerAuth: [] }],
        },
        handler: async (request, reply) => {
          const result = await endpoint.handle({
            params: toStringRecord(request.params),
            query: toStringRecord(request.query),
            body: request.body,
            context: request.requestContext,
          });
          reply.code(endpoint.successStatus ?? 200);
          return result === undefined ? reply.send() : reply.send(result);
        },
      });
    }
  }
}

export async function registerRoutes(app: FastifyInstance) {
  await app.register(registerHealthRoutes, { prefix: API_PREFIX });
}
