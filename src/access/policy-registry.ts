import type { PermissionRequirement } from "./permission-requirement.js";

import { ConfigurationError } from "../shared/errors.js";
import { permissionRequirement } from "./permission-requirement.js";

export class PolicyRegistry {
  private readonly policies = new Map<string, PermissionRequirement>();

  addPolicy(name: string, requiredPermission: string): PermissionRequirement {
    if (this.policies.has(name)) {
      throw new ConfigurationError(`Policy ${name} is already registered`);
    }
    const requirement = permissionRequirement(requiredPermission);
    this.policies.set(name, requirement);
    return requirement;
  }

  requirement(name: string): PermissionRequirement | undefined {
    return this.policies.get(name);
  }
}

export function endpointId(method: string, url: string): string {
  return `${method.toUpperCase()} ${url}`;
}

/**
 * Explicit mapping from `METHOD url` (the route pattern, not the concrete path) to
 * the requirement gating it. Endpoints absent from the table are anonymous.
 */
export class EndpointPolicyTable {
  private readonly bindings = new Map<string, { policy: string; requirement: PermissionRequirement }>();

  constructor(private readonly registry: PolicyRegistry) {}

  bind(method: string, url: string, policyName: string) {
    const requirement = this.registry.requirement(policyName);
    if (!requirement) {
      throw new ConfigurationError(`Endpoint ${endpointId(method, url)} refers to unknown policy ${policyName}`);
    }
    const id = endpointId(method, url);
    if (this.bindings.has(id)) {
      throw new ConfigurationError(`Endpoint ${id} is already bound to a policy`);
    }
    this.bindings.set(id, { policy: policyName, requirement });
  }

  requirementFor(method: string, url: string | undefined): PermissionRequirement | undefined {
    if (url === undefined) {
      return undefined;
    }
    return this.bindings.get(endpointId(method, url))?.requirement;
  }

  policyFor(method: string, url: string): string | undefined {
    return this.bindings.get(endpointId(method, url))?.policy;
  }
}
