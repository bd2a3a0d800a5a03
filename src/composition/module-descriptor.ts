import type { EmailSender, EmailsConfiguration } from "../emails/email-sender.js";
import type { ExecutionContextAccessor } from "../platform/execution-context.js";
import type { Logger } from "../platform/logger.js";
import type { RequestContext } from "../platform/request-context.js";

export interface SharedInfrastructure {
  readonly connectionString: string;
  readonly executionContextAccessor: ExecutionContextAccessor;
  readonly logger: Logger;
  readonly emails: EmailsConfiguration;
  readonly emailSender: EmailSender;
  readonly security: {
    readonly textEncryptionKey?: string;
  };
}

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface EndpointRequest {
  params: Record<string, string>;
  query: Record<string, string>;
  body: unknown;
  context: RequestContext;
}

export interface ModuleEndpoint {
  method: HttpMethod;
  /** Path relative to the API prefix, in fastify route syntax. */
  url: string;
  policy: string;
  summary?: string;
  successStatus?: number;
  handle(request: EndpointRequest): Promise<unknown>;
}

export interface ModuleHandle {
  readonly name: string;
  /** Policy name -> required permission. */
  readonly policies: Readonly<Record<string, string>>;
  readonly endpoints: readonly ModuleEndpoint[];
  close?(): Promise<void>;
}

export interface ModuleDescriptor {
  readonly name: string;
  initialize(infrastructure: SharedInfrastructure): ModuleHandle | Promise<ModuleHandle>;
}
