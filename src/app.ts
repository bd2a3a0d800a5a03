import fastify, { type FastifyBaseLogger } from "fastify";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";

import type { RawConfig, EnvConfig } from "./config/index.js";
import type { ModuleDescriptor, ModuleHandle } from "./composition/module-descriptor.js";
import type { Logger } from "./platform/logger.js";
import type { TokenValidator } from "./web/plugins/auth-user.js";

import { EndpointPolicyTable, PolicyRegistry } from "./access/policy-registry.js";
import { closeModules, composeAndStart } from "./composition/compose.js";
import { declaredModules } from "./composition/modules.js";
import { loadRawConfig } from "./config/index.js";
import { createLogger } from "./platform/logger.js";
import { registerPipeline } from "./platform/pipeline.js";
import { NotFoundError } from "./shared/errors.js";
import { createTokenValidator } from "./web/plugins/auth-user.js";
import { createErrorMapper, PROBLEM_CONTENT_TYPE } from "./web/problem-details.js";
import { registerModuleEndpoints, registerModulePolicies, registerRoutes } from "./web/routes/index.js";

declare module "fastify" {
  interface FastifyInstance {
    config: EnvConfig;
    modules: readonly ModuleHandle[];
  }
}

export interface BuildAppOptions {
  logger?: Logger;
  rawConfig?: RawConfig;
  modules?: readonly ModuleDescriptor[];
  tokenValidator?: TokenValidator;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const logger = options.logger ?? createLogger({ level: process.env["LOG_LEVEL"] });
  const composition = await composeAndStart(
    options.modules ?? declaredModules(),
    options.rawConfig ?? loadRawConfig(),
    logger,
  );
  if (!composition.succeeded) {
    throw composition.error;
  }

  const { config, modules } = composition;
  const apiLogger = logger.child({ module: "API" });
  const loggerInstance: FastifyBaseLogger = apiLogger;
  const app = fastify({ loggerInstance });
  try {
    app.decorate("config", config);
    app.decorate("modules", modules);

    await app.register(swagger, {
      openapi: {
        info: {
          title: "Meetings API",
          version: "0.1.0",
        },
        components: {
          securitySchemes: {
            bearerAuth: { type: "http", scheme: "bearer", bearerFormat: "JWT" },
          },
        },
      },
    });

    await app.register(swaggerUi, {
      routePrefix: "/docs",
    });

    const errorMapper = createErrorMapper(apiLogger);
    app.setErrorHandler((error, request, reply) => {
      const problem = errorMapper.toProblem(error, request.url);
      return reply.status(problem.status).type(PROBLEM_CONTENT_TYPE).send(problem);
    });
    app.setNotFoundHandler((request, reply) => {
      const problem = errorMapper.toProblem(new NotFoundError(`No route for ${request.method} ${request.url}`), request.url);
      return reply.status(problem.status).type(PROBLEM_CONTENT_TYPE).send(problem);
    });

    const policies = new PolicyRegistry();
    const endpointPolicies = new EndpointPolicyTable(policies);
    registerModulePolicies(policies, modules);

    registerPipeline(app, {
      tokenValidator: options.tokenValidator ?? createTokenValidator(config),
      endpointPolicies,
    });
    await registerRoutes(app);
    registerModuleEndpoints(app, modules, endpointPolicies);

    app.addHook("onClose", async () => {
      await closeModules(modules, logger);
    });

    return app;
  } catch (error) {
    await app.close().catch((closeError: unknown) => {
      logger.error({ err: closeError }, "Failed to close the API host after a start-up error");
    });
    await closeModules(modules, logger);
    throw error;
  }
}
