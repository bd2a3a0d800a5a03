import type { EnvConfig, RawConfig } from "../config/index.js";
import type { Logger } from "../platform/logger.js";
import type { ModuleDescriptor, ModuleHandle, SharedInfrastructure } from "./module-descriptor.js";

import { ModuleInitializationError } from "../shared/errors.js";
import { sharedInfrastructureFromRaw } from "./shared-infrastructure.js";

export type CompositionResult =
  | {
      succeeded: true;
      config: EnvConfig;
      infrastructure: SharedInfrastructure;
      modules: readonly ModuleHandle[];
    }
  | {
      succeeded: false;
      stage: "infrastructure" | "modules";
      failedModule: string | null;
      initialized: readonly string[];
      error: Error;
    };

export type ModuleCompositionResult =
  | { succeeded: true; modules: readonly ModuleHandle[] }
  | { succeeded: false; failedModule: string; initialized: readonly string[]; error: ModuleInitializationError };

/**
 * Initializes each module once, in declared order, stopping at the first failure.
 * Handles of modules initialized before the failure are closed again.
 */
export async function composeModules(
  descriptors: readonly ModuleDescriptor[],
  infrastructure: SharedInfrastructure,
): Promise<ModuleCompositionResult> {
  const logger = infrastructure.logger;
  const handles: ModuleHandle[] = [];

  for (const descriptor of descriptors) {
    try {
      const handle = await descriptor.initialize(infrastructure);
      handles.push(handle);
      logger.info({ module: descriptor.name }, "Module initialized");
    } catch (cause) {
      const error = new ModuleInitializationError(descriptor.name, cause);
      logger.fatal({ module: descriptor.name, err: cause }, error.message);
      await closeModules(handles, logger);
      return {
        succeeded: false,
        failedModule: descriptor.name,
        initialized: handles.map((handle) => handle.name),
        error,
      };
    }
  }

  return { succeeded: true, modules: Object.freeze(handles) };
}

export async function closeModules(handles: readonly ModuleHandle[], logger: Logger) {
  for (const handle of [...handles].reverse()) {
    if (!handle.close) {
      continue;
    }
    try {
      await handle.close();
    } catch (error) {
      logger.error({ module: handle.name, err: error }, "Module failed to close");
    }
  }
}

/**
 * Builds the shared infrastructure from raw configuration and initializes every module.
 * Meant to run once per process, before the host accepts connections; the caller
 * decides how to abort on failure.
 */
export async function composeAndStart(
  descriptors: readonly ModuleDescriptor[],
  raw: RawConfig,
  logger: Logger,
): Promise<CompositionResult> {
  let built: ReturnType<typeof sharedInfrastructureFromRaw>;
  try {
    built = sharedInfrastructureFromRaw(raw, logger);
  } catch (cause) {
    const error = cause instanceof Error ? cause : new Error(String(cause));
    logger.fatal({ err: error }, "Shared infrastructure could not be built");
    return { succeeded: false, stage: "infrastructure", failedModule: null, initialized: [], error };
  }

  const composed = await composeModules(descriptors, built.infrastructure);
  if (!composed.succeeded) {
    return {
      succeeded: false,
      stage: "modules",
      failedModule: composed.failedModule,
      initialized: composed.initialized,
      error: composed.error,
    };
  }

  logger.info({ modules: composed.modules.map((module) => module.name) }, "Modules composed");
  return {
    succeeded: true,
    config: built.config,
    infrastructure: built.infrastructure,
    modules: composed.modules,
  };
}
