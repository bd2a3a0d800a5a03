import { buildApp } from "./app.js";
import { loadRawConfig, parseLogLevel } from "./config/index.js";
import { createLogger, type Logger } from "./platform/logger.js";

async function start(logger: Logger, rawConfig: Record<string, unknown>) {
  const app = await buildApp({ logger, rawConfig });
  const { PORT: port, HOST: host } = app.config;

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port, host });
}

async function main() {
  // replaced once LOG_LEVEL is known
  let logger = createLogger();
  try {
    const rawConfig = loadRawConfig();
    logger = createLogger({ level: parseLogLevel(rawConfig) });
    await start(logger, rawConfig);
  } catch (error) {
    logger.fatal({ err: error }, "Application start-up failed");
    process.exit(1);
  }
}

void main();
