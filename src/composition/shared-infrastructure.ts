import type { EnvConfig, RawConfig } from "../config/index.js";
import type { Logger } from "../platform/logger.js";
import type { SharedInfrastructure } from "./module-descriptor.js";

import { parseConfig } from "../config/index.js";
import { LoggingEmailSender } from "../emails/email-sender.js";
import { createExecutionContextAccessor } from "../platform/execution-context.js";

export function buildSharedInfrastructure(config: EnvConfig, logger: Logger): SharedInfrastructure {
  const emails = Object.freeze({ fromEmail: config.EMAILS_FROM_EMAIL });

  return Object.freeze({
    connectionString: config.MEETINGS_CONNECTION_STRING,
    executionContextAccessor: createExecutionContextAccessor(),
    logger,
    emails,
    emailSender: new LoggingEmailSender(emails, logger.child({ module: "Emails" })),
    security: Object.freeze({ textEncryptionKey: config.SECURITY_TEXT_ENCRYPTION_KEY }),
  });
}

export function sharedInfrastructureFromRaw(raw: RawConfig, logger: Logger) {
  const config = parseConfig(raw);
  return { config, infrastructure: buildSharedInfrastructure(config, logger) };
}
