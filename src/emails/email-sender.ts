import type { Logger } from "../platform/logger.js";

export interface EmailsConfiguration {
  readonly fromEmail: string;
}

export interface EmailMessage {
  to: string;
  subject: string;
  content: string;
}

export interface EmailSender {
  send(message: EmailMessage): Promise<void>;
}

/** Delivery is delegated to an outside relay; this process only records what it would send. */
export class LoggingEmailSender implements EmailSender {
  constructor(
    private readonly configuration: EmailsConfiguration,
    private readonly logger: Logger,
  ) {}

  async send(message: EmailMessage): Promise<void> {
    this.logger.info(
      { from: this.configuration.fromEmail, to: message.to, subject: message.subject },
      "Email sent",
    );
  }
}
