/**
 * Email Client — transactional email sender.
 *
 * Wraps the Resend SDK. Without an API key (development) a LogEmailSender
 * writes the message to the log instead. Every email is logged for audit.
 */

import { Resend } from "resend";
import { logger } from "../config/logger.js";

export interface EmailClientConfig {
  apiKey: string;
  from: string;
  replyTo?: string;
}

export interface SendTemplateEmailOpts {
  to: string;
  subject: string;
  html: string;
  text: string;
  /** Audit metadata: who the email is about */
  userId?: string;
  /** Audit metadata: which template was used */
  templateName?: string;
}

export interface EmailSendResult {
  id: string;
  success: boolean;
}

/** Anything that can deliver a rendered email. */
export interface EmailSender {
  send(opts: SendTemplateEmailOpts): Promise<EmailSendResult>;
}

/**
 * Transactional email client backed by Resend.
 *
 * Usage:
 * ```ts
 * const client = new EmailClient({ apiKey: "re_xxx", from: "noreply@pressroom.local" });
 * const template = passwordResetTemplate(user.username, url);
 * await client.send({ to: user.email, ...template, userId: user.id, templateName: "password-reset" });
 * ```
 */
export class EmailClient implements EmailSender {
  private resend: Resend;
  private from: string;
  private replyTo: string | undefined;

  constructor(config: EmailClientConfig) {
    this.resend = new Resend(config.apiKey);
    this.from = config.from;
    this.replyTo = config.replyTo;
  }

  /** Send a transactional email. */
  async send(opts: SendTemplateEmailOpts): Promise<EmailSendResult> {
    const { data, error } = await this.resend.emails.send({
      from: this.from,
      replyTo: this.replyTo,
      to: opts.to,
      subject: opts.subject,
      html: opts.html,
      text: opts.text,
    });

    if (error) {
      logger.error("Failed to send email", {
        to: opts.to,
        template: opts.templateName,
        error: error.message,
      });
      throw new Error(`Failed to send email: ${error.message}`);
    }

    const result: EmailSendResult = {
      id: data?.id || "",
      success: true,
    };

    logger.info("Email sent", {
      emailId: result.id,
      to: opts.to,
      template: opts.templateName,
      userId: opts.userId,
    });

    return result;
  }
}

/** Development sender: logs the message instead of delivering it. */
export class LogEmailSender implements EmailSender {
  async send(opts: SendTemplateEmailOpts): Promise<EmailSendResult> {
    const id = `log-${crypto.randomUUID()}`;
    logger.info("Email logged (no RESEND_API_KEY configured)", {
      emailId: id,
      to: opts.to,
      subject: opts.subject,
      template: opts.templateName,
      userId: opts.userId,
      text: opts.text,
    });
    return { id, success: true };
  }
}

/** Pick the Resend client when an API key is configured, the log sender otherwise. */
export function createEmailSender(config: { resendApiKey?: string; from: string; replyTo?: string }): EmailSender {
  if (!config.resendApiKey) {
    logger.warn("RESEND_API_KEY not set; outbound email will only be logged");
    return new LogEmailSender();
  }
  return new EmailClient({ apiKey: config.resendApiKey, from: config.from, replyTo: config.replyTo });
}
