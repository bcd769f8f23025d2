/**
 * SMTP email channel backed by nodemailer.
 *
 * Port 465 uses implicit TLS; any other port upgrades with STARTTLS.
 */

import nodemailer from "nodemailer";
import type { EmailChannel, OutgoingEmail } from "./channels.js";

export interface SmtpConfig {
  readonly host: string;
  readonly port: number;

  /** Sender address, also the SMTP login */
  readonly user?: string | undefined;
  readonly password?: string | undefined;
}

/**
 * The part of a nodemailer transport this channel uses.
 */
export interface MailTransport {
  sendMail(mail: {
    from: string;
    to: string;
    subject: string;
    text: string;
    html: string;
  }): Promise<unknown>;
}

export class NodemailerEmailChannel implements EmailChannel {
  readonly configured: boolean;
  private readonly from: string;
  private readonly transport: MailTransport | null;

  constructor(config: SmtpConfig, transport?: MailTransport) {
    this.from = config.user ?? "";
    this.configured = Boolean(config.user && config.password);

    if (transport !== undefined) {
      this.transport = transport;
    } else if (this.configured) {
      this.transport = nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.port === 465,
        auth: { user: config.user, pass: config.password },
      });
    } else {
      this.transport = null;
    }
  }

  async send(message: OutgoingEmail): Promise<void> {
    if (!this.configured || this.transport === null) {
      throw new Error("Email channel is not configured (EMAIL_ADDRESS / EMAIL_PASSWORD)");
    }

    await this.transport.sendMail({
      from: this.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
      html: message.html,
    });
  }
}
