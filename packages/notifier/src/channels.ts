/**
 * Notification channel interfaces.
 *
 * The notifier talks to these only. Shipped implementations are SMTP
 * (nodemailer) and SMS (Twilio); tests use in-process fakes.
 *
 * Design rules:
 * - A channel that is missing credentials reports `configured: false`
 *   and is never called
 * - send() throws on failure; retry and logging live in the notifier
 */

export interface EmailContent {
  readonly subject: string;
  readonly text: string;
  readonly html: string;
}

export interface OutgoingEmail extends EmailContent {
  readonly to: string;
}

export interface EmailChannel {
  readonly configured: boolean;
  send(message: OutgoingEmail): Promise<void>;
}

export interface SmsChannel {
  readonly configured: boolean;

  /** Returns the provider's message id */
  send(to: string, body: string): Promise<string>;
}
