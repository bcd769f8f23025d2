/**
 * @stellar-compass/notifier: Email and SMS notifications.
 *
 * Provides:
 * - Channel interfaces with nodemailer (SMTP) and Twilio (SMS) implementations
 * - Message templates
 * - Retry with exponential backoff
 * - Notifier: best-effort dispatch returning delivery flags
 */

// Channels
export type { EmailChannel, SmsChannel, EmailContent, OutgoingEmail } from "./channels.js";
export type { SmtpConfig, MailTransport } from "./email.js";
export { NodemailerEmailChannel } from "./email.js";
export type { TwilioConfig, SmsClient, SmsClientFactory } from "./sms.js";
export { TwilioSmsChannel } from "./sms.js";

// Templates
export {
  SUMMARY_ASSET_LIMIT,
  TOP_OPPORTUNITIES,
  SMS_MESSAGE_LIMIT,
  TEST_SMS,
  escapeHtml,
  walletDisplayName,
  walletConnectedEmail,
  walletConnectedSms,
  portfolioSummaryEmail,
  opportunitiesEmail,
  alertEmail,
  alertSms,
  testEmail,
} from "./templates.js";

// Retry
export type { RetryConfig } from "./retry.js";
export {
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
  computeDelay,
  withRetry,
  isRetryableDeliveryError,
} from "./retry.js";

// Notifier
export type { NotifierOptions, Recipients, DispatchResult, AlertRouting } from "./notifier.js";
export { Notifier } from "./notifier.js";
