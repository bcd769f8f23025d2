/**
 * Notifier: best-effort dispatch of Stellar Compass notifications.
 *
 * Design rules:
 * - Never throws: every send resolves to whether it was delivered
 * - Unconfigured channels and missing recipients are skipped, not errors
 * - Delivery failures are retried, then logged
 */

import type { Logger } from "pino";
import type { Alert, Opportunity, Portfolio } from "@stellar-compass/types";
import { shortenAddress } from "@stellar-compass/types";
import type { EmailChannel, EmailContent, SmsChannel } from "./channels.js";
import {
  DEFAULT_RETRY_CONFIG,
  isRetryableDeliveryError,
  sleep,
  withRetry,
} from "./retry.js";
import type { RetryConfig } from "./retry.js";
import {
  TEST_SMS,
  alertEmail,
  alertSms,
  opportunitiesEmail,
  portfolioSummaryEmail,
  testEmail,
  walletConnectedEmail,
  walletConnectedSms,
} from "./templates.js";

// =============================================================================
// Types
// =============================================================================

export interface Recipients {
  readonly email?: string | undefined;
  readonly phone?: string | undefined;
}

export interface NotifierOptions {
  readonly email?: EmailChannel | undefined;
  readonly sms?: SmsChannel | undefined;
  readonly recipients: Recipients;
  readonly logger: Logger;

  /** Shown in the wallet-connected email */
  readonly networkName?: string | undefined;
  readonly retry?: RetryConfig | undefined;

  /** Injectable for tests */
  readonly sleepFn?: ((ms: number) => Promise<void>) | undefined;
}

export interface DispatchResult {
  readonly emailSent: boolean;
  readonly smsSent: boolean;
}

/**
 * Per-alert routing, decided by the caller.
 */
export interface AlertRouting {
  readonly email: boolean;
  readonly sms: boolean;

  /** Overrides the default SMS recipient */
  readonly phone?: string | undefined;
}

// =============================================================================
// Notifier
// =============================================================================

export class Notifier {
  private readonly log: Logger;
  private readonly retry: RetryConfig;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly networkName: string;

  constructor(private readonly options: NotifierOptions) {
    this.log = options.logger.child({ component: "notifier" });
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
    this.sleepFn = options.sleepFn ?? sleep;
    this.networkName = options.networkName ?? "Stellar Mainnet";
  }

  get emailEnabled(): boolean {
    return Boolean(this.options.email?.configured && this.options.recipients.email);
  }

  get smsEnabled(): boolean {
    return Boolean(this.options.sms?.configured && this.options.recipients.phone);
  }

  // ---------------------------------------------------------------------------
  // Primitive sends
  // ---------------------------------------------------------------------------

  async sendEmail(content: EmailContent, recipient = this.options.recipients.email): Promise<boolean> {
    const channel = this.options.email;
    const to = recipient;
    if (!channel?.configured) {
      this.log.debug({ subject: content.subject }, "email not configured, skipping");
      return false;
    }
    if (!to) {
      this.log.debug({ subject: content.subject }, "no email recipient, skipping");
      return false;
    }

    try {
      await withRetry(
        () => channel.send({ ...content, to }),
        this.retry,
        isRetryableDeliveryError,
        this.sleepFn,
      );
      this.log.info({ subject: content.subject }, "email sent");
      return true;
    } catch (err: unknown) {
      this.log.error({ err, subject: content.subject }, "email delivery failed");
      return false;
    }
  }

  async sendSms(body: string, recipient = this.options.recipients.phone): Promise<boolean> {
    const channel = this.options.sms;
    const to = recipient;
    if (!channel?.configured) {
      this.log.debug("sms not configured, skipping");
      return false;
    }
    if (!to) {
      this.log.debug("no sms recipient, skipping");
      return false;
    }

    try {
      const sid = await withRetry(
        () => channel.send(to, body),
        this.retry,
        isRetryableDeliveryError,
        this.sleepFn,
      );
      this.log.info({ sid }, "sms sent");
      return true;
    } catch (err: unknown) {
      this.log.error({ err }, "sms delivery failed");
      return false;
    }
  }

  // ---------------------------------------------------------------------------
  // Notifications
  // ---------------------------------------------------------------------------

  async notifyWalletConnected(address: string, walletType: string): Promise<DispatchResult> {
    this.log.info({ address: shortenAddress(address), walletType }, "wallet connected");

    const [emailSent, smsSent] = await Promise.all([
      this.sendEmail(walletConnectedEmail(address, walletType, this.networkName)),
      this.sendSms(walletConnectedSms(address, walletType)),
    ]);
    return { emailSent, smsSent };
  }

  async notifyPortfolio(portfolio: Portfolio): Promise<boolean> {
    return this.sendEmail(portfolioSummaryEmail(portfolio));
  }

  /**
   * Emails the top opportunities. Nothing is sent for an empty list.
   */
  async notifyOpportunities(opportunities: readonly Opportunity[]): Promise<boolean> {
    if (opportunities.length === 0) return false;
    return this.sendEmail(opportunitiesEmail(opportunities));
  }

  async sendAlert(alert: Alert, routing: AlertRouting): Promise<DispatchResult> {
    const emailSent = routing.email ? await this.sendEmail(alertEmail(alert)) : false;
    const smsSent = routing.sms
      ? await this.sendSms(alertSms(alert), routing.phone ?? this.options.recipients.phone)
      : false;
    return { emailSent, smsSent };
  }

  async sendTest(): Promise<DispatchResult> {
    const [emailSent, smsSent] = await Promise.all([
      this.sendEmail(testEmail()),
      this.sendSms(TEST_SMS),
    ]);
    return { emailSent, smsSent };
  }
}
