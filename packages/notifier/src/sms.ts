/**
 * SMS channel backed by Twilio.
 *
 * The Twilio client validates the account SID when it is built, so it is
 * created on first send rather than at startup.
 */

import twilio from "twilio";
import type { SmsChannel } from "./channels.js";

export interface TwilioConfig {
  readonly accountSid?: string | undefined;
  readonly authToken?: string | undefined;

  /** Sending number, E.164 */
  readonly fromNumber?: string | undefined;
}

/**
 * The part of the Twilio client this channel uses.
 */
export interface SmsClient {
  readonly messages: {
    create(params: { body: string; from: string; to: string }): Promise<{ sid: string }>;
  };
}

export type SmsClientFactory = (accountSid: string, authToken: string) => SmsClient;

const defaultFactory: SmsClientFactory = (accountSid, authToken) => twilio(accountSid, authToken);

export class TwilioSmsChannel implements SmsChannel {
  readonly configured: boolean;
  private client: SmsClient | null = null;

  constructor(
    private readonly config: TwilioConfig,
    private readonly createClient: SmsClientFactory = defaultFactory,
  ) {
    this.configured = Boolean(config.accountSid && config.authToken && config.fromNumber);
  }

  async send(to: string, body: string): Promise<string> {
    const { accountSid, authToken, fromNumber } = this.config;
    if (!accountSid || !authToken || !fromNumber) {
      throw new Error("SMS channel is not configured (TWILIO_ACCOUNT_SID / TWILIO_AUTH_TOKEN / TWILIO_PHONE_NUMBER)");
    }

    this.client ??= this.createClient(accountSid, authToken);
    const message = await this.client.messages.create({ body, from: fromNumber, to });
    return message.sid;
  }
}
