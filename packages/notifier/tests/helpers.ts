/**
 * Shared fakes for notifier tests.
 */

import pino from "pino";
import type { EmailChannel, OutgoingEmail, SmsChannel } from "../src/channels.js";

export const silentLogger = pino({ level: "silent" });

export const ADDRESS = "GABCD" + "X".repeat(47) + "1234";

export class FakeEmailChannel implements EmailChannel {
  readonly sent: OutgoingEmail[] = [];
  failures: unknown[] = [];

  constructor(readonly configured = true) {}

  async send(message: OutgoingEmail): Promise<void> {
    const failure = this.failures.shift();
    if (failure !== undefined) throw failure;
    this.sent.push(message);
  }
}

export class FakeSmsChannel implements SmsChannel {
  readonly sent: { to: string; body: string }[] = [];
  failures: unknown[] = [];

  constructor(readonly configured = true) {}

  async send(to: string, body: string): Promise<string> {
    const failure = this.failures.shift();
    if (failure !== undefined) throw failure;
    this.sent.push({ to, body });
    return `SM${this.sent.length}`;
  }
}

export const noopSleep = async (_ms: number): Promise<void> => {};
