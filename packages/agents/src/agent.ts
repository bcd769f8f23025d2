/**
 * Base monitoring agent.
 *
 * Runs check() once on start and then on a fixed interval. A failing cycle
 * is logged and the next one runs as scheduled. Timers are unref'd so that
 * agents never keep the process alive.
 */

import type { Logger } from "pino";
import type { Alert } from "@stellar-compass/types";
import type { AlertSink, Clock } from "./types.js";

export const DEFAULT_INTERVAL_MS = 5 * 60_000;

export interface AgentOptions {
  readonly intervalMs?: number | undefined;
  readonly logger: Logger;
  readonly clock?: Clock | undefined;
}

export abstract class Agent {
  abstract readonly name: string;
  readonly intervalMs: number;

  protected readonly log: Logger;
  protected readonly clock: Clock;

  private timer: ReturnType<typeof setInterval> | null = null;
  private _lastCheck: Date | null = null;

  constructor(
    private readonly sink: AlertSink,
    options: AgentOptions,
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.log = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Inspect current state and return the alerts to raise.
   */
  protected abstract check(): Promise<readonly Alert[]>;

  get active(): boolean {
    return this.timer !== null;
  }

  get lastCheck(): Date | null {
    return this._lastCheck;
  }

  start(): void {
    if (this.timer !== null) return;

    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    this.timer.unref();

    this.log.info({ agent: this.name, intervalMs: this.intervalMs }, "agent started");
    void this.runOnce();
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.info({ agent: this.name }, "agent stopped");
  }

  /**
   * One check cycle. Never rejects.
   */
  async runOnce(): Promise<void> {
    try {
      const alerts = await this.check();
      this._lastCheck = this.clock();
      for (const alert of alerts) {
        await this.sink(alert);
      }
    } catch (err: unknown) {
      this.log.error({ err, agent: this.name }, "agent check failed");
    }
  }

  protected now(): string {
    return this.clock().toISOString();
  }
}
