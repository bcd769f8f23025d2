/**
 * Alert Types
 *
 * Produced by monitoring agents, consumed by the orchestrator and the API.
 */

export type AlertType =
  | "IDLE_ASSET"
  | "APY_SPIKE"
  | "RISK_ALERT"
  | "PRICE_MOVEMENT";

export type AlertPriority = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export interface Alert {
  readonly type: AlertType;
  readonly priority: AlertPriority;
  readonly title: string;
  readonly message: string;

  /** Suggested action label */
  readonly action: string;

  /** ISO 8601 */
  readonly timestamp: string;
}
