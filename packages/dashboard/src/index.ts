/**
 * @stellar-compass/dashboard: Browser-side view-model for Stellar Compass.
 *
 * Holds the wallet connection flow, the rendered state and the toast
 * queue. Rendering itself is left to whatever view consumes the state.
 *
 * @packageDocumentation
 */

// State
export type {
  SessionStatus,
  AssetView,
  OpportunityView,
  DashboardState,
  StateListener,
  Subscription,
} from "./state.js";
export { INITIAL_STATE } from "./state.js";

// Session
export type { DashboardSessionOptions } from "./session.js";
export { DashboardSession, MESSAGES } from "./session.js";

// Toasts
export type { Toast, ToastKind, ToastListener } from "./toast.js";
export { ToastQueue, TOAST_DURATION_MS } from "./toast.js";

// Formatting
export { formatUsd, formatBalance, formatApy, formatTvl } from "./format.js";
