/**
 * Dashboard state.
 *
 * The view renders exactly what is in DashboardState; every value is
 * already formatted for display.
 *
 * Rules:
 * - status moves disconnected → connected once per connection
 * - address is set only while connected
 * - disconnecting always returns to INITIAL_STATE
 */

import type { WalletAddress } from "@stellar-compass/types";

// =============================================================================
// Types
// =============================================================================

export type SessionStatus = "disconnected" | "connected";

export interface AssetView {
  readonly asset: string;
  readonly balance: string;
  readonly value: string;
  readonly idle: boolean;
}

export interface OpportunityView {
  readonly protocol: string;
  readonly type: string;
  readonly asset: string;
  readonly risk: string;
  readonly apy: string;
  readonly tvl: string;
  readonly description: string;
  readonly action: string;
  readonly url: string | null;
}

export interface DashboardState {
  readonly status: SessionStatus;
  readonly address: WalletAddress | null;

  /** Shortened address for the header */
  readonly displayAddress: string | null;

  /** Address input as last entered */
  readonly input: string;

  /** Set when the last input failed validation */
  readonly inputInvalid: boolean;

  readonly totalValue: string;
  readonly assetCount: number;
  readonly idleCount: number;
  readonly assets: readonly AssetView[];
  readonly opportunities: readonly OpportunityView[];
}

export const INITIAL_STATE: DashboardState = {
  status: "disconnected",
  address: null,
  displayAddress: null,
  input: "",
  inputInvalid: false,
  totalValue: "$0.00",
  assetCount: 0,
  idleCount: 0,
  assets: [],
  opportunities: [],
};

// =============================================================================
// Subscription
// =============================================================================

export type StateListener = (state: DashboardState, previous: DashboardState) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}
