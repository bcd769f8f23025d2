/**
 * Network Definitions
 *
 * Known Stellar networks and their public Horizon endpoints.
 */

// =============================================================================
// Types
// =============================================================================

export type StellarNetwork = "mainnet" | "testnet";

/**
 * Reference to a Stellar network.
 */
export interface NetworkRef {
  /** Network identifier (e.g., "stellar:pubnet") */
  readonly networkId: string;

  /** Human-readable network name */
  readonly name: string;

  /** Default public Horizon endpoint */
  readonly horizonUrl: string;
}

// =============================================================================
// Well-Known Networks
// =============================================================================

export const NETWORKS = {
  mainnet: {
    networkId: "stellar:pubnet",
    name: "Stellar Mainnet",
    horizonUrl: "https://horizon.stellar.org",
  },
  testnet: {
    networkId: "stellar:testnet",
    name: "Stellar Testnet",
    horizonUrl: "https://horizon-testnet.stellar.org",
  },
} as const satisfies Record<StellarNetwork, NetworkRef>;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Check if a networkId belongs to the Stellar family.
 */
export function isStellarNetwork(networkId: string): boolean {
  return networkId.startsWith("stellar:");
}
