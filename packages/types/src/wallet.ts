/**
 * Wallet Types
 *
 * Stellar account addresses as entered by the user.
 *
 * Rules:
 * - Only the shape is checked here (length and "G" prefix); Horizon is the
 *   authority on whether an account actually exists
 * - An address is immutable once connected
 */

/**
 * Stellar public key (strkey, "G..." form).
 */
export type WalletAddress = string;

/** Length of an encoded Stellar public key. */
export const WALLET_ADDRESS_LENGTH = 56;

/** Version-byte prefix of an ed25519 public key strkey. */
export const WALLET_ADDRESS_PREFIX = "G";

/**
 * How the address reached us. Lobstr has no in-browser injection,
 * so manual entry is the common case.
 */
export type WalletType = "freighter" | "albedo" | "rabet" | "xbull" | "manual";

export const WALLET_DISPLAY_NAMES: Readonly<Record<WalletType, string>> = {
  freighter: "Freighter",
  albedo: "Albedo",
  rabet: "Rabet",
  xbull: "xBull",
  manual: "Manual (Lobstr/Other)",
};

/**
 * Outcome of validating user input as a wallet address.
 */
export type AddressValidation =
  | { readonly valid: true; readonly address: WalletAddress }
  | { readonly valid: false; readonly reason: "empty" | "length" | "prefix" };

/**
 * Validate free-text input as a wallet address. Surrounding whitespace is
 * ignored.
 */
export function validateWalletAddress(input: string): AddressValidation {
  const address = input.trim();
  if (address.length === 0) {
    return { valid: false, reason: "empty" };
  }
  if (address.length !== WALLET_ADDRESS_LENGTH) {
    return { valid: false, reason: "length" };
  }
  if (!address.startsWith(WALLET_ADDRESS_PREFIX)) {
    return { valid: false, reason: "prefix" };
  }
  return { valid: true, address };
}

/**
 * "GABCDEFG...WXYZ1234" form used in logs, emails and the dashboard header.
 */
export function shortenAddress(address: string): string {
  if (address.length <= 16) return address;
  return `${address.slice(0, 8)}...${address.slice(-8)}`;
}
