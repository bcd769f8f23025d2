/**
 * Wallet connection routes.
 *
 * POST /api/wallet/connected    { public_key, wallet_type? }
 * POST /api/notify-connection   camelCase alias: { publicKey, walletType? }
 *
 * Both send the wallet-connected notifications and report success even when
 * no channel is configured.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { NotifyConnectionSchema, WalletConnectedSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createWalletRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/wallet/connected", validateBody(WalletConnectedSchema), async (c) => {
    const body = c.get("validatedBody");
    await c.get("service").walletConnected(body.public_key, body.wallet_type);

    return c.json({
      success: true,
      message: "Notifications sent",
      wallet_type: body.wallet_type,
    });
  });

  routes.post("/notify-connection", validateBody(NotifyConnectionSchema), async (c) => {
    const body = c.get("validatedBody");
    await c.get("service").walletConnected(body.publicKey, body.walletType);

    return c.json({
      success: true,
      message: "Notifications sent",
      wallet_type: body.walletType,
    });
  });

  return routes;
}
