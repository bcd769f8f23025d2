/**
 * GET /api/test-notification Send a test email and SMS.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createNotificationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/test-notification", async (c) => {
    const result = await c.get("service").sendTestNotification();
    return c.json({
      success: true,
      email_sent: result.emailSent,
      sms_sent: result.smsSent,
    });
  });

  return routes;
}
