/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { ADDRESS, createTestApp, jsonRequest } from "../setup.js";
import { walletFromPath } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("logs the status of successful requests", async () => {
    const { app, logs } = createTestApp();

    await app.request(`/api/portfolio/${ADDRESS}`);

    expect(logs).toHaveLength(1);
    expect(logs[0]!.method).toBe("GET");
    expect(logs[0]!.path).toBe(`/api/portfolio/${ADDRESS}`);
    expect(logs[0]!.status).toBe(200);
  });

  it("logs POST requests rejected by validation", async () => {
    const { app, logs } = createTestApp();

    await app.request(jsonRequest("/api/wallet/connected", "POST", { public_key: "GSHORT" }));

    expect(logs).toHaveLength(1);
    expect(logs[0]!.method).toBe("POST");
    expect(logs[0]!.status).toBe(400);
  });

  it("logs the status produced by the error handler", async () => {
    const { app, logs } = createTestApp();

    await app.request("/api/portfolio/not-an-address");

    expect(logs[0]!.status).toBe(400);
  });

  it("tags requests for a wallet with its shortened address", async () => {
    const { app, logs } = createTestApp();

    await app.request(`/api/portfolio/${ADDRESS}`);

    expect(logs[0]!.wallet).toBe("GABCDXXX...XXXX1234");
  });

  it("leaves the wallet out for other paths", async () => {
    const { app, logs } = createTestApp();

    await app.request("/api/health");

    expect(logs[0]).not.toHaveProperty("wallet");
  });
});

describe("walletFromPath", () => {
  it("finds an address segment anywhere in the path", () => {
    expect(walletFromPath(`/api/agents/${ADDRESS}/alerts`)).toBe("GABCDXXX...XXXX1234");
  });

  it("ignores segments that are not addresses", () => {
    expect(walletFromPath("/api/portfolio/GSHORT")).toBeUndefined();
    expect(walletFromPath(`/api/portfolio/${ADDRESS}X`)).toBeUndefined();
  });
});
