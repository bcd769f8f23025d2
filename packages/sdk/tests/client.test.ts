/**
 * Stellar Compass Client Tests
 *
 * Verifies:
 * - Every namespace calls the right method and path
 * - Query parameters (risk tolerance, alert limit)
 * - Address encoding in paths
 * - Error envelopes surface as DashboardApiError
 */

import { describe, it, expect, vi } from "vitest";
import { StellarCompassClient } from "../src/client.js";
import type { AgentSettingsJson, OpportunityJson, PortfolioResponse } from "../src/client.js";
import { DashboardApiError } from "../src/types.js";

// =============================================================================
// Mock Fetch Helper
// =============================================================================

interface MockRoute {
  readonly method: string;
  /** Path and query after the base URL */
  readonly path: string;
  readonly status: number;
  readonly body: unknown;
}

const BASE_URL = "http://compass.test/api";

function urlOf(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  return input instanceof URL ? input.toString() : input.url;
}

function createRoutedMockFetch(routes: MockRoute[]) {
  return vi.fn<typeof fetch>(async (input, init) => {
    const url = urlOf(input);
    const method = init?.method ?? "GET";
    const route = routes.find((r) => r.method === method && `${BASE_URL}${r.path}` === url);

    if (route === undefined) {
      return new Response(
        JSON.stringify({ error: { code: "NOT_FOUND", message: `No route for ${method} ${url}` } }),
        { status: 404 },
      );
    }

    return new Response(JSON.stringify(route.body), {
      status: route.status,
      headers: { "content-type": "application/json" },
    });
  });
}

function clientFor(routes: MockRoute[]) {
  const fetchFn = createRoutedMockFetch(routes);
  return { client: new StellarCompassClient({ baseUrl: BASE_URL, fetchFn }), fetchFn };
}

function sentBody(fetchFn: ReturnType<typeof createRoutedMockFetch>, call = 0): unknown {
  const body = fetchFn.mock.calls[call]?.[1]?.body;
  return typeof body === "string" ? JSON.parse(body) : undefined;
}

// =============================================================================
// Fixtures
// =============================================================================

const ADDRESS = "GABCD" + "X".repeat(47) + "1234";

const SAMPLE_PORTFOLIO: PortfolioResponse = {
  public_key: ADDRESS,
  total_value: 123.45,
  assets: [{ asset: "XLM", asset_type: "native", balance: 1028.75, value: 123.45 }],
  active_assets: [],
  idle_assets: [
    {
      asset: "XLM",
      asset_type: "native",
      balance: 1028.75,
      value: 123.45,
      days_idle: 45,
      opportunity_cost: 6.17,
    },
  ],
  sequence: "1",
  last_activity: "2024-12-01T10:00:00.000Z",
};

const SAMPLE_OPPORTUNITY: OpportunityJson = {
  protocol: "Aquarius",
  type: "Liquidity Pool",
  asset: "XLM",
  risk: "Medium",
  apy: 12.3,
  tvl: 25000000,
  description: "Provide XLM liquidity",
  action: "Add Liquidity",
  potential_monthly_earnings: 1.27,
  url: null,
};

const DEFAULT_SETTINGS: AgentSettingsJson = {
  phone_number: null,
  risk_tolerance: "moderate",
  email_notifications: true,
  sms_notifications: false,
};

// =============================================================================
// Health and notifications
// =============================================================================

describe("StellarCompassClient", () => {
  it("uses the local API by default", () => {
    expect(new StellarCompassClient().baseUrl).toBe("http://localhost:5000/api");
  });

  it("checks health", async () => {
    const { client } = clientFor([
      {
        method: "GET",
        path: "/health",
        status: 200,
        body: {
          status: "healthy",
          message: "Stellar Compass API is running",
          service: "Stellar Compass API",
          network: "testnet",
          timestamp: "2025-01-15T10:00:00.000Z",
        },
      },
    ]);

    const result = await client.health();
    expect(result.status).toBe(200);
    expect(result.data.status).toBe("healthy");
    expect(result.data.message).toBe("Stellar Compass API is running");
  });

  it("sends a test notification", async () => {
    const { client } = clientFor([
      {
        method: "GET",
        path: "/test-notification",
        status: 200,
        body: { success: true, email_sent: true, sms_sent: false },
      },
    ]);

    const result = await client.testNotification();
    expect(result.data).toEqual({ success: true, email_sent: true, sms_sent: false });
  });
});

// =============================================================================
// Wallet
// =============================================================================

describe("StellarCompassClient wallet", () => {
  const route: MockRoute = {
    method: "POST",
    path: "/wallet/connected",
    status: 200,
    body: { success: true, message: "Notifications sent", wallet_type: "freighter" },
  };

  it("reports a connected wallet with its type", async () => {
    const { client, fetchFn } = clientFor([route]);

    const result = await client.wallet.connected(ADDRESS, "freighter");

    expect(result.data.success).toBe(true);
    expect(sentBody(fetchFn)).toEqual({ public_key: ADDRESS, wallet_type: "freighter" });
  });

  it("omits the wallet type when not given", async () => {
    const { client, fetchFn } = clientFor([route]);

    await client.wallet.connected(ADDRESS);
    expect(sentBody(fetchFn)).toEqual({ public_key: ADDRESS });
  });
});

// =============================================================================
// Portfolio
// =============================================================================

describe("StellarCompassClient portfolio", () => {
  it("gets a portfolio", async () => {
    const { client } = clientFor([
      { method: "GET", path: `/portfolio/${ADDRESS}`, status: 200, body: SAMPLE_PORTFOLIO },
    ]);

    const result = await client.portfolio.get(ADDRESS);
    expect(result.data.total_value).toBe(123.45);
    expect(result.data.idle_assets[0]?.days_idle).toBe(45);
  });

  it("gets opportunities as a plain array", async () => {
    const { client } = clientFor([
      { method: "GET", path: `/opportunities/${ADDRESS}`, status: 200, body: [SAMPLE_OPPORTUNITY] },
    ]);

    const result = await client.portfolio.opportunities(ADDRESS);
    expect(result.data).toEqual([SAMPLE_OPPORTUNITY]);
  });

  it("passes the risk tolerance as a query parameter", async () => {
    const { client } = clientFor([
      {
        method: "GET",
        path: `/opportunities/${ADDRESS}?risk_tolerance=conservative`,
        status: 200,
        body: [],
      },
    ]);

    const result = await client.portfolio.opportunities(ADDRESS, "conservative");
    expect(result.data).toEqual([]);
  });

  it("encodes special characters in the address", async () => {
    const { client, fetchFn } = clientFor([]);

    await expect(client.portfolio.get("G/../x")).rejects.toBeInstanceOf(DashboardApiError);
    expect(fetchFn.mock.calls[0]?.[0]).toBe(`${BASE_URL}/portfolio/G%2F..%2Fx`);
  });

  it("surfaces the API error envelope", async () => {
    const { client } = clientFor([
      {
        method: "GET",
        path: "/portfolio/INVALID",
        status: 400,
        body: { error: { code: "INVALID_ADDRESS", message: "Invalid Stellar address" } },
      },
    ]);

    const error = await client.portfolio.get("INVALID").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DashboardApiError);
    if (error instanceof DashboardApiError) {
      expect(error.code).toBe("INVALID_ADDRESS");
      expect(error.statusCode).toBe(400);
    }
  });
});

// =============================================================================
// Analysis
// =============================================================================

describe("StellarCompassClient analysis", () => {
  it("scores a protocol with an encoded name", async () => {
    const { client } = clientFor([
      {
        method: "GET",
        path: "/risk/Unheard%20Of",
        status: 200,
        body: {
          protocol: "Unheard Of",
          overall_score: 62.5,
          risk_level: "HIGH",
          factors: { time_active: 100, tvl: 100, audit: 50, exploits: 0 },
          recommendation: "Exercise caution",
        },
      },
    ]);

    const result = await client.analysis.risk("Unheard Of");
    expect(result.data.overall_score).toBe(62.5);
  });

  it("requests an allocation plan for a strategy", async () => {
    const { client } = clientFor([
      {
        method: "GET",
        path: `/optimize/${ADDRESS}?risk_tolerance=aggressive`,
        status: 200,
        body: {
          strategy: "aggressive",
          allocations: [],
          total_allocated: 0,
          projected_annual_return: 0,
          projected_monthly_return: 0,
        },
      },
    ]);

    const result = await client.analysis.optimize(ADDRESS, "aggressive");
    expect(result.data.strategy).toBe("aggressive");
  });
});

// =============================================================================
// Agents
// =============================================================================

describe("StellarCompassClient agents", () => {
  it("activates agents with settings", async () => {
    const { client, fetchFn } = clientFor([
      {
        method: "POST",
        path: `/agents/${ADDRESS}/activate`,
        status: 200,
        body: {
          success: true,
          address: ADDRESS,
          agents: ["idle-asset-monitor"],
          settings: { ...DEFAULT_SETTINGS, sms_notifications: true },
        },
      },
    ]);

    const result = await client.agents.activate(ADDRESS, { sms_notifications: true });

    expect(result.data.settings.sms_notifications).toBe(true);
    expect(sentBody(fetchFn)).toEqual({ sms_notifications: true });
  });

  it("activates with an empty body by default", async () => {
    const { client, fetchFn } = clientFor([
      {
        method: "POST",
        path: `/agents/${ADDRESS}/activate`,
        status: 200,
        body: { success: true, address: ADDRESS, agents: [], settings: DEFAULT_SETTINGS },
      },
    ]);

    await client.agents.activate(ADDRESS);
    expect(sentBody(fetchFn)).toEqual({});
  });

  it("deactivates agents", async () => {
    const { client, fetchFn } = clientFor([
      {
        method: "POST",
        path: `/agents/${ADDRESS}/deactivate`,
        status: 200,
        body: { success: true, address: ADDRESS },
      },
    ]);

    const result = await client.agents.deactivate(ADDRESS);
    expect(result.data.success).toBe(true);
    expect(fetchFn.mock.calls[0]?.[1]?.body).toBeUndefined();
  });

  it("lists alerts with a limit", async () => {
    const { client } = clientFor([
      {
        method: "GET",
        path: `/agents/${ADDRESS}/alerts?limit=5`,
        status: 200,
        body: { address: ADDRESS, alerts: [], count: 0 },
      },
    ]);

    const result = await client.agents.alerts(ADDRESS, 5);
    expect(result.data.count).toBe(0);
  });

  it("lists alerts without a limit", async () => {
    const { client } = clientFor([
      {
        method: "GET",
        path: `/agents/${ADDRESS}/alerts`,
        status: 200,
        body: { address: ADDRESS, alerts: [], count: 0 },
      },
    ]);

    const result = await client.agents.alerts(ADDRESS);
    expect(result.data.address).toBe(ADDRESS);
  });

  it("updates settings with PUT", async () => {
    const { client, fetchFn } = clientFor([
      {
        method: "PUT",
        path: `/agents/${ADDRESS}/settings`,
        status: 200,
        body: { success: true, settings: { ...DEFAULT_SETTINGS, risk_tolerance: "aggressive" } },
      },
    ]);

    const result = await client.agents.updateSettings(ADDRESS, { risk_tolerance: "aggressive" });

    expect(result.data.settings.risk_tolerance).toBe("aggressive");
    expect(sentBody(fetchFn)).toEqual({ risk_tolerance: "aggressive" });
  });

  it("reports agents that were never activated", async () => {
    const { client } = clientFor([
      {
        method: "GET",
        path: `/agents/${ADDRESS}/alerts`,
        status: 404,
        body: { error: { code: "AGENTS_NOT_ACTIVE", message: "No active agents" } },
      },
    ]);

    await expect(client.agents.alerts(ADDRESS)).rejects.toMatchObject({
      code: "AGENTS_NOT_ACTIVE",
      statusCode: 404,
    });
  });
});
