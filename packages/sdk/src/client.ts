/**
 * @stellar-compass/sdk: Stellar Compass Client.
 *
 * Typed methods for every API route, grouped by namespace:
 * client.wallet, client.portfolio, client.analysis, client.agents.
 *
 * Design:
 * - Delegates to HttpClient for transport
 * - Wire types are the API's snake_case JSON, unchanged
 */

import type { ApiResponse, CompassClientConfig } from "./types.js";
import { HttpClient } from "./http-client.js";

// =============================================================================
// Wire Types (mirror the API responses)
// =============================================================================

export type RiskToleranceParam = "conservative" | "moderate" | "aggressive";

export interface HealthResponse {
  readonly status: string;
  readonly message: string;
  readonly service: string;
  readonly network: string;
  readonly timestamp: string;
}

export interface WalletConnectedResponse {
  readonly success: boolean;
  readonly message: string;
  readonly wallet_type: string;
}

export interface AssetBalanceJson {
  readonly asset: string;
  readonly asset_type: string;
  readonly asset_issuer?: string;
  readonly balance: number;
  readonly value: number;
}

export interface IdleAssetJson extends AssetBalanceJson {
  readonly days_idle: number;
  readonly opportunity_cost: number;
}

export interface PortfolioResponse {
  readonly public_key: string;
  readonly total_value: number;
  readonly assets: readonly AssetBalanceJson[];
  readonly active_assets: readonly AssetBalanceJson[];
  readonly idle_assets: readonly IdleAssetJson[];
  readonly sequence: string;
  readonly last_activity: string | null;
}

export interface OpportunityJson {
  readonly protocol: string;
  readonly type: string;
  readonly asset: string;
  readonly risk: string;
  readonly apy: number;
  readonly tvl: number;
  readonly description: string;
  readonly action: string;
  readonly potential_monthly_earnings: number;
  readonly url: string | null;
}

export interface RiskScoreResponse {
  readonly protocol: string;
  readonly overall_score: number;
  readonly risk_level: string;
  readonly factors: {
    readonly time_active: number;
    readonly tvl: number;
    readonly audit: number;
    readonly exploits: number;
  };
  readonly recommendation: string;
}

export interface AllocationPlanResponse {
  readonly strategy: RiskToleranceParam;
  readonly allocations: readonly {
    readonly protocol: string;
    readonly asset: string;
    readonly allocation_usd: number;
    readonly allocation_percentage: number;
    readonly expected_apy: number;
    readonly risk_level: string;
  }[];
  readonly total_allocated: number;
  readonly projected_annual_return: number;
  readonly projected_monthly_return: number;
}

export interface AgentSettingsJson {
  readonly phone_number: string | null;
  readonly risk_tolerance: RiskToleranceParam;
  readonly email_notifications: boolean;
  readonly sms_notifications: boolean;
}

export interface AgentSettingsUpdate {
  readonly phone_number?: string | undefined;
  readonly risk_tolerance?: RiskToleranceParam | undefined;
  readonly email_notifications?: boolean | undefined;
  readonly sms_notifications?: boolean | undefined;
}

export interface AlertJson {
  readonly type: string;
  readonly priority: string;
  readonly title: string;
  readonly message: string;
  readonly action: string;
  readonly timestamp: string;
}

export interface ActivateAgentsResponse {
  readonly success: boolean;
  readonly address: string;
  readonly agents: readonly string[];
  readonly settings: AgentSettingsJson;
}

export interface AlertsResponse {
  readonly address: string;
  readonly alerts: readonly AlertJson[];
  readonly count: number;
}

export interface TestNotificationResponse {
  readonly success: boolean;
  readonly email_sent: boolean;
  readonly sms_sent: boolean;
}

function withTolerance(path: string, tolerance: RiskToleranceParam | undefined): string {
  if (tolerance === undefined) return path;
  const query = new URLSearchParams({ risk_tolerance: tolerance });
  return `${path}?${query.toString()}`;
}

// =============================================================================
// Namespace Classes
// =============================================================================

/**
 * Wallet connection namespace.
 */
export class WalletNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Tell the backend a wallet connected; it sends the notifications.
   */
  async connected(
    publicKey: string,
    walletType?: string,
  ): Promise<ApiResponse<WalletConnectedResponse>> {
    const body = walletType !== undefined
      ? { public_key: publicKey, wallet_type: walletType }
      : { public_key: publicKey };
    return this.http.post<WalletConnectedResponse>("/wallet/connected", body);
  }
}

/**
 * Portfolio and opportunity namespace.
 */
export class PortfolioNamespace {
  constructor(private readonly http: HttpClient) {}

  async get(address: string): Promise<ApiResponse<PortfolioResponse>> {
    return this.http.get<PortfolioResponse>(`/portfolio/${encodeURIComponent(address)}`);
  }

  async opportunities(
    address: string,
    tolerance?: RiskToleranceParam,
  ): Promise<ApiResponse<readonly OpportunityJson[]>> {
    return this.http.get<readonly OpportunityJson[]>(
      withTolerance(`/opportunities/${encodeURIComponent(address)}`, tolerance),
    );
  }
}

/**
 * Risk and allocation namespace.
 */
export class AnalysisNamespace {
  constructor(private readonly http: HttpClient) {}

  async risk(protocol: string): Promise<ApiResponse<RiskScoreResponse>> {
    return this.http.get<RiskScoreResponse>(`/risk/${encodeURIComponent(protocol)}`);
  }

  async optimize(
    address: string,
    tolerance?: RiskToleranceParam,
  ): Promise<ApiResponse<AllocationPlanResponse>> {
    return this.http.get<AllocationPlanResponse>(
      withTolerance(`/optimize/${encodeURIComponent(address)}`, tolerance),
    );
  }
}

/**
 * Monitoring agents namespace.
 */
export class AgentsNamespace {
  constructor(private readonly http: HttpClient) {}

  async activate(
    address: string,
    settings: AgentSettingsUpdate = {},
  ): Promise<ApiResponse<ActivateAgentsResponse>> {
    return this.http.post<ActivateAgentsResponse>(
      `/agents/${encodeURIComponent(address)}/activate`,
      settings,
    );
  }

  async deactivate(address: string): Promise<ApiResponse<{ success: boolean; address: string }>> {
    return this.http.post<{ success: boolean; address: string }>(
      `/agents/${encodeURIComponent(address)}/deactivate`,
    );
  }

  /**
   * Most recent alerts, oldest first.
   */
  async alerts(address: string, limit?: number): Promise<ApiResponse<AlertsResponse>> {
    const path = `/agents/${encodeURIComponent(address)}/alerts`;
    return this.http.get<AlertsResponse>(limit !== undefined ? `${path}?limit=${limit}` : path);
  }

  async updateSettings(
    address: string,
    settings: AgentSettingsUpdate,
  ): Promise<ApiResponse<{ success: boolean; settings: AgentSettingsJson }>> {
    return this.http.put<{ success: boolean; settings: AgentSettingsJson }>(
      `/agents/${encodeURIComponent(address)}/settings`,
      settings,
    );
  }
}

// =============================================================================
// Main Client
// =============================================================================

/**
 * Stellar Compass API client.
 *
 * @example
 * ```typescript
 * const client = new StellarCompassClient();
 * const { data } = await client.portfolio.get("GABC...");
 * console.log(data.total_value);
 * ```
 */
export class StellarCompassClient {
  readonly wallet: WalletNamespace;
  readonly portfolio: PortfolioNamespace;
  readonly analysis: AnalysisNamespace;
  readonly agents: AgentsNamespace;

  private readonly http: HttpClient;

  constructor(config: CompassClientConfig = {}) {
    this.http = new HttpClient(config);
    this.wallet = new WalletNamespace(this.http);
    this.portfolio = new PortfolioNamespace(this.http);
    this.analysis = new AnalysisNamespace(this.http);
    this.agents = new AgentsNamespace(this.http);
  }

  get baseUrl(): string {
    return this.http.baseUrl;
  }

  async health(): Promise<ApiResponse<HealthResponse>> {
    return this.http.get<HealthResponse>("/health");
  }

  async testNotification(): Promise<ApiResponse<TestNotificationResponse>> {
    return this.http.get<TestNotificationResponse>("/test-notification");
  }
}
