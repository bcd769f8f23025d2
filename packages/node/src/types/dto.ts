/**
 * Request/Response DTOs.
 *
 * Request bodies have a Zod schema and a derived TypeScript type.
 * Responses are snake_case JSON; the mappers below are the only place
 * domain objects are turned into wire shapes.
 */

import { z } from "zod";
import { isWalletAddress } from "@stellar-compass/types";
import type {
  AssetBalance,
  IdleAsset,
  Opportunity,
  Portfolio,
} from "@stellar-compass/types";
import type { AgentSettings } from "@stellar-compass/agents";
import type { AllocationPlan, RiskScore } from "@stellar-compass/analytics";

// =============================================================================
// Shared Schemas
// =============================================================================

export const WalletAddressSchema = z
  .string()
  .trim()
  .refine(isWalletAddress, { message: "Invalid Stellar address" });

export const RiskToleranceSchema = z.enum(["conservative", "moderate", "aggressive"]);

// =============================================================================
// Wallet DTOs
// =============================================================================

export const WalletConnectedSchema = z.object({
  public_key: WalletAddressSchema,
  wallet_type: z.string().max(32).default("unknown"),
});

export type WalletConnectedDto = z.infer<typeof WalletConnectedSchema>;

/** Body of the camelCase notify-connection alias */
export const NotifyConnectionSchema = z.object({
  publicKey: WalletAddressSchema,
  walletType: z.string().max(32).default("unknown"),
});

export type NotifyConnectionDto = z.infer<typeof NotifyConnectionSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

export const OpportunitiesQuerySchema = z.object({
  risk_tolerance: RiskToleranceSchema.optional(),
});

export const AlertsQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).max(100).default(20),
});

// =============================================================================
// Agent DTOs
// =============================================================================

export const AgentSettingsSchema = z.object({
  phone_number: z.string().min(1).max(32).optional(),
  risk_tolerance: RiskToleranceSchema.optional(),
  email_notifications: z.boolean().optional(),
  sms_notifications: z.boolean().optional(),
});

export type AgentSettingsDto = z.infer<typeof AgentSettingsSchema>;

/**
 * Map a settings body onto the agents' settings, dropping absent keys.
 */
export function fromSettingsDto(dto: AgentSettingsDto): Partial<AgentSettings> {
  return {
    ...(dto.phone_number !== undefined ? { phoneNumber: dto.phone_number } : {}),
    ...(dto.risk_tolerance !== undefined ? { riskTolerance: dto.risk_tolerance } : {}),
    ...(dto.email_notifications !== undefined
      ? { emailNotifications: dto.email_notifications }
      : {}),
    ...(dto.sms_notifications !== undefined
      ? { smsNotifications: dto.sms_notifications }
      : {}),
  };
}

// =============================================================================
// Response shapes
// =============================================================================

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

export interface PortfolioJson {
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

export interface AgentSettingsJson {
  readonly phone_number: string | null;
  readonly risk_tolerance: string;
  readonly email_notifications: boolean;
  readonly sms_notifications: boolean;
}

export function toAssetJson(asset: AssetBalance): AssetBalanceJson {
  return {
    asset: asset.asset,
    asset_type: asset.assetType,
    ...(asset.assetIssuer !== undefined ? { asset_issuer: asset.assetIssuer } : {}),
    balance: asset.balance,
    value: asset.value,
  };
}

export function toIdleAssetJson(asset: IdleAsset): IdleAssetJson {
  return {
    ...toAssetJson(asset),
    days_idle: asset.daysIdle,
    opportunity_cost: asset.opportunityCost,
  };
}

export function toPortfolioJson(portfolio: Portfolio): PortfolioJson {
  return {
    public_key: portfolio.publicKey,
    total_value: portfolio.totalValue,
    assets: portfolio.assets.map(toAssetJson),
    active_assets: portfolio.activeAssets.map(toAssetJson),
    idle_assets: portfolio.idleAssets.map(toIdleAssetJson),
    sequence: portfolio.sequence,
    last_activity: portfolio.lastActivity,
  };
}

export function toOpportunityJson(o: Opportunity): OpportunityJson {
  return {
    protocol: o.protocol,
    type: o.type,
    asset: o.asset,
    risk: o.risk,
    apy: o.apy,
    tvl: o.tvl,
    description: o.description,
    action: o.action,
    potential_monthly_earnings: o.potentialMonthlyEarnings,
    url: o.url ?? null,
  };
}

export function toRiskScoreJson(score: RiskScore) {
  return {
    protocol: score.protocol,
    overall_score: score.overallScore,
    risk_level: score.riskLevel,
    factors: {
      time_active: score.factors.timeActive,
      tvl: score.factors.tvl,
      audit: score.factors.audit,
      exploits: score.factors.exploits,
    },
    recommendation: score.recommendation,
  };
}

export function toAllocationPlanJson(plan: AllocationPlan) {
  return {
    strategy: plan.strategy,
    allocations: plan.allocations.map((a) => ({
      protocol: a.protocol,
      asset: a.asset,
      allocation_usd: a.allocationUsd,
      allocation_percentage: a.allocationPercentage,
      expected_apy: a.expectedApy,
      risk_level: a.riskLevel,
    })),
    total_allocated: plan.totalAllocated,
    projected_annual_return: plan.projectedAnnualReturn,
    projected_monthly_return: plan.projectedMonthlyReturn,
  };
}

export function toSettingsJson(settings: AgentSettings): AgentSettingsJson {
  return {
    phone_number: settings.phoneNumber ?? null,
    risk_tolerance: settings.riskTolerance,
    email_notifications: settings.emailNotifications,
    sms_notifications: settings.smsNotifications,
  };
}
