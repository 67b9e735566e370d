/**
 * Configuration loaded from environment variables.
 *
 * Everything is validated once at startup; an invalid weight sum or a
 * non-positive limit raises ConfigError before any cycle runs.
 */

import { z } from "zod";
import { ConfigError } from "../risk/errors.js";

const WEIGHT_SUM_TOLERANCE = 1e-9;

const weight = z.number().min(0).max(1);

function sumsToOne(weights: Record<string, number>): boolean {
  const total = Object.values(weights).reduce((sum, w) => sum + w, 0);
  return Math.abs(total - 1) <= WEIGHT_SUM_TOLERANCE;
}

const positionWeightsSchema = z
  .object({ liquidation: weight, leverage: weight, size: weight })
  .refine(sumsToOne, { message: "position weights must sum to 1" });

const heatWeightsSchema = z
  .object({ leverage: weight, liquidation: weight, concentration: weight })
  .refine(sumsToOne, { message: "heat weights must sum to 1" });

export const riskConfigSchema = z.object({
  /** Leverage that maps to a full leverage component in the position score. */
  maxLeverage: z.number().positive().default(10),
  /** Account leverage that maps to a full leverage component in portfolio heat. */
  maxAccountLeverage: z.number().positive().default(10),
  /** Single position notional as % of account value. */
  maxPositionPct: z.number().positive().default(20),
  maxPositionNotional: z.number().positive().default(100000),
  /** Distance to liquidation (%) at or under which the liquidation component saturates. */
  liquidationCriticalPct: z.number().positive().default(5),
  minDistanceToLiquidationPct: z.number().positive().default(10),
  maxDrawdownPct: z.number().positive().default(15),
  marginUtilizationWarn: z.number().positive().max(1).default(0.8),
  heatWarn: z.number().min(0).max(100).default(70),
  positionWeights: positionWeightsSchema.default({
    liquidation: 0.6,
    leverage: 0.3,
    size: 0.1,
  }),
  heatWeights: heatWeightsSchema.default({
    leverage: 0.4,
    liquidation: 0.4,
    concentration: 0.2,
  }),
});

export type RiskConfig = z.infer<typeof riskConfigSchema>;
export type RiskConfigInput = z.input<typeof riskConfigSchema>;

export const keyModes = ["surrogate", "natural"] as const;
export type KeyMode = (typeof keyModes)[number];

export const pnlSources = ["fills", "positions"] as const;
export type PnlSource = (typeof pnlSources)[number];

const monitorConfigSchema = z.object({
  wallets: z.array(z.string().min(1)).min(1, "WALLET_ADDRESSES must name at least one wallet"),
  apiUrl: z.string().url(),
  supabase: z.object({ url: z.string().url(), key: z.string().min(1) }).nullable(),
  pollIntervalMs: z.number().int().positive(),
  cycleTimeoutMs: z.number().int().positive(),
  maxSnapshotAgeMs: z.number().int().positive(),
  minLogIntervalMs: z.number().int().nonnegative(),
  keyMode: z.enum(keyModes),
  pnlSource: z.enum(pnlSources),
  pnlWindowMs: z.number().int().positive(),
  risk: riskConfigSchema,
});

export type MonitorConfig = z.infer<typeof monitorConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

export function parseRiskConfig(input: RiskConfigInput = {}): RiskConfig {
  const parsed = riskConfigSchema.safeParse(input);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));
  return parsed.data;
}

type Env = Record<string, string | undefined>;

function num(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  return Number(raw);
}

function seconds(env: Env, name: string, fallback: number): number {
  return (num(env, name) ?? fallback) * 1000;
}

function list(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function weights(env: Env, name: string, keys: readonly string[]): Record<string, number> | undefined {
  const values = list(env[name]);
  if (values.length === 0) return undefined;
  if (values.length !== keys.length) {
    throw new ConfigError([`${name}: expected ${keys.length} comma-separated weights (${keys.join(", ")})`]);
  }
  return Object.fromEntries(keys.map((key, i) => [key, Number(values[i])]));
}

export function loadConfig(env: Env = process.env): MonitorConfig {
  const supabaseUrl = env.SUPABASE_URL;
  const supabaseKey = env.SUPABASE_KEY;

  const raw = {
    wallets: list(env.WALLET_ADDRESSES ?? env.WALLET_ADDRESS),
    apiUrl: env.HYPERLIQUID_API_URL || "https://api.hyperliquid.xyz",
    supabase: supabaseUrl || supabaseKey ? { url: supabaseUrl, key: supabaseKey } : null,
    pollIntervalMs: seconds(env, "POLL_INTERVAL_SECONDS", 60),
    cycleTimeoutMs: seconds(env, "CYCLE_TIMEOUT_SECONDS", 20),
    maxSnapshotAgeMs: seconds(env, "MAX_SNAPSHOT_AGE_SECONDS", 120),
    minLogIntervalMs: seconds(env, "MIN_LOG_INTERVAL_SECONDS", 60),
    keyMode: env.LOG_KEY_MODE || "surrogate",
    pnlSource: env.PNL_SOURCE || "fills",
    pnlWindowMs: (num(env, "PNL_WINDOW_HOURS") ?? 24 * 7) * 60 * 60 * 1000,
    risk: {
      maxLeverage: num(env, "MAX_LEVERAGE"),
      maxAccountLeverage: num(env, "MAX_ACCOUNT_LEVERAGE"),
      maxPositionPct: num(env, "MAX_POSITION_PCT"),
      maxPositionNotional: num(env, "MAX_POSITION_NOTIONAL"),
      liquidationCriticalPct: num(env, "LIQUIDATION_CRITICAL_PCT"),
      minDistanceToLiquidationPct: num(env, "MIN_DISTANCE_TO_LIQ_PCT"),
      maxDrawdownPct: num(env, "MAX_DRAWDOWN_PCT"),
      marginUtilizationWarn: num(env, "MARGIN_UTILIZATION_WARN"),
      heatWarn: num(env, "HEAT_WARN"),
      positionWeights: weights(env, "POSITION_WEIGHTS", ["liquidation", "leverage", "size"]),
      heatWeights: weights(env, "HEAT_WEIGHTS", ["leverage", "liquidation", "concentration"]),
    },
  };

  const parsed = monitorConfigSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));
  return parsed.data;
}
