/**
 * Consensus pipeline configuration.
 *
 * Defaults live in DEFAULT_CONSENSUS_CONFIG; loadConsensusConfig overlays
 * CONSENSUS_* environment variables, validated with Zod.
 */

import { z } from "zod";
import { ConfigError } from "./errors";

export interface ConsensusConfig {
  /** OpenRouter model ids for the initial analysts */
  analystModels: string[];
  /** OpenRouter model ids for debate participants, paired with analysts by position */
  debaterModels: string[];
  /** Total debate rounds including Round 1 and Final (≥ 2) */
  debateRounds: number;
  /** Per-call timeout for analyst and participant calls */
  timeoutMs: number;
  /** Characters of another participant's latest argument shown in review rounds */
  reviewExcerptChars: number;
  /** Characters of each own history entry shown in the final round */
  finalExcerptChars: number;
}

export const DEFAULT_CONSENSUS_CONFIG: ConsensusConfig = {
  analystModels: [
    "openai/gpt-4o-mini",
    "anthropic/claude-3.5-haiku",
    "mistralai/mistral-small",
  ],
  debaterModels: [
    "openai/gpt-4o-mini",
    "anthropic/claude-3.5-haiku",
    "mistralai/mistral-small",
  ],
  debateRounds: 3,
  timeoutMs: 120_000,
  reviewExcerptChars: 300,
  finalExcerptChars: 200,
};

const modelList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((m) => m.trim())
      .filter(Boolean)
  )
  .pipe(z.array(z.string()).min(1, "At least one model is required"));

const EnvSchema = z.object({
  CONSENSUS_ANALYST_MODELS: modelList.optional(),
  CONSENSUS_DEBATER_MODELS: modelList.optional(),
  CONSENSUS_DEBATE_ROUNDS: z.coerce
    .number()
    .int()
    .min(2, "A debate needs at least Round 1 and a Final round")
    .optional(),
  CONSENSUS_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export const ConsensusConfigSchema = z.object({
  analystModels: z.array(z.string().min(1)).min(1),
  debaterModels: z.array(z.string().min(1)).min(1),
  debateRounds: z.number().int().min(2),
  timeoutMs: z.number().int().positive(),
  reviewExcerptChars: z.number().int().positive(),
  finalExcerptChars: z.number().int().positive(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    .join("; ");
}

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function resolveConsensusConfig(
  overrides: Partial<ConsensusConfig> = {}
): ConsensusConfig {
  const parsed = ConsensusConfigSchema.safeParse({
    ...DEFAULT_CONSENSUS_CONFIG,
    ...overrides,
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid consensus config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Build the config from CONSENSUS_* environment variables.
 */
export function loadConsensusConfig(
  env: NodeJS.ProcessEnv = process.env
): ConsensusConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }

  const e = parsed.data;
  return resolveConsensusConfig({
    ...(e.CONSENSUS_ANALYST_MODELS ? { analystModels: e.CONSENSUS_ANALYST_MODELS } : {}),
    ...(e.CONSENSUS_DEBATER_MODELS ? { debaterModels: e.CONSENSUS_DEBATER_MODELS } : {}),
    ...(e.CONSENSUS_DEBATE_ROUNDS !== undefined
      ? { debateRounds: e.CONSENSUS_DEBATE_ROUNDS }
      : {}),
    ...(e.CONSENSUS_TIMEOUT_MS !== undefined ? { timeoutMs: e.CONSENSUS_TIMEOUT_MS } : {}),
  });
}
