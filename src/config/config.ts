import { z } from "zod";
import { DEFAULT_BACKOFF } from "../engine/backoff.js";

export const BackoffConfigSchema = z
  .object({
    baseMs: z.number().int().min(0).default(DEFAULT_BACKOFF.baseMs),
    maxMs: z.number().int().min(0).default(DEFAULT_BACKOFF.maxMs),
    factor: z.number().min(1).default(DEFAULT_BACKOFF.factor),
    jitter: z.number().min(0).max(1).default(DEFAULT_BACKOFF.jitter),
  })
  .strict();

/**
 * Explicit engine context. Every component receives the values it needs
 * from here through its constructor.
 */
export const EngineConfigSchema = z
  .object({
    maxConcurrency: z.number().int().min(1).default(3),
    agentMaxTurns: z.number().int().min(1).default(12),
    agentTimeoutMs: z.number().int().min(1).default(300_000),
    maxInvalidSubmissions: z.number().int().min(0).default(2),
    maxToolRoundsPerStep: z.number().int().min(1).default(16),
    llmRetries: z.number().int().min(0).default(2),
    backoff: BackoffConfigSchema.default({}),
    summaryMaxChars: z.number().int().min(50).default(600),
    artifactPageChars: z.number().int().min(500).default(12_000),
    requireDispatchApproval: z.boolean().default(true),
    dbPath: z.string().min(1).default(":memory:"),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(`${name} must be a boolean, got "${value}"`);
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/** Environment overrides. Explicit overrides win over the environment. */
function fromEnv(env: NodeJS.ProcessEnv): EngineConfigInput {
  const out: EngineConfigInput = {};
  if (env.INTERVIEW_DB_PATH) out.dbPath = env.INTERVIEW_DB_PATH;
  if (env.INTERVIEW_MAX_CONCURRENCY) {
    out.maxConcurrency = parseInteger(
      "INTERVIEW_MAX_CONCURRENCY",
      env.INTERVIEW_MAX_CONCURRENCY,
    );
  }
  if (env.INTERVIEW_REQUIRE_APPROVAL) {
    out.requireDispatchApproval = parseBoolean(
      "INTERVIEW_REQUIRE_APPROVAL",
      env.INTERVIEW_REQUIRE_APPROVAL,
    );
  }
  return out;
}

export function loadConfig(
  overrides: EngineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  return EngineConfigSchema.parse({ ...fromEnv(env), ...overrides });
}
