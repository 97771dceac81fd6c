import { z } from "zod";

import { loadLocalEnv } from "./utils/env.js";

export const searchConfigSchema = z.strictObject({
  /** Sampling temperature for every generator call. */
  temperature: z.number().min(0).max(2).default(0.8),
  maxTokens: z.number().int().positive().default(4096),
  /** Population size B kept at every depth. */
  expansionWidth: z.number().int().min(1).default(4),
  /** Softmax temperature τ used by REBASE resampling; 0 selects the best survivors only. */
  rebaseTemperature: z.number().min(0).default(0.1),
  /** Refinement depths after initialization. 0 degenerates to best-of-n. */
  maxIterations: z.number().int().min(0).default(8),
  verifiedScoreThreshold: z.number().positive().default(1),
  maxDepthRetries: z.number().int().min(0).default(3),
  generationConcurrency: z.number().int().min(1).default(8),
  verificationConcurrency: z.number().int().min(1).default(2),
  maxFeedbackChars: z.number().int().positive().default(4000),
  seed: z.number().int().optional(),
});

export type SearchConfig = z.output<typeof searchConfigSchema>;
export type SearchConfigInput = z.input<typeof searchConfigSchema>;

export const SEARCH_CONFIG_ENV_KEYS = {
  temperature: "METAGEN_TEMPERATURE",
  maxTokens: "METAGEN_MAX_TOKENS",
  expansionWidth: "METAGEN_EXPANSION_WIDTH",
  rebaseTemperature: "METAGEN_REBASE_TEMPERATURE",
  maxIterations: "METAGEN_MAX_ITERATIONS",
  verifiedScoreThreshold: "METAGEN_VERIFIED_SCORE_THRESHOLD",
  maxDepthRetries: "METAGEN_MAX_DEPTH_RETRIES",
  generationConcurrency: "METAGEN_GENERATION_CONCURRENCY",
  verificationConcurrency: "METAGEN_VERIFICATION_CONCURRENCY",
  maxFeedbackChars: "METAGEN_MAX_FEEDBACK_CHARS",
  seed: "METAGEN_SEED",
} as const satisfies Record<keyof SearchConfig, string>;

export class SearchConfigError extends Error {
  constructor(readonly issues: readonly z.core.$ZodIssue[]) {
    super(`Invalid search config: ${formatConfigIssues(issues)}`);
    this.name = "SearchConfigError";
  }
}

function formatConfigIssues(issues: readonly z.core.$ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "config";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

export function resolveSearchConfig(input: SearchConfigInput = {}): SearchConfig {
  const parsed = searchConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new SearchConfigError(parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Reads `METAGEN_*` variables. When reading `process.env`, `.env.local` is loaded first.
 * Explicit overrides take precedence over the environment.
 */
export function loadSearchConfigFromEnv({
  env = process.env,
  overrides = {},
}: {
  env?: NodeJS.ProcessEnv;
  overrides?: SearchConfigInput;
} = {}): SearchConfig {
  if (env === process.env) {
    loadLocalEnv();
  }
  const fromEnv: Partial<Record<keyof SearchConfig, number>> = {};
  for (const key of Object.keys(SEARCH_CONFIG_ENV_KEYS) as Array<keyof SearchConfig>) {
    const raw = env[SEARCH_CONFIG_ENV_KEYS[key]]?.trim();
    if (!raw) {
      continue;
    }
    fromEnv[key] = Number(raw);
  }
  return resolveSearchConfig({ ...fromEnv, ...stripUndefined(overrides) });
}

function stripUndefined<T extends object>(value: T): Partial<T> {
  const output: Partial<T> = {};
  for (const key of Object.keys(value) as Array<keyof T>) {
    if (value[key] !== undefined) {
      output[key] = value[key];
    }
  }
  return output;
}
