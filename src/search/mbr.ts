import { resolveSearchConfig, type SearchConfigInput } from "../config.js";
import { extractProgram } from "../generation/extract.js";
import { DEFAULT_PROGRAM_LANGUAGE } from "../generation/prompts.js";
import type { CandidateGenerator, ChatTurn } from "../generation/types.js";
import { toError } from "../utils/scheduler.js";

export type UtilityFunction = (left: string, right: string) => number;

const TOKEN_PATTERN = /\w+|[^\s\w]/gu;

export function tokenize(program: string): Set<string> {
  return new Set(program.match(TOKEN_PATTERN) ?? []);
}

/**
 * Jaccard similarity of the two programs' token sets; two empty programs are identical.
 */
export function lexicalSimilarity(left: string, right: string): number {
  const leftTokens = tokenize(left);
  const rightTokens = tokenize(right);
  if (leftTokens.size === 0 && rightTokens.size === 0) {
    return 1;
  }
  let shared = 0;
  for (const token of leftTokens) {
    if (rightTokens.has(token)) {
      shared += 1;
    }
  }
  return shared / (leftTokens.size + rightTokens.size - shared);
}

export type MinimumBayesRiskSelection = {
  readonly index: number;
  readonly expectedUtilities: readonly number[];
};

/**
 * Picks the candidate with the highest mean utility against every other candidate.
 * Ties keep the earliest candidate.
 */
export function selectMinimumBayesRisk(
  candidates: readonly string[],
  utility: UtilityFunction = lexicalSimilarity,
): MinimumBayesRiskSelection | null {
  if (candidates.length === 0) {
    return null;
  }
  const expectedUtilities = candidates.map((candidate, index) => {
    if (candidates.length === 1) {
      return 0;
    }
    let total = 0;
    candidates.forEach((other, otherIndex) => {
      if (otherIndex !== index) {
        total += utility(candidate, other);
      }
    });
    return total / (candidates.length - 1);
  });

  let bestIndex = 0;
  expectedUtilities.forEach((value, index) => {
    if (value > (expectedUtilities[bestIndex] ?? Number.NEGATIVE_INFINITY)) {
      bestIndex = index;
    }
  });
  return { index: bestIndex, expectedUtilities };
}

export type MinimumBayesRiskOptions = {
  readonly prompt: readonly ChatTurn[];
  readonly generator: CandidateGenerator;
  readonly n: number;
  readonly config?: Pick<SearchConfigInput, "temperature" | "maxTokens">;
  readonly language?: string;
  readonly utility?: UtilityFunction;
  readonly extractProgram?: (text: string) => string | null;
};

export type MinimumBayesRiskResult =
  | {
      readonly status: "selected";
      readonly program: string;
      readonly candidates: readonly string[];
      readonly expectedUtilities: readonly number[];
    }
  | {
      readonly status: "empty";
      readonly reason: "generation_failed" | "no_program";
      readonly message: string;
    };

export async function runMinimumBayesRisk(
  options: MinimumBayesRiskOptions,
): Promise<MinimumBayesRiskResult> {
  const config = resolveSearchConfig(options.config);
  const n = Math.max(1, Math.floor(options.n));
  const language = options.language ?? DEFAULT_PROGRAM_LANGUAGE;
  const extract = options.extractProgram ?? ((text: string) => extractProgram(text, language));

  let texts: readonly (string | null)[];
  try {
    texts = await options.generator.generate({
      messages: options.prompt,
      n,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
    });
  } catch (error: unknown) {
    return { status: "empty", reason: "generation_failed", message: toError(error).message };
  }

  const candidates: string[] = [];
  for (const text of texts.slice(0, n)) {
    const program = text === null ? null : extract(text);
    if (program !== null) {
      candidates.push(program);
    }
  }

  const selection = selectMinimumBayesRisk(candidates, options.utility);
  const program = selection ? candidates[selection.index] : undefined;
  if (!selection || program === undefined) {
    return {
      status: "empty",
      reason: "no_program",
      message: `None of the ${texts.length} completions contained a program.`,
    };
  }
  return {
    status: "selected",
    program,
    candidates,
    expectedUtilities: selection.expectedUtilities,
  };
}
