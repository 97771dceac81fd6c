import { randomBytes } from "node:crypto";

import { resolveSearchConfig, type SearchConfig, type SearchConfigInput } from "../config.js";
import { extractProgram } from "../generation/extract.js";
import {
  DEFAULT_PROGRAM_LANGUAGE,
  buildFeedbackPrompt,
  type FeedbackPromptBuilder,
} from "../generation/prompts.js";
import type { CandidateGenerator, ChatTurn } from "../generation/types.js";
import { normalizeRandom, type RandomSource } from "../utils/random.js";
import { createCallScheduler, toError } from "../utils/scheduler.js";
import type { VerifierAdapter, VerifierReport } from "../verifier/types.js";

import { rebaseResample } from "./rebase.js";
import type { TreefinementExhaustionReason } from "./types.js";
import {
  createSearchTelemetrySession,
  type SearchTelemetrySelection,
  type SearchTelemetrySession,
} from "./telemetry.js";
import {
  appendUserTurn,
  cloneTrajectory,
  createTrajectory,
  extendTrajectory,
  pickBestTrajectory,
  type Trajectory,
} from "./trajectory.js";
import {
  createValueFunction,
  type Evaluation,
  type InvalidEvaluation,
  type InvalidReason,
  type ValueFunction,
} from "./valueFunction.js";

export type TreefinementStats = {
  generationCalls: number;
  programsGenerated: number;
  verifierCalls: number;
  invalidCandidates: number;
  depthRetries: number;
};

export type TreefinementSnapshot = {
  readonly depth: number;
  readonly attempts: number;
  /** Size of the population carried into the next depth; 0 once the search has terminated. */
  readonly populationSize: number;
  readonly survivorCount: number;
  readonly invalidCount: number;
  readonly scores: readonly number[];
  readonly bestScore: number | null;
  readonly stats: TreefinementStats;
};

export type { TreefinementExhaustionReason };

type TreefinementResultBase = {
  readonly runId: string;
  /** Last depth the search completed; 0 is initialization. */
  readonly depth: number;
  readonly bestTrajectory: Trajectory | null;
  readonly snapshots: readonly TreefinementSnapshot[];
  readonly stats: TreefinementStats;
  readonly config: SearchConfig;
};

export type TreefinementVerifiedResult = TreefinementResultBase & {
  readonly status: "verified";
  readonly trajectory: Trajectory;
};

export type TreefinementExhaustedResult = TreefinementResultBase & {
  readonly status: "exhausted";
  readonly reason: TreefinementExhaustionReason;
};

export type TreefinementResult = TreefinementVerifiedResult | TreefinementExhaustedResult;

export type TreefinementOptions = {
  /** Conversation every initial candidate is sampled from, usually system + problem. */
  readonly prompt: readonly ChatTurn[];
  readonly generator: CandidateGenerator;
  readonly verifier: VerifierAdapter;
  readonly config?: SearchConfigInput;
  readonly valueFunction?: ValueFunction;
  readonly language?: string;
  readonly extractProgram?: (text: string) => string | null;
  readonly buildFeedback?: FeedbackPromptBuilder;
  readonly random?: RandomSource;
  /** Checked between depths only; an in-flight depth always completes. */
  readonly signal?: AbortSignal;
  readonly telemetry?: SearchTelemetrySelection;
  readonly onSnapshot?: (snapshot: TreefinementSnapshot) => void | Promise<void>;
  readonly strategyName?: string;
};

type CandidateOutcome =
  | { readonly status: "scored"; readonly trajectory: Trajectory }
  | InvalidEvaluation;

type TerminalState =
  | { readonly status: "verified"; readonly trajectory: Trajectory }
  | { readonly status: "exhausted"; readonly reason: TreefinementExhaustionReason };

type DepthOutcome = {
  readonly survivors: readonly Trajectory[];
  readonly attempts: number;
  readonly invalidCount: number;
};

function randomId(prefix: string): string {
  return `${prefix}_${randomBytes(8).toString("hex")}`;
}

function invalid(reason: InvalidReason, feedback: string): InvalidEvaluation {
  return { status: "invalid", reason, feedback };
}

function createEmptyStats(): TreefinementStats {
  return {
    generationCalls: 0,
    programsGenerated: 0,
    verifierCalls: 0,
    invalidCandidates: 0,
    depthRetries: 0,
  };
}

/**
 * Returns the highest-scoring survivor at or above the threshold; ties keep the lowest index.
 */
function findVerified(survivors: readonly Trajectory[], threshold: number): Trajectory | null {
  return pickBestTrajectory(survivors.filter((trajectory) => trajectory.score >= threshold));
}

export async function runTreefinement(options: TreefinementOptions): Promise<TreefinementResult> {
  const config = resolveSearchConfig(options.config);
  if (options.prompt.length === 0) {
    throw new Error("runTreefinement requires at least one prompt turn.");
  }

  const runId = randomId("search");
  const telemetry = createSearchTelemetrySession({
    telemetry: options.telemetry,
    runId,
    strategy: options.strategyName ?? "treefinement",
  });
  try {
    return await searchInternal(options, config, runId, telemetry);
  } finally {
    await telemetry.flush();
  }
}

async function searchInternal(
  options: TreefinementOptions,
  config: SearchConfig,
  runId: string,
  telemetry: SearchTelemetrySession,
): Promise<TreefinementResult> {
  const startedAtMs = Date.now();
  const width = config.expansionWidth;
  const language = options.language ?? DEFAULT_PROGRAM_LANGUAGE;
  const random = normalizeRandom(options.random, config.seed);
  const valueFunction =
    options.valueFunction ?? createValueFunction({ maxFeedbackChars: config.maxFeedbackChars });
  const extract = options.extractProgram ?? ((text: string) => extractProgram(text, language));
  const buildFeedback = options.buildFeedback ?? buildFeedbackPrompt;
  const generationScheduler = createCallScheduler({
    maxParallelRequests: config.generationConcurrency,
  });
  const verificationScheduler = createCallScheduler({
    maxParallelRequests: config.verificationConcurrency,
  });

  const stats = createEmptyStats();
  const snapshots: TreefinementSnapshot[] = [];
  let bestTrajectory: Trajectory | null = null;

  telemetry.emit({
    type: "search.started",
    expansionWidth: width,
    maxIterations: config.maxIterations,
    rebaseTemperature: config.rebaseTemperature,
    generator: options.generator.name,
    verifier: options.verifier.name,
  });

  async function scoreResponse(
    text: string | null,
    depth: number,
    parent: Trajectory | null,
  ): Promise<CandidateOutcome> {
    if (text === null || text.trim().length === 0) {
      return invalid("no_program", "The generator returned an empty completion.");
    }
    let program: string | null;
    try {
      program = extract(text);
    } catch (error: unknown) {
      return invalid("scoring_failed", toError(error).message);
    }
    if (program === null) {
      return invalid("no_program", "The completion did not contain a fenced code block.");
    }

    stats.verifierCalls += 1;
    let report: VerifierReport;
    try {
      const verifiable = program;
      report = await verificationScheduler.run(() => options.verifier.verify(verifiable));
    } catch (error: unknown) {
      return invalid("verifier_failed", toError(error).message);
    }

    let evaluation: Evaluation;
    try {
      evaluation = valueFunction({ program, report });
    } catch (error: unknown) {
      return invalid("scoring_failed", toError(error).message);
    }
    if (evaluation.status === "invalid") {
      return evaluation;
    }
    if (!Number.isFinite(evaluation.score)) {
      return invalid("scoring_failed", "The value function returned a non-finite score.");
    }
    const extension = { response: text, program, evaluation, depth };
    return {
      status: "scored",
      trajectory: parent
        ? extendTrajectory(parent, extension)
        : createTrajectory(options.prompt, extension),
    };
  }

  async function sampleInitial(): Promise<CandidateOutcome[]> {
    stats.generationCalls += 1;
    let texts: readonly (string | null)[];
    try {
      texts = await generationScheduler.run(() =>
        options.generator.generate({
          messages: options.prompt,
          n: width,
          temperature: config.temperature,
          maxTokens: config.maxTokens,
        }),
      );
    } catch (error: unknown) {
      const message = toError(error).message;
      return Array.from({ length: width }, () => invalid("generation_failed", message));
    }
    const sampled = texts.slice(0, width);
    stats.programsGenerated += sampled.filter((text) => text !== null).length;
    return Promise.all(sampled.map((text) => scoreResponse(text, 0, null)));
  }

  async function refine(
    population: readonly Trajectory[],
    depth: number,
  ): Promise<CandidateOutcome[]> {
    return Promise.all(
      population.map(async (trajectory) => {
        stats.generationCalls += 1;
        let text: string | null;
        try {
          const texts = await generationScheduler.run(() =>
            options.generator.generate({
              messages: trajectory.turns,
              n: 1,
              temperature: config.temperature,
              maxTokens: config.maxTokens,
            }),
          );
          text = texts[0] ?? null;
        } catch (error: unknown) {
          return invalid("generation_failed", toError(error).message);
        }
        if (text !== null) {
          stats.programsGenerated += 1;
        }
        return scoreResponse(text, depth, trajectory);
      }),
    );
  }

  async function runDepth(
    depth: number,
    produce: () => Promise<CandidateOutcome[]>,
  ): Promise<DepthOutcome> {
    const maxAttempts = config.maxDepthRetries + 1;
    let invalidCount = 0;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const outcomes = await produce();
      const survivors: Trajectory[] = [];
      invalidCount = 0;
      outcomes.forEach((outcome, index) => {
        if (outcome.status === "scored") {
          survivors.push(outcome.trajectory);
          return;
        }
        invalidCount += 1;
        stats.invalidCandidates += 1;
        if (telemetry.includeCandidateEvents) {
          telemetry.emit({
            type: "search.candidate.invalid",
            depth,
            attempt,
            index,
            reason: outcome.reason,
            feedback: outcome.feedback,
          });
        }
      });
      if (survivors.length > 0) {
        return { survivors, attempts: attempt, invalidCount };
      }
      if (attempt < maxAttempts) {
        stats.depthRetries += 1;
        telemetry.emit({ type: "search.depth.retry", depth, attempt, invalidCount });
      }
    }
    return { survivors: [], attempts: maxAttempts, invalidCount };
  }

  async function recordDepth(
    depth: number,
    outcome: DepthOutcome,
    populationSize: number,
  ): Promise<void> {
    const scores = outcome.survivors.map((trajectory) => trajectory.score);
    const bestScore = scores.length > 0 ? Math.max(...scores) : null;
    const snapshot: TreefinementSnapshot = {
      depth,
      attempts: outcome.attempts,
      populationSize,
      survivorCount: outcome.survivors.length,
      invalidCount: outcome.invalidCount,
      scores,
      bestScore,
      stats: { ...stats },
    };
    snapshots.push(snapshot);
    telemetry.emit({
      type: "search.depth.completed",
      depth,
      attempts: outcome.attempts,
      survivorCount: outcome.survivors.length,
      invalidCount: outcome.invalidCount,
      bestScore,
    });
    await options.onSnapshot?.(snapshot);
  }

  function finish(depth: number, terminal: TerminalState): TreefinementResult {
    telemetry.emit({
      type: "search.completed",
      status: terminal.status,
      ...(terminal.status === "exhausted" ? { reason: terminal.reason } : {}),
      depth,
      durationMs: Date.now() - startedAtMs,
      ...(bestTrajectory ? { bestScore: bestTrajectory.score } : {}),
    });
    const base: TreefinementResultBase = {
      runId,
      depth,
      bestTrajectory,
      snapshots,
      stats: { ...stats },
      config,
    };
    if (terminal.status === "verified") {
      return { ...base, status: "verified", trajectory: terminal.trajectory };
    }
    return { ...base, status: "exhausted", reason: terminal.reason };
  }

  let population: readonly Trajectory[] = [];
  for (let depth = 0; depth <= config.maxIterations; depth += 1) {
    if (options.signal?.aborted) {
      return finish(Math.max(0, depth - 1), { status: "exhausted", reason: "aborted" });
    }

    const current = population;
    const outcome = await runDepth(depth, () =>
      depth === 0 ? sampleInitial() : refine(current, depth),
    );
    bestTrajectory = pickBestTrajectory([
      ...(bestTrajectory ? [bestTrajectory] : []),
      ...outcome.survivors,
    ]);

    if (outcome.survivors.length === 0) {
      await recordDepth(depth, outcome, 0);
      return finish(depth, { status: "exhausted", reason: "no_viable_candidates" });
    }

    const verified = findVerified(outcome.survivors, config.verifiedScoreThreshold);
    if (verified) {
      await recordDepth(depth, outcome, 0);
      return finish(depth, { status: "verified", trajectory: verified });
    }
    if (depth === config.maxIterations) {
      await recordDepth(depth, outcome, 0);
      return finish(depth, { status: "exhausted", reason: "max_iterations" });
    }

    const selection = rebaseResample(outcome.survivors, {
      width,
      temperature: config.rebaseTemperature,
      random,
      clone: cloneTrajectory,
    });
    if (!selection) {
      throw new Error("REBASE produced no population from a non-empty survivor set.");
    }
    population = selection.population.map((trajectory) =>
      appendUserTurn(
        trajectory,
        buildFeedback({
          program: trajectory.program,
          feedback: trajectory.feedback,
          depth,
          language,
        }),
      ),
    );
    await recordDepth(depth, outcome, population.length);
  }

  // maxIterations >= 0 means the loop always returns from its last depth.
  return finish(config.maxIterations, { status: "exhausted", reason: "max_iterations" });
}
