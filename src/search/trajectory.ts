import type { ChatTurn } from "../generation/types.js";

import type { ScoredEvaluation } from "./valueFunction.js";

export type TrajectoryStep = {
  readonly depth: number;
  readonly program: string;
  readonly feedback: string;
  readonly score: number;
  readonly verdict: ScoredEvaluation["verdict"];
};

/**
 * One candidate's conversation so far. Values are never mutated in place: extending a
 * trajectory returns a new one, and branches are deep copies.
 */
export type Trajectory = {
  readonly turns: readonly ChatTurn[];
  readonly program: string;
  readonly feedback: string;
  readonly score: number;
  readonly verdict: ScoredEvaluation["verdict"];
  readonly depth: number;
  readonly steps: readonly TrajectoryStep[];
};

export type TrajectoryExtension = {
  readonly response: string;
  readonly program: string;
  readonly evaluation: ScoredEvaluation;
  readonly depth: number;
};

function toStep(extension: TrajectoryExtension): TrajectoryStep {
  return {
    depth: extension.depth,
    program: extension.program,
    feedback: extension.evaluation.feedback,
    score: extension.evaluation.score,
    verdict: extension.evaluation.verdict,
  };
}

export function createTrajectory(
  promptTurns: readonly ChatTurn[],
  extension: TrajectoryExtension,
): Trajectory {
  return {
    turns: [...promptTurns, { role: "assistant", content: extension.response }],
    program: extension.program,
    feedback: extension.evaluation.feedback,
    score: extension.evaluation.score,
    verdict: extension.evaluation.verdict,
    depth: extension.depth,
    steps: [toStep(extension)],
  };
}

export function extendTrajectory(parent: Trajectory, extension: TrajectoryExtension): Trajectory {
  return {
    turns: [...parent.turns, { role: "assistant", content: extension.response }],
    program: extension.program,
    feedback: extension.evaluation.feedback,
    score: extension.evaluation.score,
    verdict: extension.evaluation.verdict,
    depth: extension.depth,
    steps: [...parent.steps, toStep(extension)],
  };
}

export function appendUserTurn(trajectory: Trajectory, content: string): Trajectory {
  return {
    ...trajectory,
    turns: [...trajectory.turns, { role: "user", content }],
  };
}

export function cloneTrajectory(trajectory: Trajectory): Trajectory {
  return structuredClone(trajectory);
}

/**
 * Highest score wins; ties keep the earliest entry.
 */
export function pickBestTrajectory(trajectories: readonly Trajectory[]): Trajectory | null {
  let best: Trajectory | null = null;
  for (const trajectory of trajectories) {
    if (!best || trajectory.score > best.score) {
      best = trajectory;
    }
  }
  return best;
}
