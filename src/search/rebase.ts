import type { RandomSource } from "../utils/random.js";

/**
 * `softmax(score / temperature)`, shifted by the maximum score for stability.
 * A temperature of 0 (or below) is the limit case: uniform over the top scores.
 */
export function rebaseProbabilities(scores: readonly number[], temperature: number): number[] {
  if (scores.length === 0) {
    return [];
  }
  const maxScore = Math.max(...scores);
  const weights =
    temperature > 0
      ? scores.map((score) => Math.exp((score - maxScore) / temperature))
      : scores.map((score) => (score === maxScore ? 1 : 0));
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  return weights.map((weight) => weight / total);
}

export function pickIndexByWeights(weights: readonly number[], random: RandomSource): number {
  let total = 0;
  let lastPositive = -1;
  for (let index = 0; index < weights.length; index += 1) {
    const weight = weights[index] ?? 0;
    if (Number.isFinite(weight) && weight > 0) {
      total += weight;
      lastPositive = index;
    }
  }
  if (lastPositive < 0) {
    throw new Error("Cannot pick from weights that are all zero.");
  }

  let threshold = random() * total;
  for (let index = 0; index < weights.length; index += 1) {
    const weight = weights[index] ?? 0;
    if (!Number.isFinite(weight) || weight <= 0) {
      continue;
    }
    threshold -= weight;
    if (threshold < 0) {
      return index;
    }
  }
  return lastPositive;
}

export type RebaseResampleOptions<T> = {
  readonly width: number;
  readonly temperature: number;
  readonly random: RandomSource;
  readonly clone?: (value: T) => T;
};

export type RebaseSelection<T> = {
  readonly population: readonly T[];
  /** Survivor index behind each slot of `population`. */
  readonly selectedIndices: readonly number[];
  readonly probabilities: readonly number[];
};

/**
 * Draws `width` slots with replacement, each slot an independent copy of its survivor.
 * Returns `null` when there is nothing to draw from.
 */
export function rebaseResample<T extends { readonly score: number }>(
  survivors: readonly T[],
  options: RebaseResampleOptions<T>,
): RebaseSelection<T> | null {
  if (survivors.length === 0) {
    return null;
  }
  const clone = options.clone ?? ((value: T) => structuredClone(value));
  const probabilities = rebaseProbabilities(
    survivors.map((survivor) => survivor.score),
    options.temperature,
  );

  const population: T[] = [];
  const selectedIndices: number[] = [];
  for (let slot = 0; slot < options.width; slot += 1) {
    const index = pickIndexByWeights(probabilities, options.random);
    const survivor = survivors[index];
    if (survivor === undefined) {
      throw new Error(`REBASE picked missing survivor ${index}.`);
    }
    selectedIndices.push(index);
    population.push(clone(survivor));
  }
  return { population, selectedIndices, probabilities };
}
