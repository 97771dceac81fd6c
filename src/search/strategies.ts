import type { SearchConfigInput } from "../config.js";

import {
  runTreefinement,
  type TreefinementOptions,
  type TreefinementResult,
} from "./treefinement.js";

type LinearStrategyConfig = Omit<SearchConfigInput, "expansionWidth" | "maxIterations">;

export type BestOfNOptions = Omit<TreefinementOptions, "config" | "strategyName"> & {
  readonly n: number;
  readonly config?: LinearStrategyConfig;
};

/**
 * Samples `n` programs once and keeps the best-scoring one: the search without refinement depths.
 */
export async function runBestOfN(options: BestOfNOptions): Promise<TreefinementResult> {
  const { n, config, ...rest } = options;
  return runTreefinement({
    ...rest,
    strategyName: "best_of_n",
    config: { ...config, expansionWidth: n, maxIterations: 0 },
  });
}

export type SelfRepairOptions = Omit<TreefinementOptions, "config" | "strategyName"> & {
  readonly maxRepairs: number;
  readonly config?: LinearStrategyConfig;
};

/**
 * A single chain that feeds verifier diagnostics back until the program verifies.
 */
export async function runSelfRepair(options: SelfRepairOptions): Promise<TreefinementResult> {
  const { maxRepairs, config, ...rest } = options;
  return runTreefinement({
    ...rest,
    strategyName: "self_repair",
    config: { ...config, expansionWidth: 1, maxIterations: maxRepairs },
  });
}
