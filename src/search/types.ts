export type TreefinementExhaustionReason = "max_iterations" | "no_viable_candidates" | "aborted";
