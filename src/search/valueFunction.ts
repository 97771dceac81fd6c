import type { VerifierReport, VerifierVerdict } from "../verifier/types.js";

export type InvalidReason =
  | "no_program"
  | "generation_failed"
  | "verifier_failed"
  | "scoring_failed"
  | "unparsable";

export type ScoredEvaluation = {
  readonly status: "scored";
  readonly score: number;
  readonly verdict: Exclude<VerifierVerdict, "invalid">;
  readonly feedback: string;
};

export type InvalidEvaluation = {
  readonly status: "invalid";
  readonly reason: InvalidReason;
  readonly feedback: string;
};

export type Evaluation = ScoredEvaluation | InvalidEvaluation;

export type ValueFunctionInput = {
  readonly program: string;
  readonly report: VerifierReport;
};

export type ValueFunction = (input: ValueFunctionInput) => Evaluation;

export const VERIFIED_SCORE = 1;
export const DEFAULT_MAX_FEEDBACK_CHARS = 4000;

const ERROR_LINE_PATTERN = /\berror\b/iu;

function countErrorLines(diagnostics: string): number {
  let count = 0;
  for (const line of diagnostics.split("\n")) {
    if (ERROR_LINE_PATTERN.test(line)) {
      count += 1;
    }
  }
  return count;
}

export function formatFeedback(diagnostics: string, maxChars: number): string {
  const normalized = diagnostics
    .replace(/\r\n?/gu, "\n")
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .replace(/\n{3,}/gu, "\n\n")
    .trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  const omitted = normalized.length - maxChars;
  return `${normalized.slice(0, maxChars).trimEnd()}\n[truncated ${omitted} characters]`;
}

/**
 * Blends the verified share of proof obligations with an inverse failure count.
 * Only a `verified` verdict reaches 1; `invalid` has no score.
 */
export function scoreVerifierReport(report: VerifierReport): number | null {
  if (report.verdict === "invalid") {
    return null;
  }
  if (report.verdict === "verified") {
    return VERIFIED_SCORE;
  }
  const failed = Math.max(1, report.obligations?.failed ?? countErrorLines(report.diagnostics));
  const verified = Math.max(0, report.obligations?.verified ?? 0);
  const verifiedShare = verified / (verified + failed);
  return 0.5 * verifiedShare + 0.5 / (1 + failed);
}

export function createValueFunction({
  maxFeedbackChars = DEFAULT_MAX_FEEDBACK_CHARS,
}: { maxFeedbackChars?: number } = {}): ValueFunction {
  return ({ report }) => {
    const feedback = formatFeedback(report.diagnostics, maxFeedbackChars);
    const score = scoreVerifierReport(report);
    if (score === null || report.verdict === "invalid") {
      return { status: "invalid", reason: "unparsable", feedback };
    }
    return { status: "scored", score, verdict: report.verdict, feedback };
  };
}
