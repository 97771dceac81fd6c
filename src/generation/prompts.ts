import type { ChatTurn } from "./types.js";

export const DEFAULT_PROGRAM_LANGUAGE = "dafny";

export function buildDefaultSystemPrompt(language: string = DEFAULT_PROGRAM_LANGUAGE): string {
  return [
    `You are an expert ${language} programmer who writes formally verified code.`,
    "Include every specification, invariant and lemma the verifier needs.",
    `Reply with the complete program in a single \`\`\`${language} code block.`,
  ].join(" ");
}

export function buildInitialTurns({
  problem,
  systemPrompt,
  language = DEFAULT_PROGRAM_LANGUAGE,
}: {
  problem: string;
  systemPrompt?: string;
  language?: string;
}): ChatTurn[] {
  const trimmed = problem.trim();
  if (!trimmed) {
    throw new Error("Problem statement must be non-empty.");
  }
  return [
    { role: "system", content: systemPrompt ?? buildDefaultSystemPrompt(language) },
    { role: "user", content: trimmed },
  ];
}

export type FeedbackPromptInput = {
  readonly program: string;
  readonly feedback: string;
  readonly depth: number;
  readonly language: string;
};

export type FeedbackPromptBuilder = (input: FeedbackPromptInput) => string;

/**
 * Quotes the diagnostics for the last program; `depth` is the depth that produced it.
 */
export const buildFeedbackPrompt: FeedbackPromptBuilder = ({ feedback, depth, language }) => {
  const diagnostics = feedback.trim() || "The verifier reported errors but printed no details.";
  return [
    `The verifier reported problems with your last ${language} program (attempt ${depth + 1}):`,
    "",
    "```",
    diagnostics,
    "```",
    "",
    `Fix the program and reply with the complete corrected program in a single \`\`\`${language} code block.`,
  ].join("\n");
};
