import { runChatCompletion, type ChatCompletionFn } from "../openai/calls.js";
import { loadLocalEnv } from "../utils/env.js";

import type { CandidateGenerator } from "./types.js";

export type OpenAiCandidateGeneratorOptions = {
  /** Defaults to `METAGEN_MODEL`. */
  readonly model?: string;
  readonly complete?: ChatCompletionFn;
};

function resolveModel(model: string | undefined): string {
  const explicit = model?.trim();
  if (explicit) {
    return explicit;
  }
  loadLocalEnv();
  const fromEnv = process.env.METAGEN_MODEL?.trim();
  if (!fromEnv) {
    throw new Error("A model id is required: pass `model` or set METAGEN_MODEL.");
  }
  return fromEnv;
}

export function createOpenAiCandidateGenerator(
  options: OpenAiCandidateGeneratorOptions = {},
): CandidateGenerator {
  const model = resolveModel(options.model);
  const complete = options.complete ?? runChatCompletion;
  return {
    name: `openai:${model}`,
    generate: async (request) => {
      const texts = await complete({
        model,
        messages: request.messages,
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        n: request.n,
      });
      return texts
        .slice(0, request.n)
        .map((text) => (text !== null && text.trim().length > 0 ? text : null));
    },
  };
}
