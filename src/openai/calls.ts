import type OpenAI from "openai";

import type { ChatTurn } from "../generation/types.js";
import { loadLocalEnv } from "../utils/env.js";
import {
  createCallScheduler,
  createOverloadRetryPolicy,
  type CallScheduler,
  type CallSchedulerRunOptions,
} from "../utils/scheduler.js";

import { getOpenAiClient } from "./client.js";

const DEFAULT_SCHEDULER_KEY = "__default__";
const DEFAULT_OPENAI_MAX_PARALLEL_REQUESTS = 8;
const schedulerByModel = new Map<string, CallScheduler>();

function resolveMaxParallelRequests(): number {
  loadLocalEnv();
  const raw = process.env.OPENAI_MAX_PARALLEL_REQUESTS;
  const parsed = raw ? Number.parseInt(raw, 10) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_OPENAI_MAX_PARALLEL_REQUESTS;
}

function getSchedulerForModel(modelId?: string): CallScheduler {
  const normalizedModelId = modelId?.trim();
  const schedulerKey =
    normalizedModelId && normalizedModelId.length > 0 ? normalizedModelId : DEFAULT_SCHEDULER_KEY;
  const existing = schedulerByModel.get(schedulerKey);
  if (existing) {
    return existing;
  }
  const created = createCallScheduler({
    maxParallelRequests: resolveMaxParallelRequests(),
    retry: createOverloadRetryPolicy(),
  });
  schedulerByModel.set(schedulerKey, created);
  return created;
}

export async function runOpenAiCall<T>(
  fn: (client: OpenAI) => Promise<T>,
  modelId?: string,
  runOptions?: CallSchedulerRunOptions,
): Promise<T> {
  return getSchedulerForModel(modelId).run(async () => fn(getOpenAiClient()), runOptions);
}

export type ChatCompletionRequest = {
  readonly model: string;
  readonly messages: readonly ChatTurn[];
  readonly temperature: number;
  readonly maxTokens: number;
  readonly n: number;
};

export type ChatCompletionFn = (
  request: ChatCompletionRequest,
) => Promise<readonly (string | null)[]>;

export function toChatCompletionMessage(turn: ChatTurn): OpenAI.Chat.ChatCompletionMessageParam {
  switch (turn.role) {
    case "system":
      return { role: "system", content: turn.content };
    case "user":
      return { role: "user", content: turn.content };
    case "assistant":
      return { role: "assistant", content: turn.content };
  }
}

/**
 * One chat completion call with `n` choices; choices come back in index order.
 */
export const runChatCompletion: ChatCompletionFn = async (request) => {
  const completion = await runOpenAiCall(
    (client) =>
      client.chat.completions.create({
        model: request.model,
        messages: request.messages.map(toChatCompletionMessage),
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        n: request.n,
      }),
    request.model,
  );
  return [...completion.choices]
    .sort((left, right) => left.index - right.index)
    .map((choice) => choice.message.content ?? null);
};
