import OpenAI from "openai";
import { Agent, fetch as undiciFetch } from "undici";

import { loadLocalEnv } from "../utils/env.js";

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_OPENAI_TIMEOUT_MS = 15 * 60_000;

let cachedClient: OpenAI | null = null;
let cachedFetch: typeof fetch | null = null;
let cachedTimeoutMs: number | null = null;

function resolveOpenAiTimeoutMs(): number {
  if (cachedTimeoutMs !== null) {
    return cachedTimeoutMs;
  }

  loadLocalEnv();
  const raw = process.env.OPENAI_TIMEOUT_MS;
  const parsed = raw ? Number(raw) : Number.NaN;
  cachedTimeoutMs = Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_OPENAI_TIMEOUT_MS;
  return cachedTimeoutMs;
}

/**
 * `OPENAI_BASE_URL` points the client at any OpenAI-compatible server (vLLM, a proxy, ...).
 */
function resolveOpenAiBaseUrl(): string {
  loadLocalEnv();
  const raw = process.env.OPENAI_BASE_URL?.trim();
  return raw && raw.length > 0 ? raw : DEFAULT_OPENAI_BASE_URL;
}

function resolveOpenAiApiKey(): string {
  loadLocalEnv();
  const value = process.env.OPENAI_API_KEY?.trim();
  if (!value) {
    throw new Error("OPENAI_API_KEY must be provided to access the completion API.");
  }
  return value;
}

function getOpenAiFetch(): typeof fetch {
  if (cachedFetch) {
    return cachedFetch;
  }

  // Long generations outlive undici's default header/body timeouts.
  const timeoutMs = resolveOpenAiTimeoutMs();
  const dispatcher = new Agent({
    bodyTimeout: timeoutMs,
    headersTimeout: timeoutMs,
  });
  cachedFetch = ((input: any, init?: any) => {
    return undiciFetch(input, {
      ...(init ?? {}),
      dispatcher,
    });
  }) as typeof fetch;

  return cachedFetch;
}

export function getOpenAiClient(): OpenAI {
  if (cachedClient) {
    return cachedClient;
  }

  cachedClient = new OpenAI({
    apiKey: resolveOpenAiApiKey(),
    baseURL: resolveOpenAiBaseUrl(),
    timeout: resolveOpenAiTimeoutMs(),
    fetch: getOpenAiFetch(),
    // Retries happen in the call scheduler.
    maxRetries: 0,
  });
  return cachedClient;
}
