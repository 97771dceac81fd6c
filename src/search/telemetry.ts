import type { TreefinementExhaustionReason } from "./types.js";
import type { InvalidReason } from "./valueFunction.js";

type SearchTelemetryBaseEvent = {
  readonly timestamp: string;
  readonly runId: string;
  readonly strategy: string;
};

export type SearchStartedTelemetryEvent = SearchTelemetryBaseEvent & {
  readonly type: "search.started";
  readonly expansionWidth: number;
  readonly maxIterations: number;
  readonly rebaseTemperature: number;
  readonly generator: string;
  readonly verifier: string;
};

export type SearchCandidateInvalidTelemetryEvent = SearchTelemetryBaseEvent & {
  readonly type: "search.candidate.invalid";
  readonly depth: number;
  readonly attempt: number;
  readonly index: number;
  readonly reason: InvalidReason;
  readonly feedback: string;
};

export type SearchDepthRetryTelemetryEvent = SearchTelemetryBaseEvent & {
  readonly type: "search.depth.retry";
  readonly depth: number;
  readonly attempt: number;
  readonly invalidCount: number;
};

export type SearchDepthCompletedTelemetryEvent = SearchTelemetryBaseEvent & {
  readonly type: "search.depth.completed";
  readonly depth: number;
  readonly attempts: number;
  readonly survivorCount: number;
  readonly invalidCount: number;
  readonly bestScore: number | null;
};

export type SearchCompletedTelemetryEvent = SearchTelemetryBaseEvent & {
  readonly type: "search.completed";
  readonly status: "verified" | "exhausted";
  readonly reason?: TreefinementExhaustionReason;
  readonly depth: number;
  readonly durationMs: number;
  readonly bestScore?: number;
};

export type SearchTelemetryEvent =
  | SearchStartedTelemetryEvent
  | SearchCandidateInvalidTelemetryEvent
  | SearchDepthRetryTelemetryEvent
  | SearchDepthCompletedTelemetryEvent
  | SearchCompletedTelemetryEvent;

export type SearchTelemetrySink = {
  readonly emit: (event: SearchTelemetryEvent) => void | Promise<void>;
  readonly flush?: () => void | Promise<void>;
};

export type SearchTelemetryConfig = {
  readonly sink: SearchTelemetrySink;
  readonly includeCandidateEvents?: boolean;
};

export type SearchTelemetrySelection = SearchTelemetrySink | SearchTelemetryConfig;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type SearchTelemetryEventPayload = DistributiveOmit<
  SearchTelemetryEvent,
  keyof SearchTelemetryBaseEvent
>;

export type SearchTelemetrySession = {
  readonly includeCandidateEvents: boolean;
  readonly emit: (event: SearchTelemetryEventPayload) => void;
  readonly flush: () => Promise<void>;
};

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    typeof (value as { then?: unknown }).then === "function"
  );
}

function isSearchTelemetrySink(value: unknown): value is SearchTelemetrySink {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof (value as { emit?: unknown }).emit === "function"
  );
}

function resolveTelemetrySelection(
  telemetry: SearchTelemetrySelection | undefined,
): SearchTelemetryConfig | undefined {
  if (!telemetry) {
    return undefined;
  }
  if (isSearchTelemetrySink(telemetry)) {
    return { sink: telemetry };
  }
  if (isSearchTelemetrySink(telemetry.sink)) {
    return telemetry;
  }
  throw new Error("Invalid search telemetry config: expected a sink with emit(event).");
}

export function createSearchTelemetrySession(params: {
  readonly telemetry: SearchTelemetrySelection | undefined;
  readonly runId: string;
  readonly strategy: string;
}): SearchTelemetrySession {
  const config = resolveTelemetrySelection(params.telemetry);
  const pending = new Set<Promise<void>>();

  const emit = (payload: SearchTelemetryEventPayload): void => {
    if (!config) {
      return;
    }
    const event: SearchTelemetryEvent = {
      ...payload,
      timestamp: new Date().toISOString(),
      runId: params.runId,
      strategy: params.strategy,
    };
    try {
      const output = config.sink.emit(event);
      if (isPromiseLike(output)) {
        const task = Promise.resolve(output).then(
          () => undefined,
          () => undefined,
        );
        pending.add(task);
        void task.finally(() => {
          pending.delete(task);
        });
      }
    } catch {
      // Telemetry failures must never break the search.
    }
  };

  const flush = async (): Promise<void> => {
    while (pending.size > 0) {
      await Promise.allSettled([...pending]);
    }
    if (!config || typeof config.sink.flush !== "function") {
      return;
    }
    try {
      await config.sink.flush();
    } catch {
      // Telemetry failures must never break the search.
    }
  };

  return {
    includeCandidateEvents: config?.includeCandidateEvents === true,
    emit,
    flush,
  };
}
