import { describe, expect, it } from "vitest";

import {
  buildFeedbackPrompt,
  buildInitialTurns,
  createValueFunction,
  extractProgram,
  runTreefinement,
  SearchConfigError,
  type CandidateGenerator,
  type GenerationRequest,
  type SearchTelemetryEvent,
  type SearchTelemetrySink,
  type ValueFunction,
  type VerifierAdapter,
  type VerifierReport,
} from "../src/index.js";

const PROMPT = buildInitialTurns({ problem: "Implement Abs." });

function fence(program: string): string {
  return `Here you go:\n\`\`\`dafny\n${program}\n\`\`\``;
}

function checked(verified: number, failed: number, diagnostics = "Error: failed"): VerifierReport {
  return { verdict: "checked", diagnostics, obligations: { verified, failed } };
}

const VERIFIED: VerifierReport = {
  verdict: "verified",
  diagnostics: "Dafny program verifier finished with 2 verified, 0 errors",
  obligations: { verified: 2, failed: 0 },
};

type Responder = (request: GenerationRequest, call: number) => readonly (string | null)[];

function scriptedGenerator(respond: Responder): {
  generator: CandidateGenerator;
  requests: GenerationRequest[];
} {
  const requests: GenerationRequest[] = [];
  return {
    requests,
    generator: {
      name: "scripted",
      generate: async (request) => {
        requests.push(request);
        return respond(request, requests.length);
      },
    },
  };
}

function tableVerifier(table: Record<string, VerifierReport>): VerifierAdapter {
  return {
    name: "table",
    verify: async (program) => {
      const report = table[program];
      if (!report) {
        throw new Error(`Unexpected program: ${program}`);
      }
      return report;
    },
  };
}

function collectInto(events: SearchTelemetryEvent[]): SearchTelemetrySink {
  return {
    emit: (event) => {
      events.push(event);
    },
  };
}

function isInitial(request: GenerationRequest): boolean {
  return request.messages.length === PROMPT.length;
}

describe("runTreefinement", () => {
  it("stops at initialization when a sample verifies", async () => {
    const { generator, requests } = scriptedGenerator(() => [
      fence("method A() {}"),
      fence("method B() {}"),
      fence("method C() {}"),
    ]);
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({
        "method A() {}": checked(1, 1),
        "method B() {}": VERIFIED,
        "method C() {}": checked(0, 2),
      }),
      config: { expansionWidth: 3 },
    });

    expect(result.status).toBe("verified");
    if (result.status !== "verified") {
      return;
    }
    expect(result.depth).toBe(0);
    expect(result.trajectory.program).toBe("method B() {}");
    expect(result.trajectory.score).toBe(1);
    expect(result.bestTrajectory).toBe(result.trajectory);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.n).toBe(3);
    expect(requests[0]?.temperature).toBe(0.8);
    expect(result.stats).toEqual({
      generationCalls: 1,
      programsGenerated: 3,
      verifierCalls: 3,
      invalidCandidates: 0,
      depthRetries: 0,
    });
    expect(result.snapshots).toHaveLength(1);
    expect(result.snapshots[0]?.populationSize).toBe(0);
    expect(result.snapshots[0]?.scores).toEqual([0.5, 1, 0.5 / 3]);
  });

  it("keeps the earliest of several verified samples", async () => {
    const { generator } = scriptedGenerator(() => [fence("method X() {}"), fence("method Y() {}")]);
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({ "method X() {}": VERIFIED, "method Y() {}": VERIFIED }),
      config: { expansionWidth: 2 },
    });
    expect(result.status === "verified" ? result.trajectory.program : null).toBe("method X() {}");
  });

  it("refines resampled trajectories with verifier feedback", async () => {
    const diagnostics = "program.dfy(3,4): Error: postcondition might not hold";
    const { generator, requests } = scriptedGenerator((request) =>
      isInitial(request)
        ? [fence("method A() {}"), fence("method B() {}")]
        : [fence("method A2() {}")],
    );
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({
        "method A() {}": checked(3, 1, diagnostics),
        "method B() {}": checked(1, 1),
        "method A2() {}": VERIFIED,
      }),
      config: { expansionWidth: 2, maxIterations: 3 },
      random: () => 0,
    });

    expect(result.status).toBe("verified");
    if (result.status !== "verified") {
      return;
    }
    expect(result.depth).toBe(1);
    expect(result.trajectory.steps.map((step) => step.program)).toEqual([
      "method A() {}",
      "method A2() {}",
    ]);
    expect(result.trajectory.turns.map((turn) => turn.role)).toEqual([
      "system",
      "user",
      "assistant",
      "user",
      "assistant",
    ]);
    expect(result.trajectory.turns[3]?.content).toBe(
      buildFeedbackPrompt({
        program: "method A() {}",
        feedback: diagnostics,
        depth: 0,
        language: "dafny",
      }),
    );

    expect(requests).toHaveLength(3);
    expect(requests.slice(1).map((request) => request.n)).toEqual([1, 1]);
    expect(requests.slice(1).map((request) => request.messages.length)).toEqual([4, 4]);
    expect(result.snapshots.map((snapshot) => snapshot.populationSize)).toEqual([2, 0]);
    expect(result.stats.generationCalls).toBe(3);
  });

  it("drops invalid candidates before resampling", async () => {
    const events: SearchTelemetryEvent[] = [];
    const { generator } = scriptedGenerator(() => [
      "I could not write this one.",
      fence("method Bad("),
      fence("method A() {}"),
    ]);
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({
        "method Bad(": {
          verdict: "invalid",
          diagnostics: "1 parse errors detected in program.dfy",
        },
        "method A() {}": checked(3, 1),
      }),
      config: { expansionWidth: 3, maxIterations: 0 },
      telemetry: { sink: collectInto(events), includeCandidateEvents: true },
    });

    expect(result.status).toBe("exhausted");
    expect(result.status === "exhausted" ? result.reason : null).toBe("max_iterations");
    expect(result.bestTrajectory?.program).toBe("method A() {}");
    expect(result.bestTrajectory?.score).toBe(0.625);
    expect(result.stats.invalidCandidates).toBe(2);
    expect(result.stats.verifierCalls).toBe(2);
    expect(result.snapshots[0]?.survivorCount).toBe(1);
    expect(result.snapshots[0]?.invalidCount).toBe(2);

    expect(events.map((event) => event.type)).toEqual([
      "search.started",
      "search.candidate.invalid",
      "search.candidate.invalid",
      "search.depth.completed",
      "search.completed",
    ]);
    const invalidReasons = events.flatMap((event) =>
      event.type === "search.candidate.invalid" ? [event.reason] : [],
    );
    expect(invalidReasons).toEqual(["no_program", "unparsable"]);
    expect(events.every((event) => event.runId === result.runId)).toBe(true);
    expect(events.every((event) => event.strategy === "treefinement")).toBe(true);
  });

  it("retries a depth without survivors and then gives up", async () => {
    const events: SearchTelemetryEvent[] = [];
    const { generator, requests } = scriptedGenerator(() => [null, "no code block"]);
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({}),
      config: { expansionWidth: 2, maxDepthRetries: 2 },
      telemetry: collectInto(events),
    });

    expect(result.status).toBe("exhausted");
    expect(result.status === "exhausted" ? result.reason : null).toBe("no_viable_candidates");
    expect(result.depth).toBe(0);
    expect(result.bestTrajectory).toBeNull();
    expect(requests).toHaveLength(3);
    expect(result.stats).toEqual({
      generationCalls: 3,
      programsGenerated: 3,
      verifierCalls: 0,
      invalidCandidates: 6,
      depthRetries: 2,
    });
    expect(result.snapshots).toEqual([
      {
        depth: 0,
        attempts: 3,
        populationSize: 0,
        survivorCount: 0,
        invalidCount: 2,
        scores: [],
        bestScore: null,
        stats: result.stats,
      },
    ]);
    expect(events.filter((event) => event.type === "search.depth.retry")).toHaveLength(2);
    expect(events.some((event) => event.type === "search.candidate.invalid")).toBe(false);
  });

  it("recovers when a retry produces survivors", async () => {
    const { generator } = scriptedGenerator((_request, call) =>
      call === 1 ? [null] : [fence("method A() {}")],
    );
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({ "method A() {}": VERIFIED }),
      config: { expansionWidth: 1 },
    });
    expect(result.status).toBe("verified");
    expect(result.snapshots[0]?.attempts).toBe(2);
    expect(result.stats.depthRetries).toBe(1);
  });

  it("returns the best trajectory once the depth budget runs out", async () => {
    const { generator } = scriptedGenerator((request) =>
      isInitial(request)
        ? [fence("method A() {}"), fence("method B() {}")]
        : [fence("method C() {}")],
    );
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({
        "method A() {}": checked(3, 1),
        "method B() {}": checked(1, 3),
        "method C() {}": checked(1, 1),
      }),
      config: { expansionWidth: 2, maxIterations: 2, seed: 7 },
    });

    expect(result.status).toBe("exhausted");
    expect(result.status === "exhausted" ? result.reason : null).toBe("max_iterations");
    expect(result.depth).toBe(2);
    expect(result.bestTrajectory?.program).toBe("method A() {}");
    expect(result.bestTrajectory?.score).toBe(0.625);
    expect(result.snapshots.map((snapshot) => snapshot.depth)).toEqual([0, 1, 2]);
    expect(result.snapshots.map((snapshot) => snapshot.populationSize)).toEqual([2, 2, 0]);
    expect(result.snapshots.map((snapshot) => snapshot.bestScore)).toEqual([0.625, 0.5, 0.5]);
    expect(result.stats.generationCalls).toBe(5);
  });

  it("stops between depths once aborted", async () => {
    const controller = new AbortController();
    const { generator, requests } = scriptedGenerator(() => [fence("method A() {}")]);
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({ "method A() {}": checked(1, 1) }),
      config: { expansionWidth: 1, maxIterations: 5 },
      signal: controller.signal,
      onSnapshot: () => {
        controller.abort();
      },
    });

    expect(result.status === "exhausted" ? result.reason : null).toBe("aborted");
    expect(result.depth).toBe(0);
    expect(result.snapshots).toHaveLength(1);
    expect(result.bestTrajectory?.program).toBe("method A() {}");
    expect(requests).toHaveLength(1);
  });

  it("does nothing with a signal that is already aborted", async () => {
    const { generator, requests } = scriptedGenerator(() => [fence("method A() {}")]);
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({}),
      signal: AbortSignal.abort(),
    });
    expect(result.status === "exhausted" ? result.reason : null).toBe("aborted");
    expect(result.bestTrajectory).toBeNull();
    expect(requests).toHaveLength(0);
  });

  it("treats generator and verifier failures as invalid candidates", async () => {
    const events: SearchTelemetryEvent[] = [];
    let calls = 0;
    const generator: CandidateGenerator = {
      name: "flaky",
      generate: async () => {
        calls += 1;
        if (calls === 1) {
          throw new Error("upstream 500");
        }
        return [fence("method Boom() {}"), fence("method A() {}")];
      },
    };
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({ "method A() {}": VERIFIED }),
      config: { expansionWidth: 2 },
      telemetry: { sink: collectInto(events), includeCandidateEvents: true },
    });

    expect(result.status).toBe("verified");
    const invalid = events.flatMap((event) =>
      event.type === "search.candidate.invalid"
        ? [`${event.attempt}:${event.index}:${event.reason}:${event.feedback}`]
        : [],
    );
    expect(invalid).toEqual([
      "1:0:generation_failed:upstream 500",
      "1:1:generation_failed:upstream 500",
      "2:0:verifier_failed:Unexpected program: method Boom() {}",
    ]);
  });

  it("bounds concurrent verifier calls", async () => {
    let active = 0;
    let maxActive = 0;
    const verifier: VerifierAdapter = {
      name: "slow",
      verify: async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await new Promise<void>((resolve) => {
          setTimeout(resolve, 2);
        });
        active -= 1;
        return checked(1, 1);
      },
    };
    const { generator } = scriptedGenerator(() => [
      fence("method A() {}"),
      fence("method B() {}"),
      fence("method C() {}"),
      fence("method D() {}"),
    ]);
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier,
      config: { expansionWidth: 4, maxIterations: 0, verificationConcurrency: 1 },
    });

    expect(result.stats.verifierCalls).toBe(4);
    expect(maxActive).toBe(1);
  });

  it("keeps going when the telemetry sink throws", async () => {
    const { generator } = scriptedGenerator(() => [fence("method A() {}")]);
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({ "method A() {}": VERIFIED }),
      config: { expansionWidth: 1 },
      telemetry: {
        emit: () => {
          throw new Error("sink down");
        },
      },
    });
    expect(result.status).toBe("verified");
  });

  it("demotes a candidate whose scoring throws", async () => {
    const events: SearchTelemetryEvent[] = [];
    const baseValueFunction = createValueFunction();
    const valueFunction: ValueFunction = (input) => {
      if (input.program === "method A() {}") {
        throw new Error("scorer crashed");
      }
      return baseValueFunction(input);
    };
    const { generator } = scriptedGenerator(() => [
      fence("method A() {}"),
      fence("method B() {}"),
    ]);
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({
        "method A() {}": checked(1, 1),
        "method B() {}": checked(3, 1),
      }),
      valueFunction,
      config: { expansionWidth: 2, maxIterations: 0 },
      telemetry: { sink: collectInto(events), includeCandidateEvents: true },
    });

    expect(result.status === "exhausted" ? result.reason : null).toBe("max_iterations");
    expect(result.bestTrajectory?.program).toBe("method B() {}");
    expect(result.snapshots[0]?.invalidCount).toBe(1);
    const invalid = events.flatMap((event) =>
      event.type === "search.candidate.invalid"
        ? [`${event.index}:${event.reason}:${event.feedback}`]
        : [],
    );
    expect(invalid).toEqual(["0:scoring_failed:scorer crashed"]);
  });

  it("demotes a candidate whose extraction throws", async () => {
    const { generator } = scriptedGenerator(() => ["explode", fence("method B() {}")]);
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({ "method B() {}": VERIFIED }),
      extractProgram: (text) => {
        if (text === "explode") {
          throw new Error("extractor crashed");
        }
        return extractProgram(text, "dafny");
      },
      config: { expansionWidth: 2 },
    });

    expect(result.status === "verified" ? result.trajectory.program : null).toBe("method B() {}");
    expect(result.stats.invalidCandidates).toBe(1);
    expect(result.stats.verifierCalls).toBe(1);
  });

  it("drops candidates with a non-finite score", async () => {
    const baseValueFunction = createValueFunction();
    const valueFunction: ValueFunction = (input) =>
      input.program === "method A() {}"
        ? { status: "scored", score: Number.NaN, verdict: "checked", feedback: "" }
        : baseValueFunction(input);
    const { generator } = scriptedGenerator((request) =>
      isInitial(request)
        ? [fence("method A() {}"), fence("method B() {}")]
        : [fence("method C() {}")],
    );
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({
        "method A() {}": checked(1, 1),
        "method B() {}": checked(3, 1),
        "method C() {}": VERIFIED,
      }),
      valueFunction,
      config: { expansionWidth: 2, maxIterations: 2, seed: 3 },
    });

    expect(result.status).toBe("verified");
    expect(result.depth).toBe(1);
    expect(result.snapshots[0]?.scores).toEqual([0.625]);
    expect(result.snapshots[0]?.invalidCount).toBe(1);
    expect(result.bestTrajectory?.steps.map((step) => step.program)).toEqual([
      "method B() {}",
      "method C() {}",
    ]);
  });

  it("retries a refinement depth from the same population", async () => {
    const { generator, requests } = scriptedGenerator((_request, call) => {
      if (call === 1) {
        return [fence("method A() {}")];
      }
      return call === 2 ? [null] : [fence("method V() {}")];
    });
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({ "method A() {}": checked(1, 1), "method V() {}": VERIFIED }),
      config: { expansionWidth: 1, maxIterations: 3 },
    });

    expect(result.status).toBe("verified");
    expect(result.depth).toBe(1);
    expect(requests.map((request) => request.messages.length)).toEqual([2, 4, 4]);
    expect(requests[2]?.messages).toEqual(requests[1]?.messages);
    expect(requests[2]?.messages[2]?.content).toBe(fence("method A() {}"));
    expect(result.snapshots[1]?.attempts).toBe(2);
    expect(result.stats.depthRetries).toBe(1);
    expect(
      result.status === "verified" ? result.trajectory.steps.map((step) => step.program) : [],
    ).toEqual(["method A() {}", "method V() {}"]);
  });

  it("pads the next population from the surviving candidates", async () => {
    const { generator, requests } = scriptedGenerator((request) =>
      isInitial(request)
        ? ["I could not write this one.", fence("method Bad("), fence("method A() {}")]
        : [fence("method A2() {}")],
    );
    const result = await runTreefinement({
      prompt: PROMPT,
      generator,
      verifier: tableVerifier({
        "method Bad(": {
          verdict: "invalid",
          diagnostics: "1 parse errors detected in program.dfy",
        },
        "method A() {}": checked(3, 1),
        "method A2() {}": checked(1, 1),
      }),
      config: { expansionWidth: 3, maxIterations: 1 },
    });

    expect(result.status === "exhausted" ? result.reason : null).toBe("max_iterations");
    expect(result.snapshots[0]?.populationSize).toBe(3);
    const refinements = requests.slice(1);
    expect(refinements).toHaveLength(3);
    for (const request of refinements) {
      expect(request.messages).toHaveLength(4);
      expect(request.messages[2]?.content).toBe(fence("method A() {}"));
      expect(request.messages.some((turn) => turn.content.includes("method Bad("))).toBe(false);
    }
    expect(result.snapshots[1]?.survivorCount).toBe(3);
  });

  it("rejects empty prompts and invalid config", async () => {
    const { generator } = scriptedGenerator(() => []);
    const verifier = tableVerifier({});
    await expect(runTreefinement({ prompt: [], generator, verifier })).rejects.toThrow(
      "runTreefinement requires at least one prompt turn.",
    );
    await expect(
      runTreefinement({ prompt: PROMPT, generator, verifier, config: { expansionWidth: 0 } }),
    ).rejects.toBeInstanceOf(SearchConfigError);
  });
});
