import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  buildInitialTurns,
  createDafnyVerifier,
  createOpenAiCandidateGenerator,
  loadSearchConfigFromEnv,
  runTreefinement,
  type SearchTelemetryEvent,
  type SearchTelemetrySink,
} from "../src/index.js";

function printUsage(): void {
  console.log(
    [
      "Usage: npm run treefinement -- --problem <file> [options]",
      "",
      "  --problem <file>             Problem statement (markdown or plain text)",
      "  --model <id>                 Completion model (default: METAGEN_MODEL)",
      "  --width <n>                  Expansion width B",
      "  --iterations <n>             Maximum refinement depths",
      "  --rebase-temperature <t>     REBASE softmax temperature",
      "  --seed <n>                   Seed for REBASE resampling",
      "  --dafny <path>               Dafny executable (default: DAFNY_PATH or dafny)",
      "  --out <file>                 Where to write the result JSON",
    ].join("\n"),
  );
}

function parseOptionalNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${flag} must be a number, got "${value}".`);
  }
  return parsed;
}

function formatEvent(event: SearchTelemetryEvent): string {
  switch (event.type) {
    case "search.started":
      return `search started: B=${event.expansionWidth} iterations=${event.maxIterations} τ=${event.rebaseTemperature} (${event.generator}, ${event.verifier})`;
    case "search.candidate.invalid":
      return `  depth ${event.depth} candidate ${event.index} invalid: ${event.reason}`;
    case "search.depth.retry":
      return `  depth ${event.depth} attempt ${event.attempt}: no viable candidates, retrying`;
    case "search.depth.completed":
      return `depth ${event.depth}: ${event.survivorCount} scored, ${event.invalidCount} invalid, best ${event.bestScore?.toFixed(3) ?? "n/a"}`;
    case "search.completed":
      return `search ${event.status}${event.reason ? ` (${event.reason})` : ""} at depth ${event.depth} in ${(event.durationMs / 1000).toFixed(1)}s`;
  }
}

const consoleSink: SearchTelemetrySink = {
  emit: (event) => {
    console.log(formatEvent(event));
  },
};

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      problem: { type: "string" },
      model: { type: "string" },
      width: { type: "string" },
      iterations: { type: "string" },
      "rebase-temperature": { type: "string" },
      seed: { type: "string" },
      dafny: { type: "string" },
      out: { type: "string", default: "treefinement-result.json" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help || !values.problem) {
    printUsage();
    if (!values.help) {
      process.exitCode = 1;
    }
    return;
  }

  const problem = await readFile(resolve(values.problem), "utf8");
  const config = loadSearchConfigFromEnv({
    overrides: {
      expansionWidth: parseOptionalNumber(values.width, "--width"),
      maxIterations: parseOptionalNumber(values.iterations, "--iterations"),
      rebaseTemperature: parseOptionalNumber(values["rebase-temperature"], "--rebase-temperature"),
      seed: parseOptionalNumber(values.seed, "--seed"),
    },
  });

  const result = await runTreefinement({
    prompt: buildInitialTurns({ problem }),
    generator: createOpenAiCandidateGenerator({ model: values.model }),
    verifier: createDafnyVerifier({ dafnyPath: values.dafny }),
    config,
    telemetry: { sink: consoleSink, includeCandidateEvents: values.verbose === true },
  });

  const outPath = resolve(values.out ?? "treefinement-result.json");
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, `${JSON.stringify(result, null, 2)}\n`, "utf8");
  console.log(`Wrote: ${outPath}`);

  if (result.status === "verified") {
    console.log(`\n${result.trajectory.program}`);
    return;
  }
  process.exitCode = 2;
}

void main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
