import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { loadLocalEnv } from "../utils/env.js";
import { toError } from "../utils/scheduler.js";

import { runCommand, type CommandResult, type CommandRunner } from "./process.js";
import type { VerifierAdapter, VerifierReport } from "./types.js";

const DEFAULT_DAFNY_ARGS = ["verify"] as const;
const DEFAULT_DAFNY_TIMEOUT_MS = 120_000;
const PROGRAM_FILENAME = "program.dfy";

const PARSE_ERRORS_PATTERN = /(\d+) parse errors? detected in/u;
const RESOLUTION_ERRORS_PATTERN = /(\d+) resolution\/type errors? detected in/u;
const SUMMARY_PATTERN =
  /Dafny program verifier finished with (\d+) verified, (\d+) errors?(?:, (\d+) time outs?)?/u;
const NO_VERIFICATION_PATTERN = /Dafny program verifier did not attempt verification/u;

export type DafnyVerifierOptions = {
  /** Defaults to `DAFNY_PATH`, then `dafny` on the PATH. */
  readonly dafnyPath?: string;
  readonly args?: readonly string[];
  readonly timeoutMs?: number;
  readonly runCommand?: CommandRunner;
};

function resolveDafnyPath(): string {
  loadLocalEnv();
  const raw = process.env.DAFNY_PATH?.trim();
  return raw && raw.length > 0 ? raw : "dafny";
}

function countMatch(output: string, pattern: RegExp): number {
  const raw = output.match(pattern)?.[1];
  return raw ? Number.parseInt(raw, 10) : 0;
}

export function parseDafnyOutput(output: string, exitCode: number | null): VerifierReport {
  const diagnostics = output.trim();
  if (
    countMatch(diagnostics, PARSE_ERRORS_PATTERN) > 0 ||
    countMatch(diagnostics, RESOLUTION_ERRORS_PATTERN) > 0
  ) {
    return { verdict: "invalid", diagnostics };
  }

  const summary = diagnostics.match(SUMMARY_PATTERN);
  if (summary) {
    const verified = Number.parseInt(summary[1] ?? "0", 10);
    const errors = Number.parseInt(summary[2] ?? "0", 10);
    const timeouts = Number.parseInt(summary[3] ?? "0", 10);
    const failed = errors + timeouts;
    return {
      verdict: failed === 0 && exitCode === 0 ? "verified" : "checked",
      diagnostics,
      obligations: { verified, failed },
    };
  }

  if (NO_VERIFICATION_PATTERN.test(diagnostics)) {
    return { verdict: "checked", diagnostics };
  }
  return { verdict: "invalid", diagnostics };
}

function combineOutput(result: CommandResult, filePath: string): string {
  return [result.stdout, result.stderr]
    .filter((chunk) => chunk.trim().length > 0)
    .join("\n")
    .split(filePath)
    .join(PROGRAM_FILENAME);
}

export function createDafnyVerifier(options: DafnyVerifierOptions = {}): VerifierAdapter {
  const args = options.args ?? DEFAULT_DAFNY_ARGS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_DAFNY_TIMEOUT_MS;
  const run = options.runCommand ?? runCommand;

  return {
    name: "dafny",
    verify: async (program) => {
      const dafnyPath = options.dafnyPath ?? resolveDafnyPath();
      const workDir = await mkdtemp(path.join(os.tmpdir(), "metagen-dafny-"));
      const filePath = path.join(workDir, PROGRAM_FILENAME);
      try {
        await writeFile(filePath, program, "utf8");
        let result: CommandResult;
        try {
          result = await run(dafnyPath, [...args, filePath], { cwd: workDir, timeoutMs });
        } catch (error: unknown) {
          return {
            verdict: "invalid",
            diagnostics: `Failed to start ${dafnyPath}: ${toError(error).message}`,
          };
        }
        if (result.timedOut) {
          return {
            verdict: "invalid",
            diagnostics: `Dafny did not finish within ${timeoutMs} ms.`,
          };
        }
        return parseDafnyOutput(combineOutput(result, filePath), result.exitCode);
      } finally {
        await rm(workDir, { recursive: true, force: true });
      }
    },
  };
}
