export {
  loadSearchConfigFromEnv,
  resolveSearchConfig,
  SEARCH_CONFIG_ENV_KEYS,
  SearchConfigError,
  searchConfigSchema,
} from "./config.js";
export type { SearchConfig, SearchConfigInput } from "./config.js";

export { runTreefinement } from "./search/treefinement.js";
export type {
  TreefinementExhaustedResult,
  TreefinementExhaustionReason,
  TreefinementOptions,
  TreefinementResult,
  TreefinementSnapshot,
  TreefinementStats,
  TreefinementVerifiedResult,
} from "./search/treefinement.js";
export { runBestOfN, runSelfRepair } from "./search/strategies.js";
export type { BestOfNOptions, SelfRepairOptions } from "./search/strategies.js";
export {
  lexicalSimilarity,
  runMinimumBayesRisk,
  selectMinimumBayesRisk,
} from "./search/mbr.js";
export type {
  MinimumBayesRiskOptions,
  MinimumBayesRiskResult,
  MinimumBayesRiskSelection,
  UtilityFunction,
} from "./search/mbr.js";
export { pickIndexByWeights, rebaseProbabilities, rebaseResample } from "./search/rebase.js";
export type { RebaseResampleOptions, RebaseSelection } from "./search/rebase.js";
export {
  appendUserTurn,
  cloneTrajectory,
  createTrajectory,
  extendTrajectory,
  pickBestTrajectory,
} from "./search/trajectory.js";
export type { Trajectory, TrajectoryExtension, TrajectoryStep } from "./search/trajectory.js";
export {
  createValueFunction,
  formatFeedback,
  scoreVerifierReport,
  VERIFIED_SCORE,
} from "./search/valueFunction.js";
export type {
  Evaluation,
  InvalidEvaluation,
  InvalidReason,
  ScoredEvaluation,
  ValueFunction,
  ValueFunctionInput,
} from "./search/valueFunction.js";
export type {
  SearchCandidateInvalidTelemetryEvent,
  SearchCompletedTelemetryEvent,
  SearchDepthCompletedTelemetryEvent,
  SearchDepthRetryTelemetryEvent,
  SearchStartedTelemetryEvent,
  SearchTelemetryConfig,
  SearchTelemetryEvent,
  SearchTelemetrySelection,
  SearchTelemetrySink,
} from "./search/telemetry.js";

export { extractProgram, findFencedBlocks } from "./generation/extract.js";
export type { FencedBlock } from "./generation/extract.js";
export {
  buildDefaultSystemPrompt,
  buildFeedbackPrompt,
  buildInitialTurns,
  DEFAULT_PROGRAM_LANGUAGE,
} from "./generation/prompts.js";
export type { FeedbackPromptBuilder, FeedbackPromptInput } from "./generation/prompts.js";
export { createOpenAiCandidateGenerator } from "./generation/openaiGenerator.js";
export type { OpenAiCandidateGeneratorOptions } from "./generation/openaiGenerator.js";
export type {
  CandidateGenerator,
  ChatRole,
  ChatTurn,
  GenerationRequest,
} from "./generation/types.js";
export { runChatCompletion, runOpenAiCall } from "./openai/calls.js";
export type { ChatCompletionFn, ChatCompletionRequest } from "./openai/calls.js";

export { createDafnyVerifier, parseDafnyOutput } from "./verifier/dafny.js";
export type { DafnyVerifierOptions } from "./verifier/dafny.js";
export { runCommand } from "./verifier/process.js";
export type { CommandResult, CommandRunner, CommandRunOptions } from "./verifier/process.js";
export type {
  ProofObligations,
  VerifierAdapter,
  VerifierReport,
  VerifierVerdict,
} from "./verifier/types.js";

export { loadEnvFromFile, loadLocalEnv } from "./utils/env.js";
export { createSeededRandom } from "./utils/random.js";
export type { RandomSource } from "./utils/random.js";
