export type ChatRole = "system" | "user" | "assistant";

export type ChatTurn = {
  readonly role: ChatRole;
  readonly content: string;
};

export type GenerationRequest = {
  readonly messages: readonly ChatTurn[];
  /** Number of independent continuations wanted for these messages. */
  readonly n: number;
  readonly temperature: number;
  readonly maxTokens: number;
};

export type CandidateGenerator = {
  readonly name: string;
  /**
   * Resolves with at most `n` texts; `null` marks an empty choice.
   */
  generate: (request: GenerationRequest) => Promise<readonly (string | null)[]>;
};
