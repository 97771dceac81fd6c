export type VerifierVerdict = "verified" | "checked" | "invalid";

/**
 * Per-program proof obligation counts, when the verifier reports them.
 */
export type ProofObligations = {
  readonly verified: number;
  readonly failed: number;
};

export type VerifierReport = {
  readonly verdict: VerifierVerdict;
  readonly diagnostics: string;
  readonly obligations?: ProofObligations;
};

export type VerifierAdapter = {
  readonly name: string;
  /**
   * Must resolve with an `invalid` report for programs that do not parse; throwing is
   * reserved for infrastructure failures and is treated the same way by the search.
   */
  verify: (program: string) => Promise<VerifierReport>;
};
