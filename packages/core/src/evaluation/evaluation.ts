export type EvaluationOutcome = "success" | "failure" | "inconclusive";

export interface EvaluationJSON {
  outcome: EvaluationOutcome;
  success?: string;
  failure?: string;
  context: string[];
}

/**
 * Result of one reachability evaluation: a definitive success, a definitive
 * failure, or neither, plus hints about near misses.
 *
 * Neither success nor failure still means "not reachable"; only the egress
 * stage ever records a failure.
 */
export class ConnectivityEvaluation {
  success?: string;
  failure?: string;
  readonly context = new Set<string>();

  markSuccess(message: string): void {
    this.success = message;
  }

  markFailure(message: string): void {
    this.failure = message;
  }

  addContext(message: string): void {
    this.context.add(message);
  }

  get outcome(): EvaluationOutcome {
    if (this.success !== undefined) return "success";
    if (this.failure !== undefined) return "failure";
    return "inconclusive";
  }

  get reachable(): boolean {
    return this.success !== undefined;
  }

  toJSON(): EvaluationJSON {
    return {
      outcome: this.outcome,
      success: this.success,
      failure: this.failure,
      context: [...this.context].sort(),
    };
  }
}
