import type {PhaseOutcome} from "./chain.js";
import type {EffectResult} from "./types.js";

export type Operation = "add" | "remove";

export interface GitOutcome {
  success: boolean;
  message: string;
}

export interface ReportBuckets {
  successes: EffectResult[];
  skipped: EffectResult[];
  warnings: EffectResult[];
  failures: EffectResult[];
}

/**
 * Everything one add/remove produced: the git step and every phase that ran.
 * The git outcome and the effect outcomes are kept apart; warnings and skips
 * never make the operation fail.
 */
export class OperationReport {
  private git: GitOutcome | undefined;
  private readonly phases: PhaseOutcome[] = [];

  constructor(
    readonly operation: Operation,
    readonly worktreePath: string,
    readonly branchName: string
  ) {}

  recordGit(outcome: GitOutcome): void {
    this.git = outcome;
  }

  recordPhase(outcome: PhaseOutcome): void {
    this.phases.push(outcome);
  }

  get gitOutcome(): GitOutcome | undefined {
    return this.git;
  }

  get phaseOutcomes(): readonly PhaseOutcome[] {
    return this.phases;
  }

  get results(): EffectResult[] {
    return this.phases.flatMap((phase) => phase.results);
  }

  get abortedPhase(): PhaseOutcome | undefined {
    return this.phases.find((phase) => phase.state === "aborted");
  }

  get succeeded(): boolean {
    return this.git?.success !== false && this.abortedPhase === undefined;
  }

  get exitCode(): number {
    return this.succeeded ? 0 : 1;
  }

  buckets(): ReportBuckets {
    const buckets: ReportBuckets = {successes: [], skipped: [], warnings: [], failures: []};
    for (const result of this.results) {
      switch (result.kind) {
        case "success":
          buckets.successes.push(result);
          break;
        case "skipped":
          buckets.skipped.push(result);
          break;
        case "warning":
          buckets.warnings.push(result);
          break;
        case "failure":
          buckets.failures.push(result);
          break;
      }
    }
    return buckets;
  }

  /** Manual follow-up steps; empty unless something stopped the operation. */
  recommendations(): string[] {
    const steps: string[] = [];
    if (this.git && !this.git.success) {
      steps.push(`git worktree ${this.operation} failed; no effects after it were run.`);
    }
    const aborted = this.abortedPhase;
    if (aborted?.abortedBy) {
      const skipped = aborted.declared - aborted.results.length;
      steps.push(`Fix \`${aborted.abortedBy.label}\` (${aborted.abortedBy.message}) and apply the remaining ${aborted.phase} effects by hand.`);
      if (skipped > 0) {
        steps.push(`${skipped} effect(s) after it in ${aborted.phase} did not run.`);
      }
      if (this.operation === "add" && aborted.phase === "pre-add") {
        steps.push(`The worktree at ${this.worktreePath} was not created.`);
      }
      if (this.operation === "add" && this.git?.success) {
        steps.push(`The worktree at ${this.worktreePath} was kept; remove it with \`wtx remove ${this.worktreePath}\` if it is unusable.`);
      }
      if (this.operation === "remove" && aborted.phase === "pre-remove") {
        steps.push(`The worktree at ${this.worktreePath} was not removed.`);
      }
    }
    return steps;
  }

  toJSON(): Record<string, unknown> {
    const buckets = this.buckets();
    return {
      operation: this.operation,
      worktreePath: this.worktreePath,
      branch: this.branchName,
      success: this.succeeded,
      git: this.git ?? null,
      phases: this.phases.map((phase) => ({
        phase: phase.phase,
        state: phase.state,
        results: phase.results
      })),
      summary: {
        successes: buckets.successes.length,
        skipped: buckets.skipped.length,
        warnings: buckets.warnings.length,
        failures: buckets.failures.length
      },
      recommendations: this.recommendations()
    };
  }
}
