import {performance} from "node:perf_hooks";
import {EffectWarning, HookExitError, TimeoutError, errorMessage} from "../errors.js";
import {LogLevel, silentLogger, type Logger} from "../utils/logger.js";
import type {WorktreeContext} from "../worktree.js";
import {HookEffect} from "./hook.js";
import type {LinkStrategy} from "./link-strategy.js";
import {SymlinkEffect, SymlinkRemovalEffect} from "./symlink.js";
import {
  LIFECYCLE_PHASES,
  type Effect,
  type EffectDefinition,
  type EffectPlan,
  type EffectResult,
  type EngineOptions,
  type ErrorHandling,
  type FailureKind,
  type LifecyclePhase,
  type SideEffectStatus
} from "./types.js";

export type PhaseState = "pending" | "running" | "completed" | "aborted";

export interface PhaseOutcome {
  phase: LifecyclePhase;
  state: "completed" | "aborted";
  results: EffectResult[];
  /** Effects declared for the phase; more than `results.length` after an abort. */
  declared: number;
  /** The failure that stopped the phase under the abort policy. */
  abortedBy?: EffectResult;
}

export interface EffectDeps {
  strategy: LinkStrategy;
  options: EngineOptions;
  logger?: Logger;
  platform?: NodeJS.Platform;
}

export function createEffect(definition: EffectDefinition, deps: EffectDeps): Effect {
  switch (definition.type) {
    case "symlink":
      return new SymlinkEffect(definition, deps);
    case "symlink-removal":
      return new SymlinkRemovalEffect(definition, deps);
    case "hook":
      return new HookEffect(definition, deps);
  }
}

function failureKind(error: unknown): FailureKind {
  if (error instanceof TimeoutError) return "timeout";
  if (error instanceof HookExitError) return "exit";
  return "error";
}

function elapsed(started: number): number {
  return Math.round(performance.now() - started);
}

/**
 * Ordered effects per lifecycle phase. Effects of a phase run one at a time
 * in declaration order; a later hook may rely on links made before it.
 */
export class EffectChain {
  private readonly states = new Map<LifecyclePhase, PhaseState>();
  private readonly applied = new Map<LifecyclePhase, Effect[]>();

  constructor(
    private readonly effects: Record<LifecyclePhase, Effect[]>,
    readonly errorHandling: ErrorHandling,
    private readonly logger: Logger = silentLogger
  ) {}

  static fromPlan(plan: EffectPlan, deps: EffectDeps): EffectChain {
    const effects: Record<LifecyclePhase, Effect[]> = {
      "pre-add": [],
      "post-add": [],
      "pre-remove": [],
      "post-remove": []
    };
    for (const phase of LIFECYCLE_PHASES) {
      effects[phase] = plan.phases[phase].map((definition) => createEffect(definition, deps));
    }
    return new EffectChain(effects, plan.errorHandling, deps.logger);
  }

  effectsFor(phase: LifecyclePhase): readonly Effect[] {
    return this.effects[phase];
  }

  stateOf(phase: LifecyclePhase): PhaseState {
    return this.states.get(phase) ?? "pending";
  }

  async execute(phase: LifecyclePhase, context: WorktreeContext): Promise<PhaseOutcome> {
    const results: EffectResult[] = [];
    const declared = this.effects[phase].length;
    const applied: Effect[] = [];
    this.states.set(phase, "running");
    this.applied.set(phase, applied);
    this.logger.event("phase.start", {phase, effects: declared});

    for (const effect of this.effects[phase]) {
      const label = effect.describe(context);
      const started = performance.now();
      const base = {effectType: effect.effectType, label, phase};

      try {
        if (!(await effect.canApply(context))) {
          results.push({...base, success: true, kind: "skipped", message: "precondition not met", durationMs: elapsed(started)});
          this.logger.event("effect.skipped", {phase, effect: label});
          continue;
        }

        this.logger.event("effect.start", {phase, effect: label});
        const outcome = await effect.apply(context);
        const kind = outcome.skipped ? "skipped" : "success";
        if (!outcome.skipped) applied.push(effect);
        results.push({
          ...base,
          success: true,
          kind,
          message: outcome.message,
          durationMs: elapsed(started),
          fallback: outcome.fallback,
          output: outcome.output
        });
        this.logger.event(kind === "skipped" ? "effect.skipped" : "effect.applied", {
          phase,
          effect: label,
          fallback: outcome.fallback
        });
      } catch (error) {
        // EffectWarning marks a failure the effect itself considers non-essential
        const tolerated = effect.continueOnError || error instanceof EffectWarning;
        const result: EffectResult = {
          ...base,
          success: false,
          kind: tolerated ? "warning" : "failure",
          message: errorMessage(error),
          durationMs: elapsed(started),
          failure: failureKind(error),
          output: error instanceof HookExitError ? {stdout: "", stderr: error.stderr} : undefined
        };
        results.push(result);
        this.logger.event(
          "effect.failed",
          {phase, effect: label, failure: result.failure, message: result.message},
          tolerated ? LogLevel.WARN : LogLevel.ERROR
        );

        if (!tolerated && this.errorHandling === "abort") {
          this.states.set(phase, "aborted");
          this.logger.event("phase.aborted", {phase, effect: label}, LogLevel.ERROR);
          return {phase, state: "aborted", results, declared, abortedBy: result};
        }
      }
    }

    this.states.set(phase, "completed");
    return {phase, state: "completed", results, declared};
  }

  /**
   * Best-effort undo of what the last run of `phase` applied, newest first.
   * Effects without a rollback are left as they are.
   */
  async rollback(phase: LifecyclePhase, context: WorktreeContext): Promise<string[]> {
    const undone: string[] = [];
    const applied = this.applied.get(phase) ?? [];
    for (const effect of [...applied].reverse()) {
      if (!effect.rollback) continue;
      const label = effect.describe(context);
      try {
        await effect.rollback(context);
        undone.push(label);
        this.logger.event("effect.rolled_back", {phase, effect: label});
      } catch (error) {
        this.logger.warn(`Rollback of ${label} failed: ${errorMessage(error)}`);
      }
    }
    this.applied.set(phase, []);
    return undone;
  }

  /** Status of every effect that can report one, re-read from the filesystem. */
  async inspect(context: WorktreeContext, phases: readonly LifecyclePhase[] = LIFECYCLE_PHASES): Promise<SideEffectStatus[]> {
    const entries: SideEffectStatus[] = [];
    for (const phase of phases) {
      for (const effect of this.effects[phase]) {
        if (!effect.inspect) continue;
        try {
          entries.push(await effect.inspect(context));
        } catch (error) {
          entries.push({
            effectType: effect.effectType,
            target: effect.describe(context),
            state: "error",
            message: errorMessage(error)
          });
        }
      }
    }
    return entries;
  }
}
