import type {WorktreeContext} from "../worktree.js";

export const LIFECYCLE_PHASES = ["pre-add", "post-add", "pre-remove", "post-remove"] as const;

export type LifecyclePhase = (typeof LIFECYCLE_PHASES)[number];

export type MappingType = "symlink" | "copy";

export type ErrorHandling = "abort" | "continue";

export interface SymlinkDefinition {
  type: "symlink";
  /** Template; relative values resolve against the repository root. */
  source: string;
  /** Template; always resolved against the worktree root. */
  target: string;
  mappingType: MappingType;
  skipIfExists: boolean;
  continueOnError: boolean;
  description?: string;
}

/** Pre-remove counterpart of a symlink-mode mapping. */
export interface SymlinkRemovalDefinition {
  type: "symlink-removal";
  source: string;
  target: string;
  continueOnError: boolean;
  description?: string;
}

export interface HookDefinition {
  type: "hook";
  command: string;
  /** When present the command is spawned directly, without a shell. */
  args?: string[];
  env: Record<string, string>;
  continueOnError: boolean;
  timeoutSeconds: number;
}

export type EffectDefinition = SymlinkDefinition | SymlinkRemovalDefinition | HookDefinition;

/** Already-validated input of the engine: ordered definitions per phase plus the chain policy. */
export interface EffectPlan {
  phases: Record<LifecyclePhase, EffectDefinition[]>;
  errorHandling: ErrorHandling;
}

export type EffectResultKind = "success" | "skipped" | "warning" | "failure";

export type FailureKind = "exit" | "timeout" | "error";

export interface EffectResult {
  success: boolean;
  kind: EffectResultKind;
  message: string;
  effectType: string;
  /** What the effect acted on, e.g. `link .env` or the hook command line. */
  label: string;
  phase: LifecyclePhase;
  durationMs: number;
  failure?: FailureKind;
  /** Set when a symlink fell back to a copy. */
  fallback?: boolean;
  /** Captured hook output. */
  output?: {stdout: string; stderr: string};
}

/** What `apply` hands back on success; the chain fills in phase, kind and timing. */
export interface EffectOutcome {
  message: string;
  skipped?: boolean;
  fallback?: boolean;
  output?: {stdout: string; stderr: string};
}

export type SideEffectState = "ok" | "missing" | "error" | "warning";

export interface SideEffectStatus {
  effectType: string;
  target: string;
  state: SideEffectState;
  message: string;
}

/**
 * Contract every effect implements. `apply` throws on failure; the chain turns
 * the error into an EffectResult and applies the abort/continue policy.
 */
export interface Effect {
  readonly effectType: string;
  readonly continueOnError: boolean;
  /** Short human-readable label for reports. */
  describe(context: WorktreeContext): string;
  canApply(context: WorktreeContext): Promise<boolean>;
  apply(context: WorktreeContext): Promise<EffectOutcome>;
  /** Best-effort undo; effects that cannot undo simply omit it. */
  rollback?(context: WorktreeContext): Promise<void>;
  /** Re-derive current validity from the filesystem for status queries. */
  inspect?(context: WorktreeContext): Promise<SideEffectStatus>;
}

export interface EngineOptions {
  dryRun: boolean;
  verbose: boolean;
}

export function emptyPlan(errorHandling: ErrorHandling = "abort"): EffectPlan {
  return {
    phases: {"pre-add": [], "post-add": [], "pre-remove": [], "post-remove": []},
    errorHandling
  };
}
