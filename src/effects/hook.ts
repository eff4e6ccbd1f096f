import {execa, execaSync} from "execa";
import {EffectCriticalError, HookExitError, TimeoutError, errorMessage, isErrnoException} from "../errors.js";
import {silentLogger, type Logger} from "../utils/logger.js";
import type {WorktreeContext} from "../worktree.js";
import {pathKind} from "./link-strategy.js";
import {renderAll, renderTemplate} from "./template.js";
import type {Effect, EffectOutcome, EngineOptions, HookDefinition} from "./types.js";

export const DEFAULT_HOOK_TIMEOUT_SECONDS = 60;

export interface HookEffectDeps {
  options: EngineOptions;
  logger?: Logger;
  platform?: NodeJS.Platform;
}

interface Invocation {
  file: string;
  args: string[];
  display: string;
  windowsVerbatimArguments: boolean;
}

/**
 * Without explicit args the command goes through the platform shell; with
 * args it is spawned directly and nothing is shell-interpreted.
 */
export function buildInvocation(
  command: string,
  args: string[] | undefined,
  platform: NodeJS.Platform
): Invocation {
  if (args !== undefined) {
    return {file: command, args, display: [command, ...args].join(" "), windowsVerbatimArguments: false};
  }
  if (platform === "win32") {
    return {
      file: process.env.ComSpec ?? "cmd.exe",
      args: ["/d", "/s", "/c", `"${command}"`],
      display: command,
      windowsVerbatimArguments: true
    };
  }
  return {file: "/bin/sh", args: ["-c", command], display: command, windowsVerbatimArguments: false};
}

/** Environment every hook sees on top of the inherited one. */
export function contextEnv(context: WorktreeContext): Record<string, string> {
  return {
    WTX_BRANCH: context.branchName,
    WTX_WORKTREE_PATH: context.worktreePath,
    WTX_SOURCE_PATH: context.sourcePath
  };
}

/** Synchronous so it can run inside a signal handler right before exit. */
function killProcessTree(pid: number, platform: NodeJS.Platform): void {
  if (platform === "win32") {
    execaSync("taskkill", ["/pid", String(pid), "/T", "/F"], {reject: false});
    return;
  }
  try {
    // negative pid: the whole process group started for the hook
    process.kill(-pid, "SIGKILL");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ESRCH") return;
    throw error;
  }
}

/** Hooks are spawned in their own process group, so a terminal Ctrl-C never reaches them. */
const runningHooks = new Map<number, NodeJS.Platform>();

export function runningHookPids(): number[] {
  return [...runningHooks.keys()];
}

/** Kill every hook process tree still running; called when wtx itself is interrupted. */
export function terminateRunningHooks(): void {
  for (const [pid, platform] of runningHooks) {
    killProcessTree(pid, platform);
    runningHooks.delete(pid);
  }
}

export class HookEffect implements Effect {
  readonly effectType = "hook";
  readonly continueOnError: boolean;
  private readonly logger: Logger;
  private readonly platform: NodeJS.Platform;

  constructor(
    private readonly definition: HookDefinition,
    private readonly deps: HookEffectDeps
  ) {
    this.continueOnError = definition.continueOnError;
    this.logger = deps.logger ?? silentLogger;
    this.platform = deps.platform ?? process.platform;
  }

  get timeoutSeconds(): number {
    return this.definition.timeoutSeconds > 0 ? this.definition.timeoutSeconds : DEFAULT_HOOK_TIMEOUT_SECONDS;
  }

  describe(context: WorktreeContext): string {
    return this.invocation(context).display;
  }

  async canApply(): Promise<boolean> {
    return this.definition.command.trim() !== "";
  }

  async apply(context: WorktreeContext): Promise<EffectOutcome> {
    const invocation = this.invocation(context);
    const cwd = (await pathKind(context.worktreePath)) === "dir" ? context.worktreePath : context.sourcePath;

    if (this.deps.options.dryRun) {
      return {message: `[dry run] would run \`${invocation.display}\` in ${cwd}`};
    }

    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.definition.env)) {
      env[key] = renderTemplate(value, context);
    }

    this.logger.event("hook.start", {command: invocation.display, cwd, timeout: this.timeoutSeconds});

    const subprocess = execa(invocation.file, invocation.args, {
      cwd,
      env: {...env, ...contextEnv(context)},
      stdin: "ignore",
      reject: false,
      detached: this.platform !== "win32",
      windowsHide: true,
      windowsVerbatimArguments: invocation.windowsVerbatimArguments
    });

    const {pid} = subprocess;
    if (pid !== undefined) runningHooks.set(pid, this.platform);

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      if (pid === undefined) return;
      try {
        killProcessTree(pid, this.platform);
      } catch (error) {
        this.logger.warn(`Could not terminate hook process ${pid}: ${errorMessage(error)}`);
      }
    }, this.timeoutSeconds * 1000);

    const result = await subprocess.finally(() => {
      clearTimeout(timer);
      if (pid !== undefined) runningHooks.delete(pid);
    });
    const output = {stdout: result.stdout, stderr: result.stderr};

    if (timedOut) {
      throw new TimeoutError(invocation.display, this.timeoutSeconds);
    }
    if (result.exitCode === undefined && result.signal === undefined) {
      const reason = "shortMessage" in result && typeof result.shortMessage === "string"
        ? result.shortMessage
        : "could not start process";
      throw new EffectCriticalError(`Hook \`${invocation.display}\` failed to start: ${reason}`);
    }
    if (result.failed) {
      throw new HookExitError(invocation.display, result.exitCode, result.stderr);
    }
    if (this.deps.options.verbose && result.stdout) {
      this.logger.info(`${invocation.display}:\n${result.stdout}`);
    }
    return {message: `ran \`${invocation.display}\``, output};
  }

  private invocation(context: WorktreeContext): Invocation {
    const command = renderTemplate(this.definition.command, context);
    const args = this.definition.args === undefined ? undefined : renderAll(this.definition.args, context);
    return buildInvocation(command, args, this.platform);
  }
}
