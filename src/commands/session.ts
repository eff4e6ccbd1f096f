import {z} from "zod";
import {loadConfig, type WtxConfig} from "../config.js";
import type {EffectDeps} from "../effects/chain.js";
import {terminateRunningHooks} from "../effects/hook.js";
import {createLinkStrategy} from "../effects/link-strategy.js";
import type {EngineOptions, ErrorHandling} from "../effects/types.js";
import {GitWorktree} from "../git.js";
import {lockPathFor, withRepoLock} from "../lock.js";
import {createLogger, LogLevel, type Logger} from "../utils/logger.js";

/** Options every command accepts from the command line. */
export interface CommonOptions {
  cwd?: string;
  config?: string;
  dryRun?: boolean;
  onError?: string;
  /** commander's `--no-wait` sets this to false. */
  wait?: boolean;
  verbose?: boolean;
  logger?: Logger;
  /** Location of the global config; tests point it at a temp dir. */
  globalConfig?: string;
}

export interface Session {
  cwd: string;
  git: GitWorktree;
  repoRoot: string;
  commonDir: string;
  config: WtxConfig;
  engine: EngineOptions;
  logger: Logger;
  deps: EffectDeps;
  errorHandling?: ErrorHandling;
}

const errorHandlingSchema = z.enum(["abort", "continue"]);

export function parseErrorHandling(value: string | undefined): ErrorHandling | undefined {
  if (value === undefined) return undefined;
  const parsed = errorHandlingSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid --on-error value: ${value} (expected abort or continue)`);
  }
  return parsed.data;
}

export function loggerFor(options: CommonOptions): Logger {
  if (options.logger) return options.logger;
  if (options.verbose) return createLogger({level: LogLevel.DEBUG});
  return createLogger({level: options.dryRun ? LogLevel.INFO : LogLevel.WARN});
}

/** Resolve the repository, load its configuration and wire the engine dependencies. */
export async function openSession(options: CommonOptions): Promise<Session> {
  const cwd = options.cwd ?? process.cwd();
  const logger = loggerFor(options);
  const engine: EngineOptions = {dryRun: options.dryRun ?? false, verbose: options.verbose ?? false};
  const git = new GitWorktree(cwd, {dryRun: engine.dryRun, logger});
  const repoRoot = await git.repoRoot();
  const commonDir = await git.commonDir();
  const config = await loadConfig(repoRoot, {explicitPath: options.config, globalPath: options.globalConfig});
  const rootGit = new GitWorktree(repoRoot, {dryRun: engine.dryRun, logger});

  return {
    cwd,
    git: rootGit,
    repoRoot,
    commonDir,
    config,
    engine,
    logger,
    deps: {strategy: createLinkStrategy(), options: engine, logger},
    errorHandling: parseErrorHandling(options.onError)
  };
}

/** Serialize mutating commands against the same repository. */
export function lockRepository<T>(session: Session, command: string, wait: boolean | undefined, task: () => Promise<T>): Promise<T> {
  return withRepoLock(
    {
      lockPath: lockPathFor(session.commonDir),
      command,
      timeoutMs: wait === false ? 0 : session.config.lockTimeoutSeconds * 1000,
      logger: session.logger,
      beforeExit: terminateRunningHooks
    },
    task
  );
}
