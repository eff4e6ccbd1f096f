import {basename, resolve, sep} from "node:path";
import {buildEffectPlan} from "../config.js";
import {EffectChain} from "../effects/chain.js";
import {OperationReport} from "../effects/report.js";
import {GitOperationError} from "../errors.js";
import {createWorktreeContext} from "../worktree.js";
import {lockRepository, openSession, type CommonOptions, type Session} from "./session.js";

export interface AddOptions extends CommonOptions {
  /** Start point for a newly created branch. */
  base?: string;
  /** Roll back the post-add effects that did apply when that phase aborts. */
  undoOnAbort?: boolean;
}

/**
 * A bare name lands under `worktree_base` when one is configured; anything
 * with a path separator is taken relative to the current directory.
 */
export function resolveWorktreePath(pathArg: string, session: Pick<Session, "cwd" | "repoRoot" | "config">): string {
  const bare = !pathArg.includes("/") && !pathArg.includes(sep);
  if (bare && session.config.worktreeBase) {
    return resolve(session.repoRoot, session.config.worktreeBase, pathArg);
  }
  return resolve(session.cwd, pathArg);
}

/**
 * pre-add effects, `git worktree add`, then post-add effects, all under the
 * repository lock. A git failure ends the command before post-add; effect
 * failures never undo the worktree.
 */
export async function addWorktree(
  pathArg: string,
  branchArg: string | undefined,
  options: AddOptions = {}
): Promise<OperationReport> {
  const session = await openSession(options);
  const {git, config, logger} = session;
  const worktreePath = resolveWorktreePath(pathArg, session);
  const branchName = branchArg ?? `${config.branchPrefix}${basename(worktreePath)}`;
  const context = createWorktreeContext({branchName, worktreePath, sourcePath: session.repoRoot});

  const plan = buildEffectPlan(config, {errorHandling: session.errorHandling});
  const chain = EffectChain.fromPlan(plan, session.deps);
  const report = new OperationReport("add", context.worktreePath, branchName);

  await lockRepository(session, "add", options.wait, async () => {
    const pre = await chain.execute("pre-add", context);
    report.recordPhase(pre);
    if (pre.state === "aborted") return;

    try {
      const createBranch = !(await git.branchExists(branchName));
      await git.add(context.worktreePath, branchName, {createBranch, base: options.base});
      report.recordGit({
        success: true,
        message: `${context.worktreePath} on ${createBranch ? "new" : "existing"} branch ${branchName}`
      });
    } catch (error) {
      if (!(error instanceof GitOperationError)) throw error;
      logger.error(error.message);
      report.recordGit({success: false, message: error.message});
      return;
    }

    const post = await chain.execute("post-add", context);
    report.recordPhase(post);
    if (post.state === "aborted" && options.undoOnAbort) {
      const undone = await chain.rollback("post-add", context);
      logger.warn(`Rolled back ${undone.length} post-add effect(s)`);
    }
  });

  return report;
}
