import {buildEffectPlan} from "../config.js";
import {EffectChain} from "../effects/chain.js";
import {OperationReport} from "../effects/report.js";
import {GitOperationError, NotFoundError} from "../errors.js";
import {confirm, isInteractive} from "../utils/prompt.js";
import {createWorktreeContext, findWorktree} from "../worktree.js";
import {lockRepository, openSession, type CommonOptions} from "./session.js";

export interface RemoveOptions extends CommonOptions {
  force?: boolean;
  yes?: boolean;
  confirm?: (question: string) => Promise<boolean>;
}

/**
 * pre-remove effects (hooks, then links this tool manages), `git worktree
 * remove`, then post-remove hooks. Resolves to undefined when the user
 * declines the confirmation.
 */
export async function removeWorktree(query: string, options: RemoveOptions = {}): Promise<OperationReport | undefined> {
  const session = await openSession(options);
  const {git, logger} = session;
  const worktree = findWorktree(await git.list(), query, session.cwd);
  if (!worktree) {
    throw new NotFoundError("Worktree", query);
  }

  if (!options.yes && !options.force) {
    const ask = options.confirm ?? (isInteractive() ? (question: string) => confirm(question) : undefined);
    if (!ask) {
      throw new Error(`Refusing to remove ${worktree.path} without confirmation; pass --yes.`);
    }
    if (!(await ask(`Remove worktree ${worktree.branch ?? worktree.path} at ${worktree.path}?`))) {
      return undefined;
    }
  }

  const context = createWorktreeContext({
    branchName: worktree.branch ?? "",
    worktreePath: worktree.path,
    sourcePath: session.repoRoot
  });
  const chain = EffectChain.fromPlan(buildEffectPlan(session.config, {errorHandling: session.errorHandling}), session.deps);
  const report = new OperationReport("remove", context.worktreePath, context.branchName);

  await lockRepository(session, "remove", options.wait, async () => {
    const pre = await chain.execute("pre-remove", context);
    report.recordPhase(pre);
    if (pre.state === "aborted") return;

    try {
      await git.remove(context.worktreePath, {force: options.force ?? false});
      report.recordGit({success: true, message: `removed ${context.worktreePath}`});
    } catch (error) {
      if (!(error instanceof GitOperationError)) throw error;
      logger.error(error.message);
      report.recordGit({success: false, message: error.message});
      return;
    }

    report.recordPhase(await chain.execute("post-remove", context));
  });

  return report;
}
