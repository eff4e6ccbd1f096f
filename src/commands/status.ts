import {buildEffectPlan} from "../config.js";
import {EffectChain} from "../effects/chain.js";
import type {SideEffectStatus} from "../effects/types.js";
import {NotFoundError} from "../errors.js";
import {createWorktreeContext, findWorktree, type WorktreeInfo} from "../worktree.js";
import {openSession, type CommonOptions} from "./session.js";

export interface WorktreeStatus {
  worktree: WorktreeInfo;
  statuses: SideEffectStatus[];
}

/**
 * Re-derive whether the configured files are in place for one worktree, or
 * for every linked worktree when no query is given. Nothing is cached between
 * runs; every answer comes from the filesystem.
 */
export async function worktreeStatus(query: string | undefined, options: CommonOptions = {}): Promise<WorktreeStatus[]> {
  const session = await openSession(options);
  const worktrees = await session.git.list();
  let selected: WorktreeInfo[];
  if (query) {
    const match = findWorktree(worktrees, query, session.cwd);
    if (!match) throw new NotFoundError("Worktree", query);
    selected = [match];
  } else {
    // the main worktree is the source, not a target
    selected = worktrees.slice(1).filter((worktree) => !worktree.bare);
  }

  const chain = EffectChain.fromPlan(buildEffectPlan(session.config), session.deps);
  const entries: WorktreeStatus[] = [];
  for (const worktree of selected) {
    const context = createWorktreeContext({
      branchName: worktree.branch ?? "",
      worktreePath: worktree.path,
      sourcePath: session.repoRoot
    });
    entries.push({worktree, statuses: await chain.inspect(context, ["post-add"])});
  }
  return entries;
}
