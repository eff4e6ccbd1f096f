import {lockRepository, openSession, type CommonOptions} from "./session.js";

export interface PruneResult {
  /** Administrative entries git removed, or would remove under dry run. */
  pruned: string[];
  dryRun: boolean;
}

/** `git worktree prune` for worktrees whose directories are gone. */
export async function pruneWorktrees(options: CommonOptions = {}): Promise<PruneResult> {
  const session = await openSession(options);
  const dryRun = session.engine.dryRun;
  const pruned = await lockRepository(session, "prune", options.wait, () => session.git.prune({dryRun}));
  if (pruned.length === 0) {
    session.logger.info("Nothing to prune.");
  }
  return {pruned, dryRun};
}
