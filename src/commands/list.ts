import {GitWorktree} from "../git.js";
import type {WorktreeInfo} from "../worktree.js";

export async function listWorktrees(options: {cwd?: string} = {}): Promise<WorktreeInfo[]> {
  const git = new GitWorktree(options.cwd ?? process.cwd());
  return git.list();
}
