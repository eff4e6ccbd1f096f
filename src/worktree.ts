import {basename, resolve} from "node:path";

/**
 * Values every effect of one invocation reads. Built once per command and
 * frozen; effects never mutate it.
 */
export interface WorktreeContext {
  readonly branchName: string;
  readonly worktreePath: string;
  /** Repository root the worktree was created from. */
  readonly sourcePath: string;
}

/** One entry of `git worktree list --porcelain`. */
export interface WorktreeInfo {
  path: string;
  /** Short branch name; absent for detached or bare entries. */
  branch?: string;
  head?: string;
  bare: boolean;
  detached: boolean;
  locked: boolean;
  prunable: boolean;
}

export function createWorktreeContext(input: {
  branchName: string;
  worktreePath: string;
  sourcePath: string;
}): WorktreeContext {
  return Object.freeze({
    branchName: input.branchName,
    worktreePath: resolve(input.worktreePath),
    sourcePath: resolve(input.sourcePath)
  });
}

/** Strip `refs/heads/` from a porcelain branch ref. */
export function shortBranchName(ref: string): string {
  return ref.startsWith("refs/heads/") ? ref.slice("refs/heads/".length) : ref;
}

/**
 * Find a worktree by absolute path, directory name or branch name.
 * The main worktree is never returned.
 */
export function findWorktree(
  worktrees: WorktreeInfo[],
  query: string,
  cwd: string
): WorktreeInfo | undefined {
  const candidates = worktrees.slice(1);
  const absolute = resolve(cwd, query);
  return (
    candidates.find((worktree) => worktree.path === absolute) ??
    candidates.find((worktree) => basename(worktree.path) === query) ??
    candidates.find((worktree) => worktree.branch === query)
  );
}
