import {execa} from "execa";
import {basename, dirname, isAbsolute, resolve} from "node:path";
import {GitOperationError} from "./errors.js";
import {silentLogger, type Logger} from "./utils/logger.js";
import {shortBranchName, type WorktreeInfo} from "./worktree.js";

export interface AddWorktreeOptions {
  /** Create `branch` with `-b` instead of checking out an existing one. */
  createBranch: boolean;
  /** Start point for a new branch; defaults to HEAD. */
  base?: string;
}

export interface GitWorktreeOptions {
  dryRun?: boolean;
  logger?: Logger;
}

/**
 * Parse `git worktree list --porcelain`. Entries are separated by blank lines;
 * the first one is the main worktree.
 */
export function parseWorktreeList(output: string): WorktreeInfo[] {
  const worktrees: WorktreeInfo[] = [];
  let current: WorktreeInfo | undefined;

  for (const line of output.split("\n")) {
    const trimmed = line.trimEnd();
    if (trimmed.startsWith("worktree ")) {
      if (current) worktrees.push(current);
      current = {
        path: trimmed.slice("worktree ".length),
        bare: false,
        detached: false,
        locked: false,
        prunable: false
      };
      continue;
    }
    if (!current || trimmed === "") continue;

    const [key, ...rest] = trimmed.split(" ");
    const value = rest.join(" ");
    if (key === "HEAD") current.head = value;
    if (key === "branch") current.branch = shortBranchName(value);
    if (key === "bare") current.bare = true;
    if (key === "detached") current.detached = true;
    if (key === "locked") current.locked = true;
    if (key === "prunable") current.prunable = true;
  }

  if (current) worktrees.push(current);
  return worktrees;
}

/**
 * The `git worktree` primitive. Every failure surfaces as a GitOperationError
 * carrying git's own stderr.
 */
export class GitWorktree {
  private readonly dryRun: boolean;
  private readonly logger: Logger;

  constructor(
    readonly cwd: string,
    options: GitWorktreeOptions = {}
  ) {
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  /** Root of the main worktree, even when called from a linked one. */
  async repoRoot(): Promise<string> {
    const commonDir = await this.commonDir();
    // a linked worktree's common dir is <main>/.git
    return basename(commonDir) === ".git" ? dirname(commonDir) : this.read(["rev-parse", "--show-toplevel"]);
  }

  /** Directory shared by all worktrees (the main `.git`). */
  async commonDir(): Promise<string> {
    const dir = await this.read(["rev-parse", "--git-common-dir"]);
    return isAbsolute(dir) ? dir : resolve(this.cwd, dir);
  }

  async branchExists(branch: string): Promise<boolean> {
    const result = await execa("git", ["show-ref", "--verify", "--quiet", `refs/heads/${branch}`], {
      cwd: this.cwd,
      reject: false
    });
    return result.exitCode === 0;
  }

  async add(path: string, branch: string, options: AddWorktreeOptions): Promise<WorktreeInfo> {
    const args = options.createBranch
      ? ["worktree", "add", "-b", branch, path, ...(options.base ? [options.base] : [])]
      : ["worktree", "add", path, branch];
    await this.mutate(args);
    if (this.dryRun) {
      return {path, branch, bare: false, detached: false, locked: false, prunable: false};
    }
    const created = (await this.list()).find((worktree) => worktree.path === path);
    return created ?? {path, branch, bare: false, detached: false, locked: false, prunable: false};
  }

  async remove(path: string, options: {force: boolean}): Promise<void> {
    await this.mutate(["worktree", "remove", ...(options.force ? ["--force"] : []), path]);
  }

  async list(): Promise<WorktreeInfo[]> {
    return parseWorktreeList(await this.read(["worktree", "list", "--porcelain"]));
  }

  /** Paths git would prune (or pruned, without dryRun). */
  async prune(options: {dryRun: boolean}): Promise<string[]> {
    const output = await this.read(["worktree", "prune", "--verbose", ...(options.dryRun ? ["--dry-run"] : [])], true);
    return output
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.startsWith("Removing "))
      .map((line) => line.slice("Removing ".length));
  }

  private async mutate(args: string[]): Promise<void> {
    if (this.dryRun) {
      this.logger.info(`[dry run] git ${args.join(" ")}`);
      return;
    }
    await this.read(args);
  }

  private async read(args: string[], mergeStderr = false): Promise<string> {
    this.logger.event("git.exec", {args: args.join(" "), cwd: this.cwd});
    const result = await execa("git", args, {cwd: this.cwd, reject: false, all: mergeStderr});
    if (result.exitCode === undefined) {
      throw new GitOperationError(args, "git could not be started; is it installed and on PATH?");
    }
    if (result.failed) {
      throw new GitOperationError(args, result.stderr || result.stdout);
    }
    return mergeStderr ? (result.all ?? result.stdout).trim() : result.stdout.trim();
  }
}
