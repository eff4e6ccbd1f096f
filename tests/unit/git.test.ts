import {describe, expect, it} from "vitest";
import {parseWorktreeList} from "../../src/git.js";
import {findWorktree} from "../../src/worktree.js";

const PORCELAIN = [
  "worktree /srv/repo",
  "HEAD 1111111111111111111111111111111111111111",
  "branch refs/heads/main",
  "",
  "worktree /srv/wt-feature",
  "HEAD 2222222222222222222222222222222222222222",
  "branch refs/heads/feature/login",
  "locked",
  "",
  "worktree /tmp/detached",
  "HEAD 3333333333333333333333333333333333333333",
  "detached",
  "prunable gitdir file points to non-existent location",
  ""
].join("\n");

describe("parseWorktreeList", () => {
  it("parses every entry", () => {
    expect(parseWorktreeList(PORCELAIN)).toEqual([
      {
        path: "/srv/repo",
        head: "1111111111111111111111111111111111111111",
        branch: "main",
        bare: false,
        detached: false,
        locked: false,
        prunable: false
      },
      {
        path: "/srv/wt-feature",
        head: "2222222222222222222222222222222222222222",
        branch: "feature/login",
        bare: false,
        detached: false,
        locked: true,
        prunable: false
      },
      {
        path: "/tmp/detached",
        head: "3333333333333333333333333333333333333333",
        bare: false,
        detached: true,
        locked: false,
        prunable: true
      }
    ]);
  });

  it("returns nothing for empty output", () => {
    expect(parseWorktreeList("")).toEqual([]);
  });

  it("marks bare repositories", () => {
    expect(parseWorktreeList("worktree /srv/bare.git\nbare\n")[0]?.bare).toBe(true);
  });
});

describe("findWorktree", () => {
  const worktrees = parseWorktreeList(PORCELAIN);

  it("matches by path, directory name or branch", () => {
    expect(findWorktree(worktrees, "/srv/wt-feature", "/")?.path).toBe("/srv/wt-feature");
    expect(findWorktree(worktrees, "../wt-feature", "/srv/repo")?.path).toBe("/srv/wt-feature");
    expect(findWorktree(worktrees, "detached", "/")?.path).toBe("/tmp/detached");
    expect(findWorktree(worktrees, "feature/login", "/")?.path).toBe("/srv/wt-feature");
  });

  it("never returns the main worktree", () => {
    expect(findWorktree(worktrees, "main", "/")).toBeUndefined();
    expect(findWorktree(worktrees, "/srv/repo", "/")).toBeUndefined();
  });
});
