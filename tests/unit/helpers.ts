import {mkdirSync, mkdtempSync, realpathSync, rmSync} from "node:fs";
import {tmpdir} from "node:os";
import {join} from "node:path";
import type {EffectDeps} from "../../src/effects/chain.js";
import {createLinkStrategy, type LinkStrategy} from "../../src/effects/link-strategy.js";
import {createWorktreeContext, type WorktreeContext} from "../../src/worktree.js";

export interface Sandbox {
  source: string;
  worktree: string;
  context: WorktreeContext;
  cleanup: () => void;
}

/** A fake repository root and an (already created) worktree directory beside it. */
export function createSandbox(branchName = "feature-x"): Sandbox {
  const root = realpathSync(mkdtempSync(join(tmpdir(), "wtx-unit-")));
  const source = join(root, "repo");
  const worktree = join(root, "wt");
  mkdirSync(source);
  mkdirSync(worktree);
  return {
    source,
    worktree,
    context: createWorktreeContext({branchName, worktreePath: worktree, sourcePath: source}),
    cleanup: () => rmSync(root, {recursive: true, force: true})
  };
}

export function engineDeps(overrides: Partial<EffectDeps> = {}): EffectDeps {
  return {
    strategy: createLinkStrategy(),
    options: {dryRun: false, verbose: false},
    ...overrides
  };
}

/** Strategy whose link creation always fails the way an unprivileged Windows shell does. */
export function deniedStrategy(): LinkStrategy {
  const real = createLinkStrategy();
  return {
    platform: "win32",
    supportsNativeSymlink: true,
    createLink: async () => {
      throw Object.assign(new Error("EPERM: operation not permitted, symlink"), {code: "EPERM"});
    },
    removeLink: (target) => real.removeLink(target),
    isLink: (target) => real.isLink(target)
  };
}
