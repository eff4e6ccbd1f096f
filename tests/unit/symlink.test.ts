import {
  chmodSync,
  existsSync,
  lstatSync,
  mkdirSync,
  readFileSync,
  readlinkSync,
  statSync,
  symlinkSync,
  writeFileSync
} from "node:fs";
import {join} from "node:path";
import {afterEach, beforeEach, describe, expect, it} from "vitest";
import {EffectCriticalError} from "../../src/errors.js";
import {createLinkStrategy} from "../../src/effects/link-strategy.js";
import {FALLBACK_NOTE, resolveTarget, SymlinkEffect, SymlinkRemovalEffect} from "../../src/effects/symlink.js";
import type {SymlinkDefinition} from "../../src/effects/types.js";
import {createSandbox, deniedStrategy, engineDeps, type Sandbox} from "./helpers.js";

function definition(overrides: Partial<SymlinkDefinition> = {}): SymlinkDefinition {
  return {
    type: "symlink",
    source: ".env",
    target: ".env",
    mappingType: "symlink",
    skipIfExists: false,
    continueOnError: true,
    ...overrides
  };
}

describe("SymlinkEffect", () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    sandbox = createSandbox();
    writeFileSync(join(sandbox.source, ".env"), "API_KEY=test-secret\n");
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  it("links the source into the worktree", async () => {
    const effect = new SymlinkEffect(definition(), engineDeps());
    const target = join(sandbox.worktree, ".env");

    const outcome = await effect.apply(sandbox.context);

    expect(outcome).toEqual({message: `linked .env -> ${join(sandbox.source, ".env")}`});
    expect(lstatSync(target).isSymbolicLink()).toBe(true);
    expect(readlinkSync(target)).toBe(join(sandbox.source, ".env"));
    expect(readFileSync(target)).toEqual(readFileSync(join(sandbox.source, ".env")));
  });

  it("creates missing parent directories of the target", async () => {
    const effect = new SymlinkEffect(definition({target: "config/local/.env"}), engineDeps());

    await effect.apply(sandbox.context);

    expect(lstatSync(join(sandbox.worktree, "config/local/.env")).isSymbolicLink()).toBe(true);
  });

  it("is idempotent with skip_if_exists", async () => {
    const effect = new SymlinkEffect(definition({skipIfExists: true}), engineDeps());

    await effect.apply(sandbox.context);
    const second = await effect.apply(sandbox.context);

    expect(second).toEqual({skipped: true, message: ".env already exists"});
    expect(readlinkSync(join(sandbox.worktree, ".env"))).toBe(join(sandbox.source, ".env"));
  });

  it("replaces an existing file without skip_if_exists", async () => {
    writeFileSync(join(sandbox.worktree, ".env"), "stale\n");
    const effect = new SymlinkEffect(definition(), engineDeps());

    await effect.apply(sandbox.context);

    expect(readFileSync(join(sandbox.worktree, ".env"), "utf-8")).toBe("API_KEY=test-secret\n");
  });

  it("cannot apply when the source is missing", async () => {
    const effect = new SymlinkEffect(definition({source: ".env.missing"}), engineDeps());

    expect(await effect.canApply(sandbox.context)).toBe(false);
  });

  it("copies in copy mode", async () => {
    const effect = new SymlinkEffect(definition({mappingType: "copy"}), engineDeps());
    const target = join(sandbox.worktree, ".env");

    const outcome = await effect.apply(sandbox.context);

    expect(outcome.message).toBe(`copied ${join(sandbox.source, ".env")} -> .env`);
    expect(lstatSync(target).isSymbolicLink()).toBe(false);
    expect(readFileSync(target, "utf-8")).toBe("API_KEY=test-secret\n");
  });

  describe("with a directory source", () => {
    const SCRIPT = "#!/bin/sh\necho ok\n";
    let toolsDir: string;

    beforeEach(() => {
      toolsDir = join(sandbox.source, "tools");
      mkdirSync(toolsDir);
      writeFileSync(join(toolsDir, "run.sh"), SCRIPT);
      chmodSync(join(toolsDir, "run.sh"), 0o755);
      chmodSync(toolsDir, 0o750);
    });

    it("links the directory", async () => {
      const effect = new SymlinkEffect(definition({source: "tools", target: "tools"}), engineDeps());
      const target = join(sandbox.worktree, "tools");

      const outcome = await effect.apply(sandbox.context);

      expect(outcome.message).toBe(`linked tools -> ${toolsDir}`);
      expect(lstatSync(target).isSymbolicLink()).toBe(true);
      expect(statSync(target).isDirectory()).toBe(true);
      expect(readFileSync(join(target, "run.sh"))).toEqual(readFileSync(join(toolsDir, "run.sh")));
    });

    it("copies the directory with its mode bits", async () => {
      const effect = new SymlinkEffect(definition({source: "tools", target: "tools", mappingType: "copy"}), engineDeps());
      const target = join(sandbox.worktree, "tools");

      await effect.apply(sandbox.context);

      expect(lstatSync(target).isDirectory()).toBe(true);
      expect(statSync(target).mode & 0o777).toBe(0o750);
      expect(lstatSync(join(target, "run.sh")).isFile()).toBe(true);
      expect(statSync(join(target, "run.sh")).mode & 0o777).toBe(0o755);
      expect(readFileSync(join(target, "run.sh"), "utf-8")).toBe(SCRIPT);
    });

    it("copies the directory when linking is not permitted", async () => {
      const effect = new SymlinkEffect(definition({source: "tools", target: "tools"}), engineDeps({strategy: deniedStrategy()}));
      const target = join(sandbox.worktree, "tools");

      const outcome = await effect.apply(sandbox.context);

      expect(outcome.fallback).toBe(true);
      expect(lstatSync(target).isDirectory()).toBe(true);
      expect(statSync(join(target, "run.sh")).mode & 0o777).toBe(0o755);
      expect(readFileSync(join(target, "run.sh"), "utf-8")).toBe(SCRIPT);
    });
  });

  it("falls back to a copy when linking is not permitted", async () => {
    const effect = new SymlinkEffect(definition(), engineDeps({strategy: deniedStrategy()}));
    const target = join(sandbox.worktree, ".env");

    const outcome = await effect.apply(sandbox.context);

    expect(outcome.fallback).toBe(true);
    expect(outcome.message).toBe(`copied ${join(sandbox.source, ".env")} -> .env ${FALLBACK_NOTE}`);
    expect(lstatSync(target).isSymbolicLink()).toBe(false);
    expect(readFileSync(target, "utf-8")).toBe("API_KEY=test-secret\n");
  });

  it("falls back to a copy when the strategy has no native links", async () => {
    const effect = new SymlinkEffect(definition(), engineDeps({strategy: createLinkStrategy({nativeSymlinks: false})}));

    const outcome = await effect.apply(sandbox.context);

    expect(outcome.fallback).toBe(true);
    expect(lstatSync(join(sandbox.worktree, ".env")).isFile()).toBe(true);
  });

  it("touches nothing in dry-run mode", async () => {
    const effect = new SymlinkEffect(definition(), engineDeps({options: {dryRun: true, verbose: false}}));

    const outcome = await effect.apply(sandbox.context);

    expect(outcome.message).toBe(`[dry run] would link ${join(sandbox.source, ".env")} -> .env`);
    expect(existsSync(join(sandbox.worktree, ".env"))).toBe(false);
  });

  it("rolls back the link it created", async () => {
    const effect = new SymlinkEffect(definition(), engineDeps());
    await effect.apply(sandbox.context);

    await effect.rollback();

    expect(existsSync(join(sandbox.worktree, ".env"))).toBe(false);
    expect(existsSync(join(sandbox.source, ".env"))).toBe(true);
  });

  it("reports the state of the target", async () => {
    const effect = new SymlinkEffect(definition(), engineDeps());
    expect((await effect.inspect(sandbox.context)).state).toBe("missing");

    await effect.apply(sandbox.context);
    expect(await effect.inspect(sandbox.context)).toEqual({
      effectType: "symlink",
      target: ".env",
      state: "ok",
      message: `linked to ${join(sandbox.source, ".env")}`
    });

    const copy = new SymlinkEffect(definition({target: ".env.copy"}), engineDeps({strategy: deniedStrategy()}));
    await copy.apply(sandbox.context);
    expect((await copy.inspect(sandbox.context)).message).toBe("regular copy instead of a link");
  });
});

describe("resolveTarget", () => {
  const sandbox = {
    branchName: "feature-x",
    worktreePath: "/tmp/wt",
    sourcePath: "/srv/repo"
  };

  it("keeps targets inside the worktree", () => {
    expect(resolveTarget("config/.env", sandbox)).toBe("/tmp/wt/config/.env");
    expect(() => resolveTarget("../outside", sandbox)).toThrow(EffectCriticalError);
    expect(() => resolveTarget("/etc/passwd", sandbox)).toThrow("Link target must be relative to the worktree: /etc/passwd");
  });
});

describe("SymlinkRemovalEffect", () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    sandbox = createSandbox();
    writeFileSync(join(sandbox.source, ".env"), "API_KEY=test-secret\n");
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  const removal = () =>
    new SymlinkRemovalEffect({type: "symlink-removal", source: ".env", target: ".env", continueOnError: true}, engineDeps());

  it("removes a link that points at the source", async () => {
    symlinkSync(join(sandbox.source, ".env"), join(sandbox.worktree, ".env"));

    expect(await removal().apply(sandbox.context)).toEqual({message: "removed link .env"});
    expect(existsSync(join(sandbox.worktree, ".env"))).toBe(false);
    expect(existsSync(join(sandbox.source, ".env"))).toBe(true);
  });

  it("keeps regular copies", async () => {
    writeFileSync(join(sandbox.worktree, ".env"), "edited in worktree\n");

    const outcome = await removal().apply(sandbox.context);

    expect(outcome).toEqual({skipped: true, message: ".env is not a link; left in place"});
    expect(readFileSync(join(sandbox.worktree, ".env"), "utf-8")).toBe("edited in worktree\n");
  });

  it("keeps links that point elsewhere", async () => {
    writeFileSync(join(sandbox.source, "other"), "x");
    symlinkSync(join(sandbox.source, "other"), join(sandbox.worktree, ".env"));

    const outcome = await removal().apply(sandbox.context);

    expect(outcome).toEqual({skipped: true, message: ".env links elsewhere; left in place"});
  });

  it("cannot apply when nothing is there", async () => {
    expect(await removal().canApply(sandbox.context)).toBe(false);
  });
});
