import {existsSync, lstatSync, readFileSync, rmSync} from "node:fs";
import {join} from "node:path";
import {afterEach, beforeEach, describe, expect, it} from "vitest";
import {addWorktree} from "../../src/commands/add.js";
import {pruneWorktrees} from "../../src/commands/prune.js";
import {removeWorktree} from "../../src/commands/remove.js";
import {worktreeStatus} from "../../src/commands/status.js";
import {
  branchExists,
  commandOptions,
  createTestEnvFile,
  createTestRepo,
  listWorktreePaths,
  writeConfig,
  type TestRepo
} from "./setup.js";

const CONFIG = `
[[files]]
path = ".env"

[[hooks.post_add]]
command = "printf '%s' \\"$WTX_BRANCH\\" > branch.txt"
`;

describe("wtx add / remove", () => {
  let repo: TestRepo;

  beforeEach(() => {
    repo = createTestRepo("lifecycle");
    createTestEnvFile(repo.path);
    writeConfig(repo.path, CONFIG);
  });

  afterEach(() => {
    repo.cleanup();
  });

  it("creates the worktree, links .env and runs post-add hooks", async () => {
    const report = await addWorktree("../wt-feature", undefined, commandOptions(repo));
    const worktreePath = join(repo.root, "wt-feature");

    expect(report.succeeded).toBe(true);
    expect(report.exitCode).toBe(0);
    expect(report.gitOutcome).toEqual({success: true, message: `${worktreePath} on new branch wt-feature`});
    expect(branchExists(repo.path, "wt-feature")).toBe(true);
    expect(listWorktreePaths(repo.path)).toContain(worktreePath);

    const envPath = join(worktreePath, ".env");
    expect(lstatSync(envPath).isSymbolicLink()).toBe(true);
    expect(readFileSync(envPath, "utf-8")).toBe(readFileSync(join(repo.path, ".env"), "utf-8"));
    expect(readFileSync(join(worktreePath, "branch.txt"), "utf-8")).toBe("wt-feature");
    expect(report.results.map((result) => result.kind)).toEqual(["success", "success"]);
  });

  it("reports linked files through status", async () => {
    await addWorktree("../wt-feature", undefined, commandOptions(repo));

    const entries = await worktreeStatus(undefined, commandOptions(repo));

    expect(entries).toHaveLength(1);
    expect(entries[0]?.worktree.branch).toBe("wt-feature");
    expect(entries[0]?.statuses).toEqual([
      {effectType: "symlink", target: ".env", state: "ok", message: `linked to ${join(repo.path, ".env")}`}
    ]);
  });

  it("stops before git when a pre-add hook fails", async () => {
    writeConfig(repo.path, `${CONFIG}\n[[hooks.pre_add]]\ncommand = "exit 1"\n`);

    const report = await addWorktree("../wt-blocked", undefined, commandOptions(repo));

    expect(report.exitCode).toBe(1);
    expect(report.abortedPhase?.phase).toBe("pre-add");
    expect(report.gitOutcome).toBeUndefined();
    expect(existsSync(join(repo.root, "wt-blocked"))).toBe(false);
    expect(report.recommendations()).toContain(`The worktree at ${join(repo.root, "wt-blocked")} was not created.`);
  });

  it("runs no post-add effects when git fails", async () => {
    const report = await addWorktree("../wt-main", "main", commandOptions(repo));

    expect(report.gitOutcome?.success).toBe(false);
    expect(report.exitCode).toBe(1);
    expect(report.phaseOutcomes.map((outcome) => outcome.phase)).toEqual(["pre-add"]);
    expect(existsSync(join(repo.root, "wt-main", ".env"))).toBe(false);
  });

  it("keeps the worktree when post-add effects fail", async () => {
    writeConfig(repo.path, `${CONFIG}\n[[hooks.post_add]]\ncommand = "exit 7"\n`);

    const report = await addWorktree("../wt-broken", undefined, commandOptions(repo));

    expect(report.gitOutcome?.success).toBe(true);
    expect(report.exitCode).toBe(1);
    expect(report.abortedPhase?.abortedBy?.message).toBe("Hook `exit 7` exited with code 7");
    expect(existsSync(join(repo.root, "wt-broken"))).toBe(true);
  });

  it("removes the link before git removes the worktree", async () => {
    await addWorktree("../wt-feature", undefined, commandOptions(repo));
    const worktreePath = join(repo.root, "wt-feature");

    // branch.txt is untracked, so git refuses without --force
    const refused = await removeWorktree("wt-feature", {...commandOptions(repo), yes: true});
    expect(refused?.gitOutcome?.success).toBe(false);
    expect(existsSync(join(worktreePath, ".env"))).toBe(false);
    expect(existsSync(join(repo.path, ".env"))).toBe(true);

    const forced = await removeWorktree("wt-feature", {...commandOptions(repo), force: true});
    expect(forced?.succeeded).toBe(true);
    expect(existsSync(worktreePath)).toBe(false);
    expect(listWorktreePaths(repo.path)).toEqual([repo.path]);
  });

  it("leaves the worktree alone when the confirmation is declined", async () => {
    await addWorktree("../wt-feature", undefined, commandOptions(repo));

    const report = await removeWorktree("wt-feature", {...commandOptions(repo), confirm: async () => false});

    expect(report).toBeUndefined();
    expect(existsSync(join(repo.root, "wt-feature"))).toBe(true);
  });

  it("changes nothing in dry-run mode", async () => {
    const report = await addWorktree("../wt-dry", undefined, {...commandOptions(repo), dryRun: true});

    expect(report.succeeded).toBe(true);
    expect(existsSync(join(repo.root, "wt-dry"))).toBe(false);
    expect(branchExists(repo.path, "wt-dry")).toBe(false);
  });

  it("prunes worktrees whose directory was deleted", async () => {
    await addWorktree("../wt-gone", undefined, commandOptions(repo));
    rmSync(join(repo.root, "wt-gone"), {recursive: true, force: true});

    const preview = await pruneWorktrees({...commandOptions(repo), dryRun: true});
    expect(preview.dryRun).toBe(true);
    expect(preview.pruned).toHaveLength(1);
    expect(preview.pruned[0]).toContain("wt-gone");

    await pruneWorktrees(commandOptions(repo));
    expect(listWorktreePaths(repo.path)).toEqual([repo.path]);
  });
});
