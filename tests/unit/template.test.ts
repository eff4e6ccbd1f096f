import {describe, expect, it} from "vitest";
import {renderAll, renderTemplate} from "../../src/effects/template.js";
import {createWorktreeContext} from "../../src/worktree.js";

const context = createWorktreeContext({branchName: "feature-x", worktreePath: "/tmp/wt", sourcePath: "/srv/repo"});

describe("renderTemplate", () => {
  it("substitutes the known placeholders", () => {
    expect(renderTemplate("echo {branch} {worktree_path}", context)).toBe("echo feature-x /tmp/wt");
    expect(renderTemplate("{source_path}/.env", context)).toBe("/srv/repo/.env");
  });

  it("leaves unknown placeholders as written", () => {
    expect(renderTemplate("echo {unknown} {Branch} {branch}", context)).toBe("echo {unknown} {Branch} feature-x");
  });

  it("renders every value of a list", () => {
    expect(renderAll(["--name", "{branch}"], context)).toEqual(["--name", "feature-x"]);
  });
});

describe("createWorktreeContext", () => {
  it("is frozen", () => {
    expect(Object.isFrozen(context)).toBe(true);
  });
});
