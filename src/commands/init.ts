import {join} from "node:path";
import {CONFIG_FILE_NAMES, initConfig} from "../config.js";
import {GitWorktree} from "../git.js";

export interface InitOptions {
  cwd?: string;
  path?: string;
  force?: boolean;
}

/** Write an example `wtx.toml` at the repository root, or at `--path`. */
export async function initProject(options: InitOptions = {}): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  const target = options.path ?? join(await new GitWorktree(cwd).repoRoot(), CONFIG_FILE_NAMES[0]);
  return initConfig(target, options.force ?? false);
}
