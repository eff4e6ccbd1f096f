import {stringify} from "smol-toml";
import type {WtxConfig} from "../config.js";
import {openSession, type CommonOptions} from "./session.js";

export async function loadEffectiveConfig(options: CommonOptions = {}): Promise<WtxConfig> {
  const session = await openSession(options);
  return session.config;
}

/** The merged configuration as TOML, headed by the files it was read from. */
export function formatConfig(config: WtxConfig): string {
  const sources = config.sources.length > 0 ? config.sources.map((source) => `# from ${source}`) : ["# defaults only"];
  const hooks = {
    pre_add: config.hooks.preAdd,
    post_add: config.hooks.postAdd,
    pre_remove: config.hooks.preRemove,
    post_remove: config.hooks.postRemove
  };
  const document = {
    ...(config.worktreeBase !== undefined ? {worktree_base: config.worktreeBase} : {}),
    branch_prefix: config.branchPrefix,
    error_handling: config.errorHandling,
    lock_timeout: config.lockTimeoutSeconds,
    files: config.files,
    hooks
  };
  return `${sources.join("\n")}\n${stringify(document)}`;
}
