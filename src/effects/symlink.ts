import {readlink, rm, unlink, lstat} from "node:fs/promises";
import {isAbsolute, normalize, relative, resolve, sep} from "node:path";
import {EffectCriticalError, EffectRecoverableError, EffectWarning, errorMessage} from "../errors.js";
import {silentLogger, type Logger} from "../utils/logger.js";
import type {WorktreeContext} from "../worktree.js";
import {copyPath, entryExists, isPrivilegeError, pathKind, type LinkStrategy} from "./link-strategy.js";
import {renderTemplate} from "./template.js";
import type {
  Effect,
  EffectOutcome,
  EngineOptions,
  SideEffectStatus,
  SymlinkDefinition,
  SymlinkRemovalDefinition
} from "./types.js";

export interface SymlinkEffectDeps {
  strategy: LinkStrategy;
  options: EngineOptions;
  logger?: Logger;
}

export const FALLBACK_NOTE = "(fallback: copy used)";

/** Relative sources hang off the repository root; absolute ones are kept. */
export function resolveSource(template: string, context: WorktreeContext): string {
  const rendered = renderTemplate(template, context);
  return isAbsolute(rendered) ? normalize(rendered) : resolve(context.sourcePath, rendered);
}

/** Targets always live inside the worktree. */
export function resolveTarget(template: string, context: WorktreeContext): string {
  const rendered = renderTemplate(template, context);
  if (isAbsolute(rendered)) {
    throw new EffectCriticalError(`Link target must be relative to the worktree: ${rendered}`);
  }
  const target = resolve(context.worktreePath, rendered);
  const fromRoot = relative(context.worktreePath, target);
  if (fromRoot === "" || fromRoot === ".." || fromRoot.startsWith(`..${sep}`)) {
    throw new EffectCriticalError(`Link target escapes the worktree: ${rendered}`);
  }
  return target;
}

/** Whether `target` is a link whose destination is `source`. */
async function linksTo(target: string, source: string): Promise<boolean> {
  const destination = await readlink(target);
  return resolve(target, "..", destination) === source;
}

export class SymlinkEffect implements Effect {
  readonly effectType = "symlink";
  readonly continueOnError: boolean;
  private readonly logger: Logger;
  private created: {target: string; as: "link" | "copy"} | undefined;

  constructor(
    private readonly definition: SymlinkDefinition,
    private readonly deps: SymlinkEffectDeps
  ) {
    this.continueOnError = definition.continueOnError;
    this.logger = deps.logger ?? silentLogger;
  }

  describe(context: WorktreeContext): string {
    const verb = this.definition.mappingType === "copy" ? "copy" : "link";
    return `${verb} ${renderTemplate(this.definition.target, context)}`;
  }

  async canApply(context: WorktreeContext): Promise<boolean> {
    return (await pathKind(resolveSource(this.definition.source, context))) !== undefined;
  }

  async apply(context: WorktreeContext): Promise<EffectOutcome> {
    const source = resolveSource(this.definition.source, context);
    const target = resolveTarget(this.definition.target, context);
    const shown = relative(context.worktreePath, target);

    if (this.definition.skipIfExists && (await entryExists(target))) {
      return {skipped: true, message: `${shown} already exists`};
    }

    if (this.deps.options.dryRun) {
      const verb = this.definition.mappingType === "copy" ? "copy" : "link";
      return {message: `[dry run] would ${verb} ${source} -> ${shown}`};
    }

    if (this.definition.mappingType === "copy") {
      await this.clearLinkAt(target);
      await copyPath(source, target);
      this.created = {target, as: "copy"};
      return {message: `copied ${source} -> ${shown}`};
    }

    await this.clearEntryAt(target);
    try {
      await this.createNativeLink(source, target);
      this.created = {target, as: "link"};
      return {message: `linked ${shown} -> ${source}`};
    } catch (error) {
      if (!(error instanceof EffectRecoverableError)) throw error;
      this.logger.event("effect.fallback", {target: shown, reason: error.message});
      await copyPath(source, target);
      this.created = {target, as: "copy"};
      return {message: `copied ${source} -> ${shown} ${FALLBACK_NOTE}`, fallback: true};
    }
  }

  async rollback(): Promise<void> {
    if (!this.created) return;
    const {target, as} = this.created;
    if (as === "link") {
      await this.deps.strategy.removeLink(target);
    } else {
      await rm(target, {recursive: true, force: true});
    }
    this.created = undefined;
  }

  async inspect(context: WorktreeContext): Promise<SideEffectStatus> {
    const source = resolveSource(this.definition.source, context);
    const target = resolveTarget(this.definition.target, context);
    const shown = relative(context.worktreePath, target);
    const status = (state: SideEffectStatus["state"], message: string): SideEffectStatus => ({
      effectType: this.effectType,
      target: shown,
      state,
      message
    });

    const sourceExists = (await pathKind(source)) !== undefined;
    if (!(await entryExists(target))) {
      return status("missing", sourceExists ? "not present in worktree" : `source ${source} does not exist`);
    }

    const isLink = await this.deps.strategy.isLink(target);
    if (this.definition.mappingType === "copy") {
      return isLink ? status("warning", "expected a copy but found a link") : status("ok", "copy present");
    }
    if (!isLink) {
      return status("warning", "regular copy instead of a link");
    }
    if (!sourceExists) {
      return status("error", `broken link: ${source} does not exist`);
    }
    if (!(await linksTo(target, source))) {
      return status("warning", `link points away from ${source}`);
    }
    return status("ok", `linked to ${source}`);
  }

  private async createNativeLink(source: string, target: string): Promise<void> {
    const {strategy} = this.deps;
    if (!strategy.supportsNativeSymlink) {
      throw new EffectRecoverableError(`native links are unavailable on ${strategy.platform}`);
    }
    const kind = await pathKind(source);
    if (kind === undefined) {
      throw new EffectCriticalError(`Source disappeared: ${source}`);
    }
    try {
      await strategy.createLink(source, target, kind);
    } catch (error) {
      if (isPrivilegeError(error)) {
        throw new EffectRecoverableError(errorMessage(error), {cause: error});
      }
      throw new EffectCriticalError(`Failed to link ${target}: ${errorMessage(error)}`, {cause: error});
    }
  }

  /** Copies must not write through a stale link into the shared source. */
  private async clearLinkAt(target: string): Promise<void> {
    await this.deps.strategy.removeLink(target);
  }

  private async clearEntryAt(target: string): Promise<void> {
    if (await this.deps.strategy.removeLink(target)) return;
    if (!(await entryExists(target))) return;
    const info = await lstat(target);
    if (info.isDirectory()) {
      throw new EffectCriticalError(
        `${target} is an existing directory; set skip_if_exists or remove it first`
      );
    }
    await unlink(target);
  }
}

/**
 * Pre-remove counterpart of a symlink mapping. Only a link that still points
 * at the configured source is deleted; copies are left alone since they may
 * hold edits made inside the worktree.
 */
export class SymlinkRemovalEffect implements Effect {
  readonly effectType = "symlink-removal";
  readonly continueOnError: boolean;

  constructor(
    private readonly definition: SymlinkRemovalDefinition,
    private readonly deps: SymlinkEffectDeps
  ) {
    this.continueOnError = definition.continueOnError;
  }

  describe(context: WorktreeContext): string {
    return `unlink ${renderTemplate(this.definition.target, context)}`;
  }

  canApply(context: WorktreeContext): Promise<boolean> {
    return entryExists(resolveTarget(this.definition.target, context));
  }

  async apply(context: WorktreeContext): Promise<EffectOutcome> {
    const source = resolveSource(this.definition.source, context);
    const target = resolveTarget(this.definition.target, context);
    const shown = relative(context.worktreePath, target);

    if (!(await this.deps.strategy.isLink(target))) {
      return {skipped: true, message: `${shown} is not a link; left in place`};
    }
    if (!(await linksTo(target, source))) {
      return {skipped: true, message: `${shown} links elsewhere; left in place`};
    }
    if (this.deps.options.dryRun) {
      return {message: `[dry run] would remove link ${shown}`};
    }
    try {
      await this.deps.strategy.removeLink(target);
    } catch (error) {
      throw new EffectWarning(`Failed to remove link ${shown}: ${errorMessage(error)}`, {cause: error});
    }
    return {message: `removed link ${shown}`};
  }
}
