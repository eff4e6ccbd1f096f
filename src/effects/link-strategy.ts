import {chmod, cp, lstat, mkdir, stat, symlink, unlink} from "node:fs/promises";
import {dirname} from "node:path";
import {isErrnoException} from "../errors.js";

export type LinkKind = "file" | "dir";

/**
 * Platform capability behind every link the engine creates. One instance is
 * picked by `createLinkStrategy` at start-up and injected into the effects.
 */
export interface LinkStrategy {
  readonly platform: NodeJS.Platform;
  readonly supportsNativeSymlink: boolean;
  createLink(source: string, target: string, kind: LinkKind): Promise<void>;
  /** Remove `target` if it is a link. Resolves to whether anything was removed. */
  removeLink(target: string): Promise<boolean>;
  isLink(target: string): Promise<boolean>;
}

const PRIVILEGE_ERROR_CODES = new Set(["EPERM", "EACCES", "ENOTSUP", "EOPNOTSUPP", "ENOSYS", "EXDEV"]);

/** Errors after which a copy is attempted instead of a link. */
export function isPrivilegeError(error: unknown): boolean {
  return isErrnoException(error) && error.code !== undefined && PRIVILEGE_ERROR_CODES.has(error.code);
}

export async function pathKind(path: string): Promise<LinkKind | undefined> {
  try {
    const info = await stat(path);
    return info.isDirectory() ? "dir" : "file";
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return undefined;
    }
    throw error;
  }
}

/** True when anything, including a dangling link, sits at `path`. */
export async function entryExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

async function isSymbolicLink(target: string): Promise<boolean> {
  try {
    return (await lstat(target)).isSymbolicLink();
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return false;
    throw error;
  }
}

/** Copy a file or directory tree, keeping mode bits and timestamps. */
export async function copyPath(source: string, target: string): Promise<void> {
  await mkdir(dirname(target), {recursive: true});
  await cp(source, target, {recursive: true, dereference: true, preserveTimestamps: true, force: true});
  const {mode} = await stat(source);
  await chmod(target, mode & 0o7777);
}

class PosixLinkStrategy implements LinkStrategy {
  constructor(
    readonly platform: NodeJS.Platform,
    readonly supportsNativeSymlink: boolean
  ) {}

  async createLink(source: string, target: string): Promise<void> {
    await mkdir(dirname(target), {recursive: true});
    await symlink(source, target);
  }

  async removeLink(target: string): Promise<boolean> {
    if (!(await isSymbolicLink(target))) return false;
    await unlink(target);
    return true;
  }

  isLink(target: string): Promise<boolean> {
    return isSymbolicLink(target);
  }
}

/**
 * Directories become junctions, which need no privilege. File links need
 * Developer Mode or an elevated shell; without either Windows answers EPERM
 * and the caller falls back to a copy.
 */
class WindowsLinkStrategy implements LinkStrategy {
  readonly platform = "win32";

  constructor(readonly supportsNativeSymlink: boolean) {}

  async createLink(source: string, target: string, kind: LinkKind): Promise<void> {
    await mkdir(dirname(target), {recursive: true});
    await symlink(source, target, kind === "dir" ? "junction" : "file");
  }

  async removeLink(target: string): Promise<boolean> {
    if (!(await isSymbolicLink(target))) return false;
    await unlink(target);
    return true;
  }

  isLink(target: string): Promise<boolean> {
    return isSymbolicLink(target);
  }
}

export interface LinkStrategyOptions {
  platform?: NodeJS.Platform;
  /** Force copies everywhere, e.g. for file systems without link support. */
  nativeSymlinks?: boolean;
}

export function createLinkStrategy(options: LinkStrategyOptions = {}): LinkStrategy {
  const platform = options.platform ?? process.platform;
  if (platform === "win32") {
    return new WindowsLinkStrategy(options.nativeSymlinks ?? true);
  }
  return new PosixLinkStrategy(platform, options.nativeSymlinks ?? true);
}
