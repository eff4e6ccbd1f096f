import {existsSync} from "node:fs";
import {mkdir, readFile, writeFile} from "node:fs/promises";
import {homedir} from "node:os";
import {dirname, join, resolve} from "node:path";
import {parse, stringify} from "smol-toml";
import {z} from "zod";
import {ConfigError, errorMessage} from "./errors.js";
import {DEFAULT_HOOK_TIMEOUT_SECONDS} from "./effects/hook.js";
import {emptyPlan, type EffectPlan, type HookDefinition} from "./effects/types.js";

export const CONFIG_FILE_NAMES = ["wtx.toml", ".wtx.toml"] as const;

const fileMappingSchema = z
  .object({
    path: z.string().min(1),
    target: z.string().min(1).optional(),
    mapping_type: z.enum(["symlink", "copy"]).default("symlink"),
    skip_if_exists: z.boolean().default(false),
    continue_on_error: z.boolean().default(true),
    description: z.string().optional()
  })
  .strict();

const hookSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    env: z.record(z.string()).default({}),
    timeout: z.number().int().positive().default(DEFAULT_HOOK_TIMEOUT_SECONDS),
    continue_on_error: z.boolean().default(false)
  })
  .strict();

const hooksSchema = z
  .object({
    pre_add: z.array(hookSchema).optional(),
    post_add: z.array(hookSchema).optional(),
    pre_remove: z.array(hookSchema).optional(),
    post_remove: z.array(hookSchema).optional(),
    pre_create: z.array(hookSchema).optional(),
    post_create: z.array(hookSchema).optional()
  })
  .strict();

export const configFileSchema = z
  .object({
    worktree_base: z.string().optional(),
    branch_prefix: z.string().optional(),
    error_handling: z.enum(["abort", "continue"]).optional(),
    lock_timeout: z.number().nonnegative().optional(),
    files: z.array(fileMappingSchema).optional(),
    hooks: hooksSchema.optional()
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
/** Shape accepted before defaults are applied, as written in TOML. */
export type ConfigFileInput = z.input<typeof configFileSchema>;
export type FileMapping = z.infer<typeof fileMappingSchema>;
export type HookConfig = z.infer<typeof hookSchema>;

export interface HookSet {
  preAdd: HookConfig[];
  postAdd: HookConfig[];
  preRemove: HookConfig[];
  postRemove: HookConfig[];
}

export interface WtxConfig {
  worktreeBase?: string;
  branchPrefix: string;
  errorHandling: "abort" | "continue";
  lockTimeoutSeconds: number;
  files: FileMapping[];
  hooks: HookSet;
  /** Files the values came from, project last. */
  sources: string[];
}

export const DEFAULT_LOCK_TIMEOUT_SECONDS = 10;

export function defaultConfig(): WtxConfig {
  return {
    branchPrefix: "",
    errorHandling: "abort",
    lockTimeoutSeconds: DEFAULT_LOCK_TIMEOUT_SECONDS,
    files: [],
    hooks: {preAdd: [], postAdd: [], preRemove: [], postRemove: []},
    sources: []
  };
}

function hookSetOf(file: ConfigFile): HookSet {
  const hooks = file.hooks;
  return {
    preAdd: [...(hooks?.pre_create ?? []), ...(hooks?.pre_add ?? [])],
    postAdd: [...(hooks?.post_create ?? []), ...(hooks?.post_add ?? [])],
    preRemove: hooks?.pre_remove ?? [],
    postRemove: hooks?.post_remove ?? []
  };
}

function hasHooks(hooks: HookSet): boolean {
  return Object.values(hooks).some((list: HookConfig[]) => list.length > 0);
}

/** Parse and validate one TOML document. */
export function parseConfig(content: string, path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config: ${errorMessage(error)}`, path, {cause: error});
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "(root)";
    throw new ConfigError(`Invalid config at ${where}: ${issue?.message ?? "unknown problem"}`, path);
  }
  return parsed.data;
}

export async function loadConfigFile(path: string): Promise<ConfigFile> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config: ${errorMessage(error)}`, path, {cause: error});
  }
  return parseConfig(content, path);
}

/**
 * Project values win; `files` and `hooks` are taken whole from the project
 * file when it declares any, otherwise from the global one.
 */
export function mergeConfig(base: WtxConfig, file: ConfigFile, source: string): WtxConfig {
  const hooks = hookSetOf(file);
  return {
    worktreeBase: file.worktree_base ?? base.worktreeBase,
    branchPrefix: file.branch_prefix ?? base.branchPrefix,
    errorHandling: file.error_handling ?? base.errorHandling,
    lockTimeoutSeconds: file.lock_timeout ?? base.lockTimeoutSeconds,
    files: file.files && file.files.length > 0 ? file.files : base.files,
    hooks: hasHooks(hooks) ? hooks : base.hooks,
    sources: [...base.sources, source]
  };
}

export function globalConfigPath(env: NodeJS.ProcessEnv = process.env, platform = process.platform): string {
  if (platform === "win32" && env.APPDATA) {
    return join(env.APPDATA, "wtx", "config.toml");
  }
  const configHome = env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(configHome, "wtx", "config.toml");
}

/** First `wtx.toml` or `.wtx.toml` from `start` upward. */
export function findProjectConfig(start: string): string | undefined {
  let current = resolve(start);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = join(current, name);
      if (existsSync(candidate)) return candidate;
    }
    const parent = dirname(current);
    if (parent === current) return undefined;
    current = parent;
  }
}

export interface LoadConfigOptions {
  /** Explicit `--config` file; replaces discovery of the project file. */
  explicitPath?: string;
  globalPath?: string;
}

export async function loadConfig(repoRoot: string, options: LoadConfigOptions = {}): Promise<WtxConfig> {
  let config = defaultConfig();

  const globalPath = options.globalPath ?? globalConfigPath();
  if (existsSync(globalPath)) {
    config = mergeConfig(config, await loadConfigFile(globalPath), globalPath);
  }

  const projectPath = options.explicitPath ? resolve(options.explicitPath) : findProjectConfig(repoRoot);
  if (projectPath) {
    if (!existsSync(projectPath)) {
      throw new ConfigError("Config file does not exist", projectPath);
    }
    config = mergeConfig(config, await loadConfigFile(projectPath), projectPath);
  }

  return config;
}

function hookDefinition(hook: HookConfig): HookDefinition {
  return {
    type: "hook",
    command: hook.command,
    args: hook.args,
    env: hook.env,
    continueOnError: hook.continue_on_error,
    timeoutSeconds: hook.timeout
  };
}

/**
 * Compile the configuration into per-phase effect definitions. Links come
 * before post-add hooks so the hooks can read them; pre-remove hooks run
 * before the links they might still need are taken down.
 */
export function buildEffectPlan(config: WtxConfig, overrides: {errorHandling?: "abort" | "continue"} = {}): EffectPlan {
  const plan = emptyPlan(overrides.errorHandling ?? config.errorHandling);

  plan.phases["pre-add"] = config.hooks.preAdd.map(hookDefinition);
  plan.phases["post-add"] = [
    ...config.files.map((file) => ({
      type: "symlink" as const,
      source: file.path,
      target: file.target ?? file.path,
      mappingType: file.mapping_type,
      skipIfExists: file.skip_if_exists,
      continueOnError: file.continue_on_error,
      description: file.description
    })),
    ...config.hooks.postAdd.map(hookDefinition)
  ];
  plan.phases["pre-remove"] = [
    ...config.hooks.preRemove.map(hookDefinition),
    ...config.files
      .filter((file) => file.mapping_type === "symlink")
      .map((file) => ({
        type: "symlink-removal" as const,
        source: file.path,
        target: file.target ?? file.path,
        continueOnError: true,
        description: file.description
      }))
  ];
  plan.phases["post-remove"] = config.hooks.postRemove.map(hookDefinition);

  return plan;
}

export function exampleConfig(): ConfigFileInput {
  return {
    branch_prefix: "",
    error_handling: "abort",
    files: [
      {
        path: ".env",
        mapping_type: "symlink",
        skip_if_exists: false,
        continue_on_error: true,
        description: "Shared environment variables"
      },
      {
        path: ".env.local",
        mapping_type: "copy",
        skip_if_exists: true,
        continue_on_error: true,
        description: "Per-worktree overrides"
      }
    ],
    hooks: {
      post_add: [
        {
          command: "echo",
          args: ["Worktree for {branch} created at {worktree_path}"],
          continue_on_error: true
        }
      ],
      pre_remove: [
        {
          command: "echo",
          args: ["Removing worktree {worktree_path}"],
          continue_on_error: true
        }
      ]
    }
  };
}

/** Write the example configuration; refuses to overwrite unless `force`. */
export async function initConfig(path: string, force: boolean): Promise<string> {
  const target = resolve(path);
  if (existsSync(target) && !force) {
    throw new ConfigError("Config file already exists; use --force to overwrite", target);
  }
  await mkdir(dirname(target), {recursive: true});
  await writeFile(target, `${stringify(exampleConfig())}\n`);
  return target;
}
