#!/usr/bin/env node
import {Command, Option} from "commander";
import {addWorktree} from "./commands/add.js";
import {initProject} from "./commands/init.js";
import {listWorktrees} from "./commands/list.js";
import {pruneWorktrees} from "./commands/prune.js";
import {removeWorktree} from "./commands/remove.js";
import {formatConfig, loadEffectiveConfig} from "./commands/show-config.js";
import {worktreeStatus} from "./commands/status.js";
import {errorMessage} from "./errors.js";
import {formatReport, formatStatus, formatWorktrees, OUTPUT_FORMATS, parseOutputFormat} from "./utils/output.js";

interface EffectCommandOptions {
  config?: string;
  dryRun?: boolean;
  onError?: string;
  wait?: boolean;
  verbose?: boolean;
  format: string;
}

const formatOption = () =>
  new Option("--format <format>", "Output format").choices([...OUTPUT_FORMATS]).default("table");

function withEffectOptions(command: Command): Command {
  return command
    .option("-c, --config <file>", "Use this config file instead of discovering wtx.toml")
    .option("--dry-run", "Show what would happen without touching git or the filesystem")
    .addOption(new Option("--on-error <policy>", "What a critical effect failure does").choices(["abort", "continue"]))
    .option("--no-wait", "Fail at once when another wtx holds the repository lock")
    .addOption(formatOption())
    .option("-v, --verbose", "Log every effect and git call");
}

const program = new Command();

program
  .name("wtx")
  .description("Manage git worktrees with the links and hooks each one needs")
  .version("0.1.0");

withEffectOptions(
  program
    .command("add")
    .alias("create")
    .description("Create a worktree and run its pre-add and post-add effects")
    .argument("<path>", "Worktree directory, or a bare name placed under worktree_base")
    .argument("[branch]", "Branch to check out or create (defaults to the directory name)")
    .option("-b, --base <ref>", "Start point for a new branch")
    .option("--print-path", "Print only the worktree path on stdout")
    .option("--cd-command", "Print a cd command for the new worktree on stdout")
    .option("--undo-on-abort", "Undo applied post-add effects when that phase aborts")
).action(
  async (
    path: string,
    branch: string | undefined,
    options: EffectCommandOptions & {base?: string; printPath?: boolean; cdCommand?: boolean; undoOnAbort?: boolean}
  ) => {
    const report = await addWorktree(path, branch, options);
    const format = parseOutputFormat(options.format);
    if (options.printPath || options.cdCommand) {
      console.error(formatReport(report, format));
      if (report.succeeded) {
        console.log(options.cdCommand ? `cd ${JSON.stringify(report.worktreePath)}` : report.worktreePath);
      }
    } else {
      console.log(formatReport(report, format));
    }
    process.exitCode = report.exitCode;
  }
);

program
  .command("list")
  .alias("ls")
  .description("List worktrees of the repository")
  .addOption(formatOption())
  .action(async (options: {format: string}) => {
    console.log(formatWorktrees(await listWorktrees(), parseOutputFormat(options.format)));
  });

withEffectOptions(
  program
    .command("remove")
    .aliases(["rm", "delete"])
    .description("Run pre-remove effects, remove a worktree, then run post-remove hooks")
    .argument("<worktree>", "Worktree path, directory name or branch")
    .option("-f, --force", "Remove even with local changes; skips confirmation")
    .option("-y, --yes", "Skip confirmation")
).action(async (worktree: string, options: EffectCommandOptions & {force?: boolean; yes?: boolean}) => {
  const report = await removeWorktree(worktree, options);
  if (!report) {
    console.log("Aborted.");
    return;
  }
  console.log(formatReport(report, parseOutputFormat(options.format)));
  process.exitCode = report.exitCode;
});

program
  .command("status")
  .description("Check the configured links and copies of one or all worktrees")
  .argument("[worktree]", "Worktree path, directory name or branch")
  .option("-c, --config <file>", "Use this config file instead of discovering wtx.toml")
  .addOption(formatOption())
  .action(async (worktree: string | undefined, options: {config?: string; format: string}) => {
    const entries = await worktreeStatus(worktree, {config: options.config});
    console.log(formatStatus(entries, parseOutputFormat(options.format)));
  });

program
  .command("prune")
  .description("Prune administrative data of worktrees whose directories are gone")
  .option("--dry-run", "Only report what would be pruned")
  .option("--no-wait", "Fail at once when another wtx holds the repository lock")
  .action(async (options: {dryRun?: boolean; wait?: boolean}) => {
    const result = await pruneWorktrees(options);
    if (result.pruned.length === 0) {
      console.log("No stale worktrees to prune.");
      return;
    }
    for (const entry of result.pruned) {
      console.log(`${result.dryRun ? "Would prune" : "Pruned"} ${entry}`);
    }
  });

program
  .command("init")
  .description("Write an example wtx.toml")
  .option("--path <file>", "Where to write the file (defaults to <repo>/wtx.toml)")
  .option("--force", "Overwrite an existing file")
  .action(async (options: {path?: string; force?: boolean}) => {
    const written = await initProject(options);
    console.log(`Wrote ${written}`);
  });

program
  .command("config")
  .description("Print the effective configuration")
  .option("-c, --config <file>", "Use this config file instead of discovering wtx.toml")
  .action(async (options: {config?: string}) => {
    console.log(formatConfig(await loadEffectiveConfig(options)));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
