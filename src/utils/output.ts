import chalk from "chalk";
import {getBorderCharacters, table} from "table";
import type {OperationReport} from "../effects/report.js";
import type {EffectResultKind, SideEffectState, SideEffectStatus} from "../effects/types.js";
import type {WorktreeInfo} from "../worktree.js";

export type OutputFormat = "table" | "json" | "simple";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json", "simple"];

export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.toLowerCase();
  const match = OUTPUT_FORMATS.find((format) => format === normalized);
  if (!match) {
    throw new Error(`Invalid output format: ${value} (expected ${OUTPUT_FORMATS.join(", ")})`);
  }
  return match;
}

function render(rows: string[][]): string {
  return table(rows, {
    border: getBorderCharacters("norc"),
    drawHorizontalLine: (lineIndex, rowCount) => lineIndex === 0 || lineIndex === 1 || lineIndex === rowCount
  }).trimEnd();
}

const KIND_LABELS: Record<EffectResultKind, string> = {
  success: chalk.green("ok"),
  skipped: chalk.gray("skipped"),
  warning: chalk.yellow("warning"),
  failure: chalk.red("failed")
};

const STATE_LABELS: Record<SideEffectState, string> = {
  ok: chalk.green("ok"),
  missing: chalk.yellow("missing"),
  warning: chalk.yellow("warning"),
  error: chalk.red("error")
};

export function formatWorktrees(worktrees: WorktreeInfo[], format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(worktrees, null, 2);
  }
  if (worktrees.length === 0) {
    return "No worktrees found.";
  }
  if (format === "simple") {
    return worktrees.map((worktree) => `${worktree.path}\t${worktree.branch ?? "(detached)"}`).join("\n");
  }
  const rows = [
    ["Path", "Branch", "HEAD", "State"],
    ...worktrees.map((worktree) => [
      worktree.path,
      worktree.branch ?? "(detached)",
      worktree.head?.slice(0, 8) ?? "-",
      [worktree.locked ? "locked" : "", worktree.prunable ? "prunable" : ""].filter(Boolean).join(",") || "-"
    ])
  ];
  return render(rows);
}

export function formatStatus(
  entries: {worktree: WorktreeInfo; statuses: SideEffectStatus[]}[],
  format: OutputFormat
): string {
  if (format === "json") {
    return JSON.stringify(
      entries.map(({worktree, statuses}) => ({path: worktree.path, branch: worktree.branch ?? null, effects: statuses})),
      null,
      2
    );
  }
  const flat = entries.flatMap(({worktree, statuses}) =>
    statuses.map((status) => ({worktree: worktree.branch ?? worktree.path, ...status}))
  );
  if (flat.length === 0) {
    return "No managed files configured.";
  }
  if (format === "simple") {
    return flat.map((entry) => `${entry.worktree}\t${entry.target}\t${entry.state}\t${entry.message}`).join("\n");
  }
  return render([
    ["Worktree", "Target", "State", "Detail"],
    ...flat.map((entry) => [entry.worktree, entry.target, STATE_LABELS[entry.state], entry.message])
  ]);
}

export function formatReport(report: OperationReport, format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(report, null, 2);
  }

  const lines: string[] = [];
  const git = report.gitOutcome;
  if (git) {
    lines.push(`${git.success ? chalk.green("✓") : chalk.red("✗")} git worktree ${report.operation}: ${git.message}`);
  }

  const results = report.results;
  if (format === "simple") {
    for (const result of results) {
      lines.push(`${result.phase}\t${result.kind}\t${result.label}\t${result.message}`);
    }
  } else if (results.length > 0) {
    lines.push(
      render([
        ["Phase", "Effect", "Status", "Detail"],
        ...results.map((result) => [result.phase, result.label, KIND_LABELS[result.kind], result.message])
      ])
    );
  }

  const {warnings, failures} = report.buckets();
  if (warnings.length > 0 || failures.length > 0) {
    lines.push(`${warnings.length} warning(s), ${failures.length} failure(s)`);
  }
  for (const step of report.recommendations()) {
    lines.push(chalk.yellow(`→ ${step}`));
  }
  return lines.join("\n");
}
