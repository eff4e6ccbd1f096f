import type {WorktreeContext} from "../worktree.js";

export const PLACEHOLDERS = {
  branch: (context: WorktreeContext) => context.branchName,
  worktree_path: (context: WorktreeContext) => context.worktreePath,
  source_path: (context: WorktreeContext) => context.sourcePath
} as const;

export type Placeholder = keyof typeof PLACEHOLDERS;

function isPlaceholder(name: string): name is Placeholder {
  return Object.prototype.hasOwnProperty.call(PLACEHOLDERS, name);
}

/**
 * Replace `{branch}`, `{worktree_path}` and `{source_path}` with context values.
 * Unknown `{names}` stay as written.
 */
export function renderTemplate(template: string, context: WorktreeContext): string {
  return template.replace(/\{([a-z_]+)\}/g, (match, name: string) =>
    isPlaceholder(name) ? PLACEHOLDERS[name](context) : match
  );
}

export function renderAll(values: string[], context: WorktreeContext): string[] {
  return values.map((value) => renderTemplate(value, context));
}
