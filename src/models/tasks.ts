/**
 * tasks.ts
 * Normalized task tree extracted from playbooks, role task files and
 * included task files.
 *
 * Every raw task declaration becomes exactly one TaskNode. Variants are
 * discriminated by `kind`; consumers switch on it instead of probing the
 * raw mapping for keys.
 */

// ---------------------------------------------------------------------------
// Shared metadata
// ---------------------------------------------------------------------------

/** Metadata normalized from the raw declaration, present on every variant. */
export interface TaskMeta {
  /** Task name as written, or "unnamed_task". */
  name: string;
  /** Conditions from `when` (empty when absent). */
  when: string[];
  /** Tags from `tags` (empty when absent). */
  tags: string[];
  /** True only when `become` was truthy. */
  become: boolean;
  /** Set only when `become` was truthy and `become_user` given. */
  becomeUser?: string;
  /** Handler names from `notify` (empty when absent). */
  notify: string[];
}

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

export interface PlainTask extends TaskMeta {
  kind: 'Plain';
}

/** `block` with its `rescue` and `always` sections flattened in that order. */
export interface BlockTask extends TaskMeta {
  kind: 'Block';
  children: TaskNode[];
}

/** `include_role` / `import_role`. */
export interface RoleRefTask extends TaskMeta {
  kind: 'RoleRef';
  roleName: string;
}

/** `include_tasks` / `import_tasks`, expanded in place. */
export interface IncludeTask extends TaskMeta {
  kind: 'Include';
  /** File reference as written in the task. */
  file: string;
  /** Absolute path the reference resolved to, when one was found. */
  resolvedPath?: string;
  included: TaskNode[];
}

export type TaskNode = PlainTask | BlockTask | RoleRefTask | IncludeTask;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Depth-first visit of a task list, descending into blocks and includes. */
export function walkTasks(tasks: readonly TaskNode[], visit: (task: TaskNode) => void): void {
  for (const task of tasks) {
    visit(task);
    if (task.kind === 'Block') {
      walkTasks(task.children, visit);
    } else if (task.kind === 'Include') {
      walkTasks(task.included, visit);
    }
  }
}

/** Role names referenced by RoleRef nodes anywhere in the tree, in visit order. */
export function collectRoleRefs(tasks: readonly TaskNode[]): string[] {
  const names: string[] = [];
  walkTasks(tasks, (task) => {
    if (task.kind === 'RoleRef') names.push(task.roleName);
  });
  return names;
}
