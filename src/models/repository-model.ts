/**
 * repository-model.ts
 * Aggregate model of one configuration repository: inventory groups,
 * playbooks with their plays, and the resolved role set.
 *
 * Built once by RepositoryModelBuilder and read-only afterwards. All maps and
 * sets keep insertion order, which is what makes diagram output
 * deterministic.
 */

import type { TaskNode } from './tasks.js';

// ---------------------------------------------------------------------------
// Inventory
// ---------------------------------------------------------------------------

/** Group name → hosts declared directly in that group. */
export type GroupMap = Map<string, string[]>;

// ---------------------------------------------------------------------------
// Playbooks
// ---------------------------------------------------------------------------

export interface Play {
  /** Target host pattern as written (list patterns joined with ","). */
  hosts?: string;
  /** Roles listed under `roles`, in order. */
  roles: string[];
  /** pre_tasks ++ tasks ++ post_tasks. */
  tasks: TaskNode[];
  /** Handler names. */
  handlers: string[];
  become?: true;
  becomeUser?: string;
  tags?: string[];
}

export interface Playbook {
  /** Absolute, normalized path. Identity of the playbook. */
  path: string;
  /** File basename, used for display and node ids. */
  name: string;
  plays: Play[];
  /** Absolute paths of `import_playbook` targets that exist on disk. */
  importedPlaybooks: string[];
}

// ---------------------------------------------------------------------------
// Aggregate
// ---------------------------------------------------------------------------

export interface RepositoryModel {
  readonly groups: ReadonlyMap<string, readonly string[]>;
  /** Keyed by absolute playbook path. */
  readonly playbooks: ReadonlyMap<string, Playbook>;
  readonly roles: ReadonlySet<string>;
  readonly roleTasks: ReadonlyMap<string, readonly TaskNode[]>;
  readonly roleDependencies: ReadonlyMap<string, readonly string[]>;
}

export interface RepositoryModelStats {
  groups: number;
  hosts: number;
  playbooks: number;
  plays: number;
  tasks: number;
  roles: number;
}
