/**
 * models/index.ts
 * Barrel export for the model package.
 */

export type {
  TaskMeta,
  PlainTask,
  BlockTask,
  RoleRefTask,
  IncludeTask,
  TaskNode,
} from './tasks.js';

export { walkTasks, collectRoleRefs } from './tasks.js';

export type {
  GroupMap,
  Play,
  Playbook,
  RepositoryModel,
  RepositoryModelStats,
} from './repository-model.js';

export type { LayoutDirection, GeneratorConfig } from './generator-config.js';
export { LAYOUT_DIRECTIONS, isLayoutDirection } from './generator-config.js';

export type { Diagnostic, DiagnosticLevel } from './diagnostics.js';
