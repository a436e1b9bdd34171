/**
 * generator-config.ts
 * Input configuration for a diagram generation run.
 */

/** Mermaid flowchart directions. */
export const LAYOUT_DIRECTIONS = ['LR', 'RL', 'TB', 'TD', 'BT'] as const;

export type LayoutDirection = (typeof LAYOUT_DIRECTIONS)[number];

export function isLayoutDirection(value: string): value is LayoutDirection {
  return (LAYOUT_DIRECTIONS as readonly string[]).includes(value);
}

/**
 * Configuration passed to the diagram orchestrator. The caller has already
 * obtained the working copy and picked the inventory and playbook files;
 * relative paths resolve against `repoRoot`.
 */
export interface GeneratorConfig {
  /** Root of the working copy. Role lookup and include fallback start here. */
  repoRoot: string;
  inventoryPaths: string[];
  playbookPaths: string[];
  /** Defaults to 'LR'. */
  layout?: LayoutDirection;
}
