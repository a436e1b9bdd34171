/**
 * types.ts
 * Node categories of the Mermaid diagram. Each category has a fixed shape
 * and a fixed style class.
 */

export const NODE_CATEGORIES = [
  'groups',
  'hosts',
  'playbooks',
  'roles',
  'tasks',
  'handlers',
  'includes',
  'tags',
  'becomes',
] as const;

export type NodeCategory = (typeof NODE_CATEGORIES)[number];

/** Node ids emitted so far, bucketed by category, in emission order. */
export type DiagramNodes = Record<NodeCategory, Set<string>>;

export function emptyDiagramNodes(): DiagramNodes {
  return {
    groups: new Set(),
    hosts: new Set(),
    playbooks: new Set(),
    roles: new Set(),
    tasks: new Set(),
    handlers: new Set(),
    includes: new Set(),
    tags: new Set(),
    becomes: new Set(),
  };
}
