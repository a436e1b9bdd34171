/**
 * mermaid-styles.ts
 * Fixed style classes and node shapes, one per node category.
 */

import type { NodeCategory } from './types.js';

export const CATEGORY_CLASSES: Record<NodeCategory, string> = {
  groups: 'groupClass',
  hosts: 'hostClass',
  playbooks: 'playbookClass',
  roles: 'roleClass',
  tasks: 'taskClass',
  handlers: 'handlerClass',
  includes: 'includeClass',
  tags: 'tagClass',
  becomes: 'becomeClass',
};

const CLASS_STYLES: Record<NodeCategory, string> = {
  groups: 'fill:#e1f5fe,stroke:#01579b,stroke-width:2px',
  hosts: 'fill:#fff3e0,stroke:#e65100,stroke-width:1px',
  playbooks: 'fill:#e8f5e9,stroke:#1b5e20,stroke-width:3px',
  roles: 'fill:#f3e5f5,stroke:#4a148c,stroke-width:2px',
  tasks: 'fill:#fafafa,stroke:#616161,stroke-width:1px',
  handlers: 'fill:#fff8e1,stroke:#ff6f00,stroke-width:1px,stroke-dasharray: 5 5',
  includes: 'fill:#e0f2f1,stroke:#00695c,stroke-width:1px',
  tags: 'fill:#e8eaf6,stroke:#283593,stroke-width:1px,stroke-dasharray: 3 3',
  becomes: 'fill:#fce4ec,stroke:#b71c1c,stroke-width:1px,stroke-dasharray: 3 3',
};

/** `classDef` statements, in category order. */
export function classDefinitions(categories: readonly NodeCategory[]): string[] {
  return categories.map((c) => `classDef ${CATEGORY_CLASSES[c]} ${CLASS_STYLES[c]}`);
}

/**
 * Node declaration for a category. `label` must already be escaped.
 * Icons use the Font Awesome `fa:` syntax Mermaid understands.
 */
export function nodeShape(category: NodeCategory, id: string, label: string): string {
  switch (category) {
    case 'groups':
      return `${id}[["fa:fa-layer-group ${label}"]]`;
    case 'hosts':
      return `${id}(("fa:fa-server ${label}"))`;
    case 'playbooks':
      return `${id}["fa:fa-book ${label}"]`;
    case 'roles':
      return `${id}{"fa:fa-cube ${label}"}`;
    case 'tasks':
      return `${id}["${label}"]`;
    case 'handlers':
      return `${id}(["fa:fa-bell ${label}"])`;
    case 'includes':
      return `${id}[/"${label}"/]`;
    case 'tags':
      return `${id}>"fa:fa-tags ${label}"]`;
    case 'becomes':
      return `${id}(["fa:fa-key ${label}"])`;
  }
}
