/**
 * mermaid-generator.ts
 * Renders a RepositoryModel as a Mermaid `graph` document.
 *
 * Document layout:
 *   graph <layout>
 *   subgraph inventory           - groups, hosts, group --- host
 *   subgraph playbooks_section   - playbooks, their task trees, handlers
 *   subgraph roles_section       - roles and their task trees
 *   inter-block edges            - runs / uses / imports / depends / notifies / role refs
 *   classDef block
 *   one `class` line per non-empty node category
 *
 * Output depends only on the model, the layout and the repository root, and
 * the model's maps and sets are insertion-ordered, so the same input always
 * yields the same bytes.
 */

import * as path from 'node:path';
import type { LayoutDirection } from '../models/generator-config.js';
import type { Play, Playbook, RepositoryModel } from '../models/repository-model.js';
import type { TaskMeta, TaskNode } from '../models/tasks.js';
import { escapeLabel, sanitizeId } from './mermaid-utils.js';
import { CATEGORY_CLASSES, classDefinitions, nodeShape } from './mermaid-styles.js';
import { NODE_CATEGORIES, emptyDiagramNodes } from './types.js';
import type { DiagramNodes, NodeCategory } from './types.js';

const NODE_INDENT = '        ';
const EDGE_INDENT = '    ';
const DEFAULT_BECOME_USER = 'root';

export function generateMermaidDiagram(
  model: RepositoryModel,
  layout: LayoutDirection = 'LR',
  repoRoot = '',
): string {
  return new MermaidRenderer(model).render(layout, repoRoot);
}

export function roleNodeId(roleName: string): string {
  return sanitizeId(`role_${roleName}`);
}

export function handlerNodeId(handlerName: string): string {
  return sanitizeId(`handler_${handlerName}`);
}

export function playbookNodeId(playbookPath: string): string {
  return sanitizeId(path.basename(playbookPath));
}

// ---------------------------------------------------------------------------
// Renderer - one instance per document
// ---------------------------------------------------------------------------

class MermaidRenderer {
  private readonly _model: RepositoryModel;
  private readonly _nodes: DiagramNodes = emptyDiagramNodes();
  private readonly _connections: string[] = [];
  private readonly _roleLines: string[] = [];
  private readonly _renderedRoles = new Set<string>();
  private _taskCounter = 0;

  constructor(model: RepositoryModel) {
    this._model = model;
  }

  render(layout: LayoutDirection, repoRoot: string): string {
    const inventoryLines = this._renderInventory();
    const playbookLines = this._renderPlaybooks();
    this._renderRoles();

    const lines = [`graph ${layout}`];
    if (repoRoot !== '') {
      lines.push(`%% repository: ${repoRoot}`);
    }
    lines.push(...subgraph('inventory', 'Inventory', inventoryLines));
    lines.push(...subgraph('playbooks_section', 'Playbooks', playbookLines));
    lines.push(...subgraph('roles_section', 'Roles', this._roleLines));
    lines.push(...this._connections);
    lines.push(...classDefinitions(NODE_CATEGORIES).map((d) => EDGE_INDENT + d));
    lines.push(...this._classAssignments());
    return lines.join('\n');
  }

  // ---------------------------------------------------------------------------
  // Inventory
  // ---------------------------------------------------------------------------

  private _renderInventory(): string[] {
    const out: string[] = [];
    for (const [group, hosts] of this._model.groups) {
      const groupId = sanitizeId(group);
      this._declare(out, 'groups', groupId, group);
      for (const host of hosts) {
        const hostId = sanitizeId(host);
        this._declare(out, 'hosts', hostId, host);
        out.push(`${NODE_INDENT}${groupId} --- ${hostId}`);
      }
    }
    return out;
  }

  // ---------------------------------------------------------------------------
  // Playbooks
  // ---------------------------------------------------------------------------

  private _renderPlaybooks(): string[] {
    const out: string[] = [];
    for (const playbook of this._model.playbooks.values()) {
      this._renderPlaybook(playbook, out);
    }
    return out;
  }

  private _renderPlaybook(playbook: Playbook, out: string[]): void {
    const pbId = playbookNodeId(playbook.path);
    this._declare(out, 'playbooks', pbId, playbook.name);

    playbook.plays.forEach((play, playIndex) => {
      this._renderPlay(play, playIndex, pbId, out);
    });

    for (const imported of playbook.importedPlaybooks) {
      this._connect(`${pbId} -->|"imports"| ${playbookNodeId(imported)}`);
    }
  }

  private _renderPlay(play: Play, playIndex: number, pbId: string, out: string[]): void {
    if (play.hosts !== undefined) {
      this._connect(`${sanitizeId(play.hosts)} -->|"runs"| ${pbId}`);
    }

    const annotationId = `${pbId}_play_${playIndex}`;
    this._annotateTags(play.tags ?? [], pbId, annotationId, out);
    if (play.become === true) {
      this._annotateBecome(play.becomeUser, pbId, annotationId, out);
    }

    for (const role of play.roles) {
      this._connect(`${pbId} ==>|"uses"| ${roleNodeId(role)}`);
    }

    for (const task of play.tasks) {
      this._renderTask(task, pbId, out);
    }

    for (const handler of play.handlers) {
      this._ensureHandler(handler, out);
    }
  }

  // ---------------------------------------------------------------------------
  // Roles
  // ---------------------------------------------------------------------------

  private _renderRoles(): void {
    for (const role of this._model.roles) {
      this._ensureRole(role);
    }
    for (const [role, deps] of this._model.roleDependencies) {
      for (const dep of deps) {
        this._connect(`${roleNodeId(role)} -->|"depends"| ${roleNodeId(dep)}`);
      }
    }
  }

  /** Declare a role node and render its task tree, on first reference only. */
  private _ensureRole(roleName: string): string {
    const roleId = roleNodeId(roleName);
    if (this._renderedRoles.has(roleId)) return roleId;
    this._renderedRoles.add(roleId);

    this._declare(this._roleLines, 'roles', roleId, roleName);
    for (const task of this._model.roleTasks.get(roleName) ?? []) {
      this._renderTask(task, roleId, this._roleLines);
    }
    return roleId;
  }

  // ---------------------------------------------------------------------------
  // Task trees
  // ---------------------------------------------------------------------------

  private _renderTask(task: TaskNode, parentId: string, out: string[]): void {
    switch (task.kind) {
      case 'RoleRef': {
        const roleId = this._ensureRole(task.roleName);
        this._connect(`${parentId} ==> ${roleId}`);
        this._taskCounter++;
        return;
      }

      case 'Include': {
        const fileName = path.basename(task.file);
        const includeId = sanitizeId(`include_${fileName}`);
        this._declare(out, 'includes', includeId, fileName);
        out.push(`${NODE_INDENT}${parentId} --> ${includeId}`);
        this._taskCounter++;
        for (const child of task.included) {
          this._renderTask(child, includeId, out);
        }
        return;
      }

      case 'Block': {
        const blockId = `${parentId}_block_${this._taskCounter++}`;
        this._declareTask(task, blockId, parentId, out);
        for (const child of task.children) {
          this._renderTask(child, blockId, out);
        }
        return;
      }

      case 'Plain': {
        const taskId = `${parentId}_task_${this._taskCounter++}`;
        this._declareTask(task, taskId, parentId, out);
        for (const handler of task.notify) {
          const handlerId = this._ensureHandler(handler, out);
          this._connect(`${taskId} -.->|"notifies"| ${handlerId}`);
        }
        return;
      }
    }
  }

  /** Task/block node with its `when` line, tag and become annotations. */
  private _declareTask(task: TaskMeta, id: string, parentId: string, out: string[]): void {
    this._declareRaw(out, 'tasks', id, taskLabel(task));
    out.push(`${NODE_INDENT}${parentId} --> ${id}`);
    this._annotateTags(task.tags, id, id, out);
    if (task.become) {
      this._annotateBecome(task.becomeUser, id, id, out);
    }
  }

  private _ensureHandler(handlerName: string, out: string[]): string {
    const handlerId = handlerNodeId(handlerName);
    if (!this._nodes.handlers.has(handlerId)) {
      this._declare(out, 'handlers', handlerId, handlerName);
    }
    return handlerId;
  }

  // ---------------------------------------------------------------------------
  // Annotations
  // ---------------------------------------------------------------------------

  private _annotateTags(tags: readonly string[], ownerId: string, idBase: string, out: string[]): void {
    if (tags.length === 0) return;
    const tagId = `${idBase}_tags`;
    this._declare(out, 'tags', tagId, tags.join(', '));
    out.push(`${NODE_INDENT}${ownerId} -.- ${tagId}`);
  }

  private _annotateBecome(
    becomeUser: string | undefined,
    ownerId: string,
    idBase: string,
    out: string[],
  ): void {
    const becomeId = `${idBase}_become`;
    this._declare(out, 'becomes', becomeId, becomeUser ?? DEFAULT_BECOME_USER);
    out.push(`${NODE_INDENT}${ownerId} -.- ${becomeId}`);
  }

  // ---------------------------------------------------------------------------
  // Emission primitives
  // ---------------------------------------------------------------------------

  /** Declare a node whose label is plain text. */
  private _declare(out: string[], category: NodeCategory, id: string, text: string): void {
    this._declareRaw(out, category, id, escapeLabel(text));
  }

  /** Declare a node whose label is already escaped Mermaid markup. */
  private _declareRaw(out: string[], category: NodeCategory, id: string, label: string): void {
    this._nodes[category].add(id);
    out.push(NODE_INDENT + nodeShape(category, id, label));
  }

  private _connect(edge: string): void {
    this._connections.push(EDGE_INDENT + edge);
  }

  private _classAssignments(): string[] {
    const lines: string[] = [];
    for (const category of NODE_CATEGORIES) {
      const ids = this._nodes[category];
      if (ids.size === 0) continue;
      lines.push(`${EDGE_INDENT}class ${[...ids].join(',')} ${CATEGORY_CLASSES[category]}`);
    }
    return lines;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function subgraph(id: string, title: string, body: readonly string[]): string[] {
  return [`${EDGE_INDENT}subgraph ${id}["${title}"]`, `${EDGE_INDENT}direction TB`, ...body, `${EDGE_INDENT}end`];
}

/** Escaped task label: the name, plus a `when:` line when conditions exist. */
export function taskLabel(task: TaskMeta): string {
  const parts = [escapeLabel(task.name)];
  if (task.when.length > 0) {
    parts.push(`fa:fa-question when: ${escapeLabel(task.when.join(' AND '))}`);
  }
  return parts.join('<br/>');
}
