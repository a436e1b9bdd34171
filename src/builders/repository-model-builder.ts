/**
 * repository-model-builder.ts
 * Assembles the RepositoryModel from a set of inventory and playbook paths.
 *
 * Pipeline:
 *   1. Parse each inventory, merging groups (later files overwrite)
 *   2. Parse playbooks through a FIFO work queue; import targets are
 *      enqueued, every distinct path is parsed exactly once
 *   3. Collect role names from play `roles` lists and RoleRef nodes
 *   4. RoleResolver.resolveClosure over the collected names
 *
 * FormatError and MissingResourceError propagate unchanged.
 */

import type { GeneratorConfig } from '../models/generator-config.js';
import type {
  GroupMap,
  Playbook,
  RepositoryModel,
  RepositoryModelStats,
} from '../models/repository-model.js';
import { collectRoleRefs, walkTasks } from '../models/tasks.js';
import { InventoryParser } from '../parsers/inventory/inventory-parser.js';
import { PlaybookParser } from '../parsers/playbook/playbook-parser.js';
import { RoleResolver } from '../analyzers/roles/role-resolver.js';
import { FileService } from '../services/file-service.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export class RepositoryModelBuilder {
  private readonly _files: FileService;
  private readonly _log: Logger;

  constructor(cfg: Pick<GeneratorConfig, 'repoRoot'>, logger?: Logger) {
    this._files = new FileService(cfg.repoRoot);
    this._log = logger ?? new SilentLogger();
  }

  build(inventoryPaths: readonly string[], playbookPaths: readonly string[]): RepositoryModel {
    const groups = this._buildGroups(inventoryPaths);
    this._log.debug('Inventories merged', { files: inventoryPaths.length, groups: groups.size });

    const playbooks = this._buildPlaybooks(playbookPaths);
    this._log.debug('Playbooks parsed', { playbooks: playbooks.size });

    const referencedRoles = RepositoryModelBuilder._collectRoles(playbooks);
    const resolver = new RoleResolver(this._files, this._log);
    const resolution = resolver.resolveClosure(referencedRoles);
    this._log.debug('Roles resolved', {
      referenced: referencedRoles.size,
      total: resolution.roles.size,
    });

    return {
      groups,
      playbooks,
      roles: resolution.roles,
      roleTasks: resolution.tasks,
      roleDependencies: resolution.dependencies,
    };
  }

  // ---------------------------------------------------------------------------
  // Inventories
  // ---------------------------------------------------------------------------

  private _buildGroups(inventoryPaths: readonly string[]): GroupMap {
    const parser = new InventoryParser(this._files, this._log);
    const groups: GroupMap = new Map();
    for (const inventoryPath of inventoryPaths) {
      for (const [name, hosts] of parser.parse(inventoryPath)) {
        groups.set(name, hosts);
      }
    }
    return groups;
  }

  // ---------------------------------------------------------------------------
  // Playbooks
  // ---------------------------------------------------------------------------

  private _buildPlaybooks(playbookPaths: readonly string[]): Map<string, Playbook> {
    const parser = new PlaybookParser(this._files, this._log);
    const playbooks = new Map<string, Playbook>();
    const pending = playbookPaths.map((p) => this._files.resolve(p));

    let next = pending.shift();
    while (next !== undefined) {
      if (playbooks.has(next)) {
        this._log.debug('Playbook already parsed, skipping', { path: next });
      } else {
        const playbook = parser.parse(next);
        playbooks.set(next, playbook);
        for (const imported of playbook.importedPlaybooks) {
          if (!playbooks.has(imported)) pending.push(imported);
        }
      }
      next = pending.shift();
    }

    return playbooks;
  }

  // ---------------------------------------------------------------------------
  // Roles
  // ---------------------------------------------------------------------------

  private static _collectRoles(playbooks: ReadonlyMap<string, Playbook>): Set<string> {
    const roles = new Set<string>();
    for (const playbook of playbooks.values()) {
      for (const play of playbook.plays) {
        for (const role of play.roles) roles.add(role);
        for (const role of collectRoleRefs(play.tasks)) roles.add(role);
      }
    }
    return roles;
  }

  // ---------------------------------------------------------------------------
  // Stats
  // ---------------------------------------------------------------------------

  static computeStats(model: RepositoryModel): RepositoryModelStats {
    let hosts = 0;
    for (const groupHosts of model.groups.values()) hosts += groupHosts.length;

    let plays = 0;
    let tasks = 0;
    const countTask = (): void => {
      tasks++;
    };
    for (const playbook of model.playbooks.values()) {
      plays += playbook.plays.length;
      for (const play of playbook.plays) walkTasks(play.tasks, countTask);
    }
    for (const roleTasks of model.roleTasks.values()) walkTasks(roleTasks, countTask);

    return {
      groups: model.groups.size,
      hosts,
      playbooks: model.playbooks.size,
      plays,
      tasks,
      roles: model.roles.size,
    };
  }
}
