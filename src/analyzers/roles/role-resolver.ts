/**
 * role-resolver.ts
 * Locates role task and meta files by directory convention and computes the
 * transitive closure of role dependencies.
 *
 * Lookup is an explicit, ordered candidate list rather than a glob:
 *   <rolesDir>/<name>/<sub>/main.yml   for every `roles` directory (sorted)
 *   <rolesDir>/<name>/<sub>/main.yaml  for every `roles` directory (sorted)
 * where <sub> is `tasks` or `meta`. The first usable file wins.
 *
 * Missing, empty or malformed role files are never fatal: the role simply
 * has no tasks or no dependencies, and a warning is logged.
 */

import * as path from 'node:path';
import type { TaskNode } from '../../models/tasks.js';
import { collectRoleRefs } from '../../models/tasks.js';
import { TaskExtractor } from '../../parsers/playbook/task-extractor.js';
import { YamlUtils } from '../../parsers/yaml/yaml-utils.js';
import { FileService } from '../../services/file-service.js';
import { FormatError } from '../../services/errors.js';
import { LookupCache } from '../../services/lookup-cache.js';
import { SilentLogger } from '../../services/logger.js';
import type { Logger } from '../../services/logger.js';

const ROLE_FILE_EXTENSIONS = ['yml', 'yaml'] as const;

export type RoleSubdirectory = 'tasks' | 'meta';

/** Result of a closure run. Every role in `roles` has an entry in both maps. */
export interface RoleResolution {
  roles: Set<string>;
  tasks: Map<string, TaskNode[]>;
  dependencies: Map<string, string[]>;
}

export class RoleResolver {
  private readonly _files: FileService;
  private readonly _log: Logger;
  private readonly _cache: LookupCache;
  private readonly _tasks: TaskExtractor;

  constructor(files: FileService, logger?: Logger, cache?: LookupCache) {
    this._files = files;
    this._log = logger ?? new SilentLogger();
    this._cache = cache ?? new LookupCache();
    this._tasks = new TaskExtractor(files, this._log);
  }

  // ---------------------------------------------------------------------------
  // Candidate paths
  // ---------------------------------------------------------------------------

  /** Every `roles` directory in the working copy, scanned once per resolver. */
  rolesDirectories(): string[] {
    const key = `roles-dirs:${this._files.root}`;
    const cached = this._cache.get<string[]>(key);
    if (cached !== undefined) return cached;

    const dirs = this._files.findDirectories('roles');
    this._log.debug('Roles directories found', { count: dirs.length });
    this._cache.set(key, dirs);
    return dirs;
  }

  candidatePaths(roleName: string, sub: RoleSubdirectory): string[] {
    const dirs = this.rolesDirectories();
    const candidates: string[] = [];
    for (const ext of ROLE_FILE_EXTENSIONS) {
      for (const rolesDir of dirs) {
        candidates.push(path.join(rolesDir, roleName, sub, `main.${ext}`));
      }
    }
    return candidates;
  }

  // ---------------------------------------------------------------------------
  // Single-role lookups
  // ---------------------------------------------------------------------------

  /** Task tree of the first candidate `tasks/main` holding a non-empty list. */
  findRoleTasks(roleName: string): TaskNode[] {
    for (const candidate of this.candidatePaths(roleName, 'tasks')) {
      const entries = this._tasks.readTaskList(candidate);
      if (entries === null) continue;
      return this._tasks.extractAll(entries, candidate);
    }
    this._log.warn('Role tasks not found', { role: roleName });
    return [];
  }

  /** `dependencies` of the first candidate `meta/main` holding a mapping. */
  findRoleDependencies(roleName: string): string[] {
    for (const candidate of this.candidatePaths(roleName, 'meta')) {
      const text = this._files.readText(candidate);
      if (text === null) continue;

      let meta: unknown;
      try {
        meta = YamlUtils.parse(text, candidate, this._log);
      } catch (err) {
        if (!(err instanceof FormatError)) throw err;
        this._log.warn('Could not load role meta', { path: candidate, reason: err.message });
        continue;
      }
      if (!YamlUtils.isMapping(meta) || Object.keys(meta).length === 0) continue;

      const deps = meta['dependencies'];
      const names: string[] = [];
      if (Array.isArray(deps)) {
        for (const dep of deps) {
          const name = YamlUtils.roleEntryName(dep);
          if (name !== null) names.push(name);
        }
      }
      return names;
    }
    this._log.debug('No role meta found', { role: roleName });
    return [];
  }

  // ---------------------------------------------------------------------------
  // Closure
  // ---------------------------------------------------------------------------

  /**
   * Resolve `initial` and everything reachable from it through meta
   * dependencies and role references inside resolved task trees.
   * A role is resolved at most once, so dependency cycles terminate.
   */
  resolveClosure(initial: Iterable<string>): RoleResolution {
    const discovered = new Set<string>(initial);
    const processed = new Set<string>();
    const tasks = new Map<string, TaskNode[]>();
    const dependencies = new Map<string, string[]>();

    let pending = [...discovered];
    while (pending.length > 0) {
      for (const role of pending) {
        processed.add(role);

        const roleTasks = this.findRoleTasks(role);
        const roleDeps = this.findRoleDependencies(role);
        tasks.set(role, roleTasks);
        dependencies.set(role, roleDeps);

        for (const next of [...roleDeps, ...collectRoleRefs(roleTasks)]) {
          if (processed.has(next)) {
            this._log.debug('Role already resolved, skipping', { role: next, from: role });
            continue;
          }
          discovered.add(next);
        }
      }
      pending = [...discovered].filter((role) => !processed.has(role));
    }

    this._log.debug('Role closure resolved', { roles: discovered.size, cachedLookups: this._cache.size });
    return { roles: discovered, tasks, dependencies };
  }
}
