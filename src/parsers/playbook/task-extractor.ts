/**
 * task-extractor.ts
 * Turns one raw task declaration into a typed TaskNode, recursively.
 *
 * Dispatch order (first match wins):
 *   1. `block`                          → Block (block ++ rescue ++ always)
 *   2. `include_role` / `import_role`   → RoleRef
 *   3. `include_tasks` / `import_tasks` → Include (target file loaded and expanded)
 *   4. anything else                    → Plain
 *
 * The fully-qualified `ansible.builtin.*` spellings of the keywords in 2 and 3
 * are accepted as well.
 */

import type { TaskMeta, TaskNode } from '../../models/tasks.js';
import { FileService } from '../../services/file-service.js';
import { FormatError } from '../../services/errors.js';
import { SilentLogger } from '../../services/logger.js';
import type { Logger } from '../../services/logger.js';
import { YamlUtils } from '../yaml/yaml-utils.js';
import type { YamlMapping } from '../yaml/yaml-utils.js';

const BUILTIN_PREFIX = 'ansible.builtin.';

const ROLE_KEYWORDS = withBuiltinAliases(['include_role', 'import_role']);
const INCLUDE_KEYWORDS = withBuiltinAliases(['include_tasks', 'import_tasks']);
const BLOCK_SECTIONS = ['block', 'rescue', 'always'] as const;

export const UNNAMED_TASK = 'unnamed_task';

function withBuiltinAliases(keywords: string[]): string[] {
  return [...keywords, ...keywords.map((k) => BUILTIN_PREFIX + k)];
}

export class TaskExtractor {
  private readonly _files: FileService;
  private readonly _log: Logger;

  constructor(files: FileService, logger?: Logger) {
    this._files = files;
    this._log = logger ?? new SilentLogger();
  }

  /**
   * Extract one task declaration.
   *
   * @param raw          - The task mapping as loaded from YAML.
   * @param baseFile     - File the declaration was read from; includes
   *                       resolve relative to its directory first.
   * @param includeChain - Task files currently being expanded above this
   *                       declaration, used to stop include cycles.
   */
  extract(raw: YamlMapping, baseFile: string, includeChain: readonly string[] = []): TaskNode {
    const meta = TaskExtractor.extractMeta(raw);

    if ('block' in raw) {
      const children: TaskNode[] = [];
      for (const section of BLOCK_SECTIONS) {
        for (const child of YamlUtils.mappingsOf(raw[section])) {
          children.push(this.extract(child, baseFile, includeChain));
        }
      }
      return { kind: 'Block', ...meta, children };
    }

    const roleSpec = TaskExtractor._firstTruthy(raw, ROLE_KEYWORDS);
    if (roleSpec !== undefined) {
      const roleName = YamlUtils.isMapping(roleSpec)
        ? (YamlUtils.isTruthy(roleSpec['name']) ? YamlUtils.toText(roleSpec['name']) : null)
        : YamlUtils.toText(roleSpec);
      if (roleName !== null) {
        return { kind: 'RoleRef', ...meta, roleName };
      }
      this._log.warn('Role reference without a role name, treated as a plain task', {
        file: baseFile,
        task: meta.name,
      });
      return { kind: 'Plain', ...meta };
    }

    const includeSpec = TaskExtractor._firstTruthy(raw, INCLUDE_KEYWORDS);
    if (includeSpec !== undefined) {
      const file = YamlUtils.isMapping(includeSpec)
        ? YamlUtils.toText(includeSpec['file'])
        : YamlUtils.toText(includeSpec);
      return this._extractInclude(meta, file, baseFile, includeChain);
    }

    return { kind: 'Plain', ...meta };
  }

  /** Extract every mapping entry of a task list; other entries are skipped. */
  extractAll(list: unknown, baseFile: string, includeChain: readonly string[] = []): TaskNode[] {
    return YamlUtils.mappingsOf(list).map((raw) => this.extract(raw, baseFile, includeChain));
  }

  /**
   * Load a task file and return its entries when it parses to a non-empty
   * sequence. Missing, empty, non-sequence and malformed files return null;
   * malformed ones are logged.
   */
  readTaskList(filePath: string): unknown[] | null {
    const text = this._files.readText(filePath);
    if (text === null) return null;

    let data: unknown;
    try {
      data = YamlUtils.parse(text, filePath, this._log);
    } catch (err) {
      if (!(err instanceof FormatError)) throw err;
      this._log.warn('Could not load task file', { path: filePath, reason: err.message });
      return null;
    }

    if (!Array.isArray(data) || data.length === 0) return null;
    return data;
  }

  // ---------------------------------------------------------------------------
  // Metadata
  // ---------------------------------------------------------------------------

  /** Normalize name / when / tags / become / notify of a raw declaration. */
  static extractMeta(raw: YamlMapping): TaskMeta {
    const name = YamlUtils.isTruthy(raw['name']) ? YamlUtils.toText(raw['name']) : UNNAMED_TASK;
    const become = YamlUtils.isTruthy(raw['become']);
    const becomeUser = raw['become_user'];

    const meta: TaskMeta = {
      name,
      when: YamlUtils.toTextList(raw['when']),
      tags: YamlUtils.toTextList(raw['tags']),
      become,
      notify: TaskExtractor._notifyList(raw['notify']),
    };
    if (become && YamlUtils.isTruthy(becomeUser)) {
      meta.becomeUser = YamlUtils.toText(becomeUser);
    }
    return meta;
  }

  private static _notifyList(notify: unknown): string[] {
    if (!YamlUtils.isTruthy(notify)) return [];
    if (typeof notify === 'string') return [notify];
    if (Array.isArray(notify)) return YamlUtils.toTextList(notify);
    return [];
  }

  private static _firstTruthy(raw: YamlMapping, keys: readonly string[]): unknown {
    for (const key of keys) {
      const value = raw[key];
      if (YamlUtils.isTruthy(value)) return value;
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Includes
  // ---------------------------------------------------------------------------

  private _extractInclude(
    meta: TaskMeta,
    file: string,
    baseFile: string,
    includeChain: readonly string[],
  ): TaskNode {
    if (file === '') {
      this._log.warn('Task include without a file', { file: baseFile, task: meta.name });
      return { kind: 'Include', ...meta, file, included: [] };
    }

    for (const candidate of this._includeCandidates(file, baseFile)) {
      const entries = this.readTaskList(candidate);
      if (entries === null) continue;

      if (candidate === baseFile || includeChain.includes(candidate)) {
        this._log.warn('Task include cycle, not expanded again', {
          file: candidate,
          from: baseFile,
        });
        return { kind: 'Include', ...meta, file, resolvedPath: candidate, included: [] };
      }

      const chain = [...includeChain, baseFile];
      const included = this.extractAll(entries, candidate, chain);
      this._log.debug('Task file included', { file: candidate, tasks: included.length });
      return { kind: 'Include', ...meta, file, resolvedPath: candidate, included };
    }

    this._log.warn('Included task file not found or empty', { file, from: baseFile });
    return { kind: 'Include', ...meta, file, included: [] };
  }

  /** Including file's directory first, then the repository root. */
  private _includeCandidates(file: string, baseFile: string): string[] {
    const candidates = [
      this._files.resolveRelative(baseFile, file),
      this._files.resolve(file),
    ];
    return [...new Set(candidates)];
  }
}
