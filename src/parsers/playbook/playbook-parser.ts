/**
 * playbook-parser.ts
 * Turns a playbook file into its ordered plays plus the list of
 * `import_playbook` targets.
 *
 * Fatal: unreadable file (MissingResourceError), YAML syntax error
 * (FormatError). An empty or non-sequence document yields a playbook with
 * no plays and a warning.
 */

import * as path from 'node:path';
import type { Play, Playbook } from '../../models/repository-model.js';
import { FileService } from '../../services/file-service.js';
import { MissingResourceError } from '../../services/errors.js';
import { SilentLogger } from '../../services/logger.js';
import type { Logger } from '../../services/logger.js';
import { YamlUtils } from '../yaml/yaml-utils.js';
import type { YamlMapping } from '../yaml/yaml-utils.js';
import { TaskExtractor } from './task-extractor.js';

const IMPORT_KEYWORDS = ['import_playbook', 'ansible.builtin.import_playbook'];
const TASK_SECTIONS = ['pre_tasks', 'tasks', 'post_tasks'] as const;

export const UNNAMED_HANDLER = 'unnamed_handler';

export class PlaybookParser {
  private readonly _files: FileService;
  private readonly _log: Logger;
  private readonly _tasks: TaskExtractor;

  constructor(files: FileService, logger?: Logger) {
    this._files = files;
    this._log = logger ?? new SilentLogger();
    this._tasks = new TaskExtractor(files, this._log);
  }

  parse(playbookPath: string): Playbook {
    const resolved = this._files.resolve(playbookPath);
    const playbook: Playbook = {
      path: resolved,
      name: path.basename(resolved),
      plays: [],
      importedPlaybooks: [],
    };

    const text = this._files.readText(resolved);
    if (text === null) {
      throw new MissingResourceError(resolved, 'playbook');
    }

    const data = YamlUtils.parse(text, resolved, this._log);
    if (!Array.isArray(data) || data.length === 0) {
      this._log.warn('Empty or invalid playbook', { path: resolved });
      return playbook;
    }

    for (const entry of YamlUtils.mappingsOf(data)) {
      const importTarget = PlaybookParser._importTarget(entry);
      if (importTarget !== null) {
        this._addImport(playbook, importTarget);
        continue;
      }
      playbook.plays.push(this._parsePlay(entry, resolved));
    }

    this._log.debug('Playbook parsed', {
      path: resolved,
      plays: playbook.plays.length,
      imports: playbook.importedPlaybooks.length,
    });
    return playbook;
  }

  // ---------------------------------------------------------------------------
  // import_playbook
  // ---------------------------------------------------------------------------

  private static _importTarget(entry: YamlMapping): string | null {
    for (const key of IMPORT_KEYWORDS) {
      const target = entry[key];
      if (YamlUtils.isTruthy(target)) return YamlUtils.toText(target);
    }
    return null;
  }

  private _addImport(playbook: Playbook, target: string): void {
    const resolved = this._files.resolveRelative(playbook.path, target);
    if (!this._files.isFile(resolved)) {
      this._log.warn('Imported playbook not found', { from: playbook.path, target });
      return;
    }
    playbook.importedPlaybooks.push(resolved);
  }

  // ---------------------------------------------------------------------------
  // Plays
  // ---------------------------------------------------------------------------

  private _parsePlay(entry: YamlMapping, playbookPath: string): Play {
    const play: Play = {
      roles: [],
      tasks: [],
      handlers: [],
    };

    const hosts = entry['hosts'];
    if (YamlUtils.isTruthy(hosts)) {
      play.hosts = Array.isArray(hosts)
        ? YamlUtils.toTextList(hosts).join(',')
        : YamlUtils.toText(hosts);
    }

    if (YamlUtils.isTruthy(entry['become'])) {
      play.become = true;
      const becomeUser = entry['become_user'];
      if (YamlUtils.isTruthy(becomeUser)) {
        play.becomeUser = YamlUtils.toText(becomeUser);
      }
    }

    const tags = entry['tags'];
    if (tags !== undefined && tags !== null) {
      play.tags = YamlUtils.toTextList(tags);
    }

    const roles = entry['roles'];
    if (Array.isArray(roles)) {
      for (const role of roles) {
        const roleName = YamlUtils.roleEntryName(role);
        if (roleName !== null) play.roles.push(roleName);
      }
    }

    for (const section of TASK_SECTIONS) {
      play.tasks.push(...this._tasks.extractAll(entry[section], playbookPath));
    }

    for (const handler of YamlUtils.mappingsOf(entry['handlers'])) {
      const name = handler['name'];
      play.handlers.push(YamlUtils.isTruthy(name) ? YamlUtils.toText(name) : UNNAMED_HANDLER);
    }

    return play;
  }
}
