/**
 * inventory-parser.ts
 * Turns a YAML or INI inventory file into a group → hosts map.
 *
 * Format detection: YAML is tried first. A YAML syntax error, or a document
 * whose root is not a non-empty mapping, falls back to the INI reader.
 *
 * Each group lists only the hosts declared directly under it; hosts of child
 * groups stay with the child. Container-only groups are present with an
 * empty host list.
 */

import type { GroupMap } from '../../models/repository-model.js';
import { FileService } from '../../services/file-service.js';
import { FormatError, MissingResourceError } from '../../services/errors.js';
import { SilentLogger } from '../../services/logger.js';
import type { Logger } from '../../services/logger.js';
import { YamlUtils } from '../yaml/yaml-utils.js';

/** `[group]` or `[group:section]`. */
const INI_HEADER = /^\[([^:\]]+)(?::(\w+))?\]$/;

type IniSection = 'hosts' | 'vars' | 'children' | 'other';

export class InventoryParser {
  private readonly _files: FileService;
  private readonly _log: Logger;

  constructor(files: FileService, logger?: Logger) {
    this._files = files;
    this._log = logger ?? new SilentLogger();
  }

  parse(inventoryPath: string): GroupMap {
    const resolved = this._files.resolve(inventoryPath);
    const text = this._files.readText(resolved);
    if (text === null) {
      throw new MissingResourceError(resolved, 'inventory');
    }

    const yamlGroups = this._tryYaml(text, resolved);
    if (yamlGroups !== null) {
      this._log.debug('Inventory parsed as YAML', { path: resolved, groups: yamlGroups.size });
      return yamlGroups;
    }

    const iniGroups = InventoryParser.parseIni(text);
    this._log.debug('Inventory parsed as INI', { path: resolved, groups: iniGroups.size });
    return iniGroups;
  }

  // ---------------------------------------------------------------------------
  // YAML
  // ---------------------------------------------------------------------------

  private _tryYaml(text: string, filePath: string): GroupMap | null {
    let data: unknown;
    try {
      data = YamlUtils.parse(text, filePath, this._log);
    } catch (err) {
      if (!(err instanceof FormatError)) throw err;
      this._log.debug('Inventory is not valid YAML, reading as INI', {
        path: filePath,
        reason: err.message,
      });
      return null;
    }

    if (!YamlUtils.isMapping(data) || Object.keys(data).length === 0) return null;

    const groups: GroupMap = new Map();
    for (const [groupName, content] of Object.entries(data)) {
      InventoryParser.addYamlGroup(groups, groupName, content);
    }
    return groups;
  }

  /**
   * Register `groupName` with its direct hosts, then every entry of its
   * `children` mapping as a top-level group by the same rule.
   */
  static addYamlGroup(groups: GroupMap, groupName: string, content: unknown): void {
    if (!YamlUtils.isMapping(content)) {
      groups.set(groupName, []);
      return;
    }

    const hosts = content['hosts'];
    groups.set(groupName, YamlUtils.isMapping(hosts) ? Object.keys(hosts) : []);

    const children = content['children'];
    if (YamlUtils.isMapping(children)) {
      for (const [childName, childContent] of Object.entries(children)) {
        InventoryParser.addYamlGroup(groups, childName, childContent);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // INI
  // ---------------------------------------------------------------------------

  /** Line-oriented INI inventory reader. Host variables are discarded. */
  static parseIni(text: string): GroupMap {
    const groups: GroupMap = new Map();
    let currentGroup: string | null = null;
    let section: IniSection = 'hosts';

    for (const rawLine of text.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (line === '' || line.startsWith('#') || line.startsWith(';')) continue;

      const header = INI_HEADER.exec(line);
      if (header !== null) {
        currentGroup = header[1] ?? null;
        section = InventoryParser._sectionOf(header[2]);
        if (currentGroup !== null && !groups.has(currentGroup)) {
          groups.set(currentGroup, []);
        }
        continue;
      }

      // Lines before the first header carry no group.
      if (currentGroup === null) continue;

      const firstToken = line.split(/\s+/)[0];
      if (firstToken === undefined || firstToken === '') continue;

      if (section === 'hosts') {
        groups.get(currentGroup)?.push(firstToken);
      } else if (section === 'children' && !groups.has(firstToken)) {
        groups.set(firstToken, []);
      }
    }

    return groups;
  }

  private static _sectionOf(suffix: string | undefined): IniSection {
    switch (suffix) {
      case undefined:
      case 'hosts':
        return 'hosts';
      case 'vars':
        return 'vars';
      case 'children':
        return 'children';
      default:
        return 'other';
    }
  }
}
