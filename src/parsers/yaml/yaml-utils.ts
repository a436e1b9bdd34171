/**
 * yaml-utils.ts
 * Low-level YAML helpers shared by the inventory, playbook and role parsers.
 *
 * Documents are read with the YAML 1.1 schema, so `yes`/`no`/`on`/`off`
 * load as booleans the way the automation tool itself reads them. The
 * single-letter forms (`y`, `n`) stay strings, and a repeated mapping key
 * keeps its last value.
 */

import { parseDocument } from 'yaml';
import type { ScalarTag } from 'yaml';
import { FormatError } from '../../services/errors.js';
import type { Logger } from '../../services/logger.js';

export type YamlMapping = Record<string, unknown>;

const BOOL_TAG = 'tag:yaml.org,2002:bool';

const TRUE_TAG: ScalarTag = {
  tag: BOOL_TAG,
  default: true,
  identify: (value) => value === true,
  test: /^(?:[Yy]es|YES|[Tt]rue|TRUE|[Oo]n|ON)$/,
  resolve: () => true,
};

const FALSE_TAG: ScalarTag = {
  tag: BOOL_TAG,
  default: true,
  identify: (value) => value === false,
  test: /^(?:[Nn]o|NO|[Ff]alse|FALSE|[Oo]ff|OFF)$/,
  resolve: () => false,
};

export class YamlUtils {
  // ---------------------------------------------------------------------------
  // Parsing
  // ---------------------------------------------------------------------------

  /**
   * Parse YAML text into plain JS values.
   * Throws FormatError (naming `filePath`) on the first syntax error.
   * Returns null for an empty document.
   */
  static parse(text: string, filePath: string, logger?: Logger): unknown {
    const doc = parseDocument(text, {
      version: '1.1',
      uniqueKeys: false,
      customTags: (tags) => [
        ...tags.filter((tag) => typeof tag === 'string' || tag.tag !== BOOL_TAG),
        TRUE_TAG,
        FALSE_TAG,
      ],
    });

    const firstError = doc.errors[0];
    if (firstError !== undefined) {
      throw new FormatError(filePath, firstError.message, { cause: firstError });
    }
    for (const warning of doc.warnings) {
      logger?.debug('YAML warning', { file: filePath, warning: warning.message });
    }

    const value: unknown = doc.toJS();
    return value ?? null;
  }

  // ---------------------------------------------------------------------------
  // Shape checks
  // ---------------------------------------------------------------------------

  static isMapping(value: unknown): value is YamlMapping {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
  }

  /** Mapping entries of a sequence; everything else is dropped. */
  static mappingsOf(value: unknown): YamlMapping[] {
    if (!Array.isArray(value)) return [];
    return value.filter((item): item is YamlMapping => YamlUtils.isMapping(item));
  }

  /**
   * YAML truthiness: null, false, 0, "" and empty sequences or mappings are
   * falsy; every other value is truthy.
   */
  static isTruthy(value: unknown): boolean {
    if (value === null || value === undefined || value === false) return false;
    if (value === 0 || value === '') return false;
    if (Array.isArray(value)) return value.length > 0;
    if (YamlUtils.isMapping(value)) return Object.keys(value).length > 0;
    return true;
  }

  // ---------------------------------------------------------------------------
  // Normalization
  // ---------------------------------------------------------------------------

  /** Render a scalar (or, as a last resort, a structure) as a string. */
  static toText(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value === null || value === undefined) return '';
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
  }

  /**
   * Scalar → one-element list, sequence → list of strings, absent/null → [].
   */
  static toTextList(value: unknown): string[] {
    if (value === null || value === undefined) return [];
    if (Array.isArray(value)) return value.map((item) => YamlUtils.toText(item));
    return [YamlUtils.toText(value)];
  }

  /**
   * Name of a role entry written either as a bare string or as a mapping
   * with `role` (preferred) or `name`. Returns null when no name is present.
   */
  static roleEntryName(entry: unknown): string | null {
    if (YamlUtils.isMapping(entry)) {
      for (const key of ['role', 'name']) {
        const candidate = entry[key];
        if (YamlUtils.isTruthy(candidate)) return YamlUtils.toText(candidate);
      }
      return null;
    }
    if (!YamlUtils.isTruthy(entry)) return null;
    return YamlUtils.toText(entry);
  }
}
