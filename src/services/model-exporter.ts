/**
 * model-exporter.ts
 * Writes the diagram and deterministic JSON renderings of a run to disk.
 *
 * Constraints:
 * - JSON output must be stable: same model → identical bytes.
 * - Object keys (and Map keys) are sorted recursively; Sets become arrays
 *   in insertion order; arrays keep their order.
 * - Indentation: 2 spaces.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Diagnostic } from '../models/diagnostics.js';
import type { RepositoryModel, RepositoryModelStats } from '../models/repository-model.js';

export class ModelExporter {
  static toJson(value: unknown): string {
    return JSON.stringify(value, ModelExporter._stableSortReplacer(), 2);
  }

  /** Write the diagram text, creating parent directories as needed. */
  static writeDiagram(diagram: string, outPath: string): void {
    const resolved = path.resolve(outPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, diagram + '\n', 'utf-8');
  }

  /**
   * Write individual artifacts for debugging.
   * Creates: model.json, stats.json, diagnostics.json, diagram.mmd
   */
  static writeDebugArtifacts(
    model: RepositoryModel,
    stats: RepositoryModelStats,
    diagnostics: readonly Diagnostic[],
    diagram: string,
    outDir: string,
  ): void {
    const resolved = path.resolve(outDir);
    fs.mkdirSync(resolved, { recursive: true });

    const write = (name: string, data: unknown): void => {
      fs.writeFileSync(path.join(resolved, name), ModelExporter.toJson(data), 'utf-8');
    };

    write('model.json', model);
    write('stats.json', stats);
    write('diagnostics.json', diagnostics);
    fs.writeFileSync(path.join(resolved, 'diagram.mmd'), diagram + '\n', 'utf-8');
  }

  // ---------------------------------------------------------------------------
  // Stable sort replacer
  // ---------------------------------------------------------------------------

  /**
   * JSON.stringify replacer: Maps and plain objects become objects with
   * sorted keys, Sets become arrays.
   */
  private static _stableSortReplacer(): (key: string, value: unknown) => unknown {
    const sortedObject = (entries: Iterable<[string, unknown]>): Record<string, unknown> => {
      const sorted: Record<string, unknown> = {};
      for (const [k, v] of [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[k] = v;
      }
      return sorted;
    };

    return (_key: string, value: unknown): unknown => {
      if (value instanceof Map) {
        return sortedObject([...value.entries()].map(([k, v]): [string, unknown] => [String(k), v]));
      }
      if (value instanceof Set) {
        return [...value];
      }
      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        return sortedObject(Object.entries(value));
      }
      return value;
    };
  }
}
