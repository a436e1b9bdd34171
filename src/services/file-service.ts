/**
 * file-service.ts
 * Deterministic file access rooted at the repository working copy.
 *
 * Constraints:
 * - Relative paths resolve against the repository root.
 * - All paths are normalized to absolute before I/O.
 * - Returns null for missing or unreadable files rather than throwing.
 * - Directory listings are sorted so lookups never depend on readdir order.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export class FileService {
  private readonly _root: string;

  constructor(repoRoot: string) {
    this._root = path.resolve(repoRoot);
  }

  get root(): string {
    return this._root;
  }

  /** Normalize a path to absolute, resolving relative ones against the root. */
  resolve(relOrAbsPath: string): string {
    return path.isAbsolute(relOrAbsPath)
      ? path.normalize(relOrAbsPath)
      : path.resolve(this._root, relOrAbsPath);
  }

  /**
   * Read a file as UTF-8 text.
   * Returns null if the path does not exist, is not a regular file, or
   * cannot be read.
   */
  readText(relOrAbsPath: string): string | null {
    const resolved = this.resolve(relOrAbsPath);
    if (!this.isFile(resolved)) return null;
    try {
      return fs.readFileSync(resolved, 'utf-8');
    } catch {
      return null;
    }
  }

  /** True if the path exists and is a regular file. */
  isFile(relOrAbsPath: string): boolean {
    try {
      return fs.statSync(this.resolve(relOrAbsPath)).isFile();
    } catch {
      return false;
    }
  }

  /**
   * Resolve a path that is relative to `fromFile` into a normalized
   * absolute path.
   */
  resolveRelative(fromFile: string, relativePath: string): string {
    const fromDir = path.dirname(this.resolve(fromFile));
    return path.resolve(fromDir, relativePath);
  }

  /**
   * Every directory below the root whose basename is `name`, at any depth.
   * Hidden directories (".git", ".venv", …) are not descended into.
   * Symlinked directories are not followed. Result is sorted.
   */
  findDirectories(name: string): string[] {
    const found: string[] = [];
    const pending: string[] = [this._root];

    while (pending.length > 0) {
      const dir = pending.pop();
      if (dir === undefined) break;

      let entries: fs.Dirent[];
      try {
        entries = fs.readdirSync(dir, { withFileTypes: true });
      } catch {
        continue;
      }

      for (const entry of entries) {
        if (!entry.isDirectory() || entry.name.startsWith('.')) continue;
        const child = path.join(dir, entry.name);
        if (entry.name === name) found.push(child);
        pending.push(child);
      }
    }

    return found.sort();
  }
}
