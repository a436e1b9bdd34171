/**
 * cli-args.ts
 * Command-line argument parsing for the generator CLI.
 */

import * as path from 'node:path';
import type { GeneratorConfig, LayoutDirection } from './models/generator-config.js';
import { LAYOUT_DIRECTIONS, isLayoutDirection } from './models/generator-config.js';

export interface CliOptions {
  config: GeneratorConfig;
  /** Absolute path of the diagram file to write. */
  outputPath: string;
  /** True when the output path was not given and the default was used. */
  defaultOutput: boolean;
  debug: boolean;
}

export type CliParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

export const USAGE = [
  'Usage: playbook-graph <repoRoot> [outputFile] -i <inventory>... -p <playbook>... [--layout LR] [--debug]',
  '',
  '  repoRoot          - root of the repository working copy',
  '  outputFile        - (optional) Mermaid file to write',
  '                      defaults to output/<repo-name>/diagram.mmd relative to CWD',
  '  -i, --inventory   - inventory file (YAML or INI); repeatable',
  '  -p, --playbook    - playbook file; repeatable',
  `  -l, --layout      - graph direction: ${LAYOUT_DIRECTIONS.join(' | ')} (default LR)`,
  '  --debug           - debug-level logs, plus model/stats/diagnostics JSON next to the output',
  '',
  'Relative inventory and playbook paths resolve against repoRoot.',
].join('\n');

export function parseCliArgs(argv: readonly string[], cwd: string = process.cwd()): CliParseResult {
  const positional: string[] = [];
  const inventoryPaths: string[] = [];
  const playbookPaths: string[] = [];
  let layout: LayoutDirection = 'LR';
  let debug = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    switch (arg) {
      case '--debug':
        debug = true;
        continue;
      case '-i':
      case '--inventory':
      case '-p':
      case '--playbook':
      case '-l':
      case '--layout': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('-')) {
          return { ok: false, error: `Missing value for ${arg}` };
        }
        i++;
        if (arg === '-i' || arg === '--inventory') {
          inventoryPaths.push(value);
        } else if (arg === '-p' || arg === '--playbook') {
          playbookPaths.push(value);
        } else if (isLayoutDirection(value)) {
          layout = value;
        } else {
          return { ok: false, error: `Unknown layout "${value}"` };
        }
        continue;
      }
      default:
        if (arg.startsWith('-')) {
          return { ok: false, error: `Unknown option ${arg}` };
        }
        positional.push(arg);
    }
  }

  const [repoRoot, rawOutput, ...extra] = positional;
  if (repoRoot === undefined) {
    return { ok: false, error: 'Missing repoRoot' };
  }
  if (extra.length > 0) {
    return { ok: false, error: `Unexpected argument ${extra.join(' ')}` };
  }
  if (playbookPaths.length === 0 && inventoryPaths.length === 0) {
    return { ok: false, error: 'Nothing to render: pass at least one --inventory or --playbook' };
  }

  const resolvedRoot = path.resolve(cwd, repoRoot);
  const outputPath = rawOutput !== undefined
    ? path.resolve(cwd, rawOutput)
    : path.resolve(cwd, 'output', path.basename(resolvedRoot), 'diagram.mmd');

  return {
    ok: true,
    options: {
      config: { repoRoot: resolvedRoot, inventoryPaths, playbookPaths, layout },
      outputPath,
      defaultOutput: rawOutput === undefined,
      debug,
    },
  };
}
