#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point: parse a repository's inventories, playbooks and
 * roles, and write the Mermaid diagram.
 *
 * Output layout:
 *   <outputFile>                     - Mermaid graph text
 *   <outputDir>/json/model.json      - repository model (--debug)
 *   <outputDir>/json/stats.json      - counts (--debug)
 *   <outputDir>/json/diagnostics.json - warnings of the run (--debug)
 *
 * Usage:
 *   npx tsx src/cli.ts <repoRoot> [outputFile] -i <inventory> -p <playbook> [--layout TB] [--debug]
 */

import * as path from 'node:path';
import { parseCliArgs, USAGE } from './cli-args.js';
import { DiagramOrchestrator } from './orchestrator/diagram-orchestrator.js';
import { PlaybookGraphError } from './services/errors.js';
import { ConsoleLogger, TeeLogger } from './services/logger.js';

const parsed = parseCliArgs(process.argv.slice(2));

if (!parsed.ok) {
  console.error(parsed.error);
  console.error('');
  console.error(USAGE);
  process.exit(1);
}

const { config: cfg, outputPath, defaultOutput, debug } = parsed.options;
const outputDir = path.dirname(outputPath);

console.log('Diagram generation starting…');
console.log(`  repoRoot   : ${cfg.repoRoot}`);
console.log(`  inventories: ${cfg.inventoryPaths.length}`);
console.log(`  playbooks  : ${cfg.playbookPaths.length}`);
console.log(`  layout     : ${cfg.layout ?? 'LR'}`);
console.log(`  output     : ${outputPath}`);
if (defaultOutput) {
  console.log('               (default - no outputFile argument supplied)');
}
if (debug) {
  console.log('  debug      : on');
}

const t0 = Date.now();
const logger = debug ? new TeeLogger('debug') : new ConsoleLogger('warn');

try {
  const result = new DiagramOrchestrator(cfg, {
    outputPath,
    ...(debug && { debugOutputDir: path.join(outputDir, 'json') }),
    logger,
  }).run();
  const elapsed = Date.now() - t0;

  const { stats } = result;
  console.log('');
  console.log('Diagram complete ✓');
  console.log(`  groups     : ${stats.groups}`);
  console.log(`  hosts      : ${stats.hosts}`);
  console.log(`  playbooks  : ${stats.playbooks}`);
  console.log(`  plays      : ${stats.plays}`);
  console.log(`  tasks      : ${stats.tasks}`);
  console.log(`  roles      : ${stats.roles}`);
  console.log(`  warnings   : ${result.diagnostics.filter((d) => d.level === 'warn').length}`);
  console.log(`  lines      : ${result.diagram.split('\n').length}`);
  console.log(`  elapsed    : ${elapsed} ms`);

  // Write log file when --debug is used
  if (logger instanceof TeeLogger) {
    const subjectName = path.basename(cfg.repoRoot);
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    const logPath = path.join('logs', subjectName, timestamp, 'generate.log');
    logger.flush(path.resolve(logPath));
    console.log(`  log        : ${logPath}`);
  }

  process.exit(0);
} catch (err) {
  const elapsed = Date.now() - t0;
  console.error('');
  console.error(`Diagram generation FAILED after ${elapsed} ms`);
  console.error(err instanceof Error ? err.message : String(err));
  if (err instanceof PlaybookGraphError) {
    console.error(`  code: ${err.code}`);
  }
  if (debug && err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  process.exit(1);
}
