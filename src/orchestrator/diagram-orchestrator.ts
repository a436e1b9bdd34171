/**
 * diagram-orchestrator.ts
 * Single entry-point for a complete generation run.
 *
 * Pipeline order:
 *   1. RepositoryModelBuilder.build(inventories, playbooks)
 *   2. ModelValidator.validate(model)
 *   3. generateMermaidDiagram(model, layout, repoRoot)
 *   4. Optional disk output
 *   5. Return result with the run's diagnostics
 *
 * FormatError and MissingResourceError from step 1 propagate unchanged.
 */

import * as path from 'node:path';
import type { Diagnostic } from '../models/diagnostics.js';
import type { GeneratorConfig, LayoutDirection } from '../models/generator-config.js';
import type { RepositoryModel, RepositoryModelStats } from '../models/repository-model.js';
import { RepositoryModelBuilder } from '../builders/repository-model-builder.js';
import { generateMermaidDiagram } from '../visualization/mermaid-generator.js';
import { ModelValidator } from '../services/model-validator.js';
import { ModelExporter } from '../services/model-exporter.js';
import { CollectingLogger, SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export interface DiagramOrchestratorOptions {
  /** Where to write the Mermaid text. */
  outputPath?: string;
  /** Where to write model.json, stats.json, diagnostics.json and diagram.mmd. */
  debugOutputDir?: string;
  skipValidation?: boolean;
  logger?: Logger;
}

export interface DiagramResult {
  diagram: string;
  model: RepositoryModel;
  stats: RepositoryModelStats;
  /** Warnings and errors logged during the run, oldest first. */
  diagnostics: readonly Diagnostic[];
}

export class DiagramOrchestrator {
  private readonly _cfg: GeneratorConfig;
  private readonly _options: DiagramOrchestratorOptions;
  private readonly _log: Logger;

  constructor(cfg: GeneratorConfig, options: DiagramOrchestratorOptions = {}) {
    this._cfg = cfg;
    this._options = options;
    this._log = options.logger ?? new SilentLogger();
  }

  run(): DiagramResult {
    const collector = new CollectingLogger(this._log, 'warn');
    const repoRoot = path.resolve(this._cfg.repoRoot);
    const layout: LayoutDirection = this._cfg.layout ?? 'LR';

    collector.info('Generation starting', { repoRoot, layout });

    // Step 1 - Model
    collector.info('Step 1/3  Building repository model', {
      inventories: this._cfg.inventoryPaths.length,
      playbooks: this._cfg.playbookPaths.length,
    });
    const builder = new RepositoryModelBuilder({ repoRoot }, collector);
    const model = builder.build(this._cfg.inventoryPaths, this._cfg.playbookPaths);
    const stats = RepositoryModelBuilder.computeStats(model);
    collector.info('Step 1/3  Done', { ...stats });

    // Step 2 - Validate
    if (this._options.skipValidation !== true) {
      collector.info('Step 2/3  Validating model invariants');
      ModelValidator.validate(model);
      collector.info('Step 2/3  Validation passed');
    }

    // Step 3 - Render
    collector.info('Step 3/3  Rendering Mermaid diagram');
    const diagram = generateMermaidDiagram(model, layout, repoRoot);
    collector.info('Step 3/3  Done', { lines: diagram.split('\n').length });

    // Disk output
    if (this._options.outputPath !== undefined) {
      collector.info('Writing diagram', { path: this._options.outputPath });
      ModelExporter.writeDiagram(diagram, this._options.outputPath);
    }
    if (this._options.debugOutputDir !== undefined) {
      collector.info('Writing debug artifacts', { dir: this._options.debugOutputDir });
      ModelExporter.writeDebugArtifacts(
        model,
        stats,
        collector.diagnostics,
        diagram,
        this._options.debugOutputDir,
      );
    }

    collector.info('Generation complete', { warnings: collector.diagnostics.length });
    return { diagram, model, stats, diagnostics: [...collector.diagnostics] };
  }
}
