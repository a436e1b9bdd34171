/**
 * index.ts
 * Public API: build a repository model and render it as a Mermaid graph.
 */

export * from './models/index.js';
export * from './services/index.js';
export { RepositoryModelBuilder } from './builders/index.js';
export { DiagramOrchestrator } from './orchestrator/index.js';
export type { DiagramOrchestratorOptions, DiagramResult } from './orchestrator/index.js';
export { InventoryParser } from './parsers/inventory/inventory-parser.js';
export { PlaybookParser } from './parsers/playbook/playbook-parser.js';
export { TaskExtractor } from './parsers/playbook/task-extractor.js';
export { RoleResolver } from './analyzers/roles/role-resolver.js';
export type { RoleResolution } from './analyzers/roles/role-resolver.js';
export { generateMermaidDiagram } from './visualization/mermaid-generator.js';
export { sanitizeId, escapeLabel } from './visualization/mermaid-utils.js';
