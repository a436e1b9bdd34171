/**
 * orchestrator/index.ts
 * Barrel export for the diagram orchestrator.
 */

export { DiagramOrchestrator } from './diagram-orchestrator.js';
export type { DiagramOrchestratorOptions, DiagramResult } from './diagram-orchestrator.js';
