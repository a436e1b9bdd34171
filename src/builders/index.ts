/**
 * builders/index.ts
 * Barrel export for the model builders.
 */

export { RepositoryModelBuilder } from './repository-model-builder.js';
