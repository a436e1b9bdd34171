/**
 * model-validator.ts
 * Invariant checks on an assembled RepositoryModel.
 * Throws ModelValidationError on the first violation found.
 *
 * Validation rules enforced:
 *   1. Every import target of a playbook is itself a parsed playbook.
 *   2. Every role in the role set has a task list and a dependency list.
 *   3. Every role named by a play (`roles` or a RoleRef) is in the role set.
 *   4. Every role dependency is in the role set.
 */

import type { RepositoryModel } from '../models/repository-model.js';
import { collectRoleRefs } from '../models/tasks.js';
import { ModelValidationError } from './errors.js';

export class ModelValidator {
  static validate(model: RepositoryModel): void {
    ModelValidator._validateImports(model);
    ModelValidator._validateResolvedRoles(model);
    ModelValidator._validateRoleReferences(model);
    ModelValidator._validateDependencies(model);
  }

  // ---------------------------------------------------------------------------
  // Rule 1 - import targets were parsed
  // ---------------------------------------------------------------------------

  private static _validateImports(model: RepositoryModel): void {
    for (const playbook of model.playbooks.values()) {
      for (const target of playbook.importedPlaybooks) {
        if (!model.playbooks.has(target)) {
          throw new ModelValidationError(
            `Rule 1 violation: playbook "${playbook.path}" imports "${target}" ` +
            `which was not parsed.`,
          );
        }
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Rule 2 - every known role was resolved
  // ---------------------------------------------------------------------------

  private static _validateResolvedRoles(model: RepositoryModel): void {
    for (const role of model.roles) {
      if (!model.roleTasks.has(role) || !model.roleDependencies.has(role)) {
        throw new ModelValidationError(
          `Rule 2 violation: role "${role}" is known but was never resolved.`,
        );
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Rule 3 - play role references are known roles
  // ---------------------------------------------------------------------------

  private static _validateRoleReferences(model: RepositoryModel): void {
    for (const playbook of model.playbooks.values()) {
      for (const play of playbook.plays) {
        for (const role of [...play.roles, ...collectRoleRefs(play.tasks)]) {
          if (!model.roles.has(role)) {
            throw new ModelValidationError(
              `Rule 3 violation: playbook "${playbook.path}" references role "${role}" ` +
              `which is not in the role set.`,
            );
          }
        }
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Rule 4 - dependencies are known roles
  // ---------------------------------------------------------------------------

  private static _validateDependencies(model: RepositoryModel): void {
    for (const [role, deps] of model.roleDependencies) {
      for (const dep of deps) {
        if (!model.roles.has(dep)) {
          throw new ModelValidationError(
            `Rule 4 violation: role "${role}" depends on "${dep}" which is not in the role set.`,
          );
        }
      }
    }
  }
}
