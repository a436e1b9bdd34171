/**
 * errors.ts
 * Fatal error types. Each carries the offending path so the front end can
 * report it without parsing the message.
 *
 * Non-fatal conditions (missing role files, unresolvable includes) are never
 * thrown; they are logged as warnings where they occur.
 */

export type PlaybookGraphErrorCode = 'FORMAT' | 'MISSING_RESOURCE' | 'MODEL_VALIDATION';

export class PlaybookGraphError extends Error {
  readonly code: PlaybookGraphErrorCode;

  constructor(code: PlaybookGraphErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlaybookGraphError';
    this.code = code;
  }
}

/** Malformed YAML in a playbook or inventory. */
export class FormatError extends PlaybookGraphError {
  readonly filePath: string;

  constructor(filePath: string, detail: string, options?: { cause?: unknown }) {
    super('FORMAT', `Invalid YAML in ${filePath}: ${detail}`, options);
    this.name = 'FormatError';
    this.filePath = filePath;
  }
}

/** A caller-supplied inventory or playbook path that cannot be read. */
export class MissingResourceError extends PlaybookGraphError {
  readonly filePath: string;

  constructor(filePath: string, kind: 'inventory' | 'playbook') {
    super('MISSING_RESOURCE', `Cannot load ${kind}: ${filePath} does not exist or is not readable`);
    this.name = 'MissingResourceError';
    this.filePath = filePath;
  }
}

/** An assembled model that breaks one of its own invariants. */
export class ModelValidationError extends PlaybookGraphError {
  constructor(message: string) {
    super('MODEL_VALIDATION', message);
    this.name = 'ModelValidationError';
  }
}
