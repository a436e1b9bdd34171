/**
 * diagnostics.ts
 * A recorded log entry. Non-fatal problems met while parsing (missing role
 * files, unresolvable includes, empty playbooks) are returned to the caller
 * as a list of these instead of going to shared process-wide state.
 */

export type DiagnosticLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Diagnostic {
  level: DiagnosticLevel;
  message: string;
  context?: Record<string, unknown>;
}
