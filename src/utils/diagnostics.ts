/**
 * Diagnostic construction and flattening.
 */

import type { Diagnostic, DiagnosticKind } from "../types.ts";

/** Kinds that only describe a degradation path and need no follow-up. */
const INFO_KINDS: ReadonlySet<DiagnosticKind> = new Set<DiagnosticKind>([
  "no_execution_ref",
  "log_not_found",
  "cumulative_fallback",
]);

export function diagnostic(
  kind: DiagnosticKind,
  message: string,
  executionId?: string,
): Diagnostic {
  const d: Diagnostic = {
    kind,
    severity: INFO_KINDS.has(kind) ? "info" : "warning",
    message,
  };
  if (executionId !== undefined) d.executionId = executionId;
  return d;
}

/**
 * Flatten diagnostics into plain human-readable strings.
 */
export function diagnosticMessages(diagnostics: Diagnostic[]): string[] {
  return diagnostics.map((d) => d.message);
}
