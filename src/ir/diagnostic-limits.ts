import type { Diagnostic } from '../kernel/diagnostics.js';
import { MESSAGE_SPEC_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';

export const DEFAULT_MAX_DIAGNOSTICS = 500;

/** Drops exact repeats of an earlier diagnostic; the first occurrence keeps its place. */
export function dedupeDiagnostics(diagnostics: readonly Diagnostic[]): readonly Diagnostic[] {
  const seen = new Set<string>();
  return diagnostics.filter((diagnostic) => {
    const identity = identityOf(diagnostic);
    if (seen.has(identity)) {
      return false;
    }
    seen.add(identity);
    return true;
  });
}

/**
 * Keeps the first `maxDiagnostics - 1` entries and replaces the rest with one
 * truncation notice, which is an error when any dropped entry was one.
 */
export function capDiagnostics(
  diagnostics: readonly Diagnostic[],
  maxDiagnostics: number = DEFAULT_MAX_DIAGNOSTICS,
  path = 'diagnostics',
): readonly Diagnostic[] {
  const normalizedCap = Number.isFinite(maxDiagnostics) ? Math.max(1, Math.floor(maxDiagnostics)) : DEFAULT_MAX_DIAGNOSTICS;
  if (diagnostics.length <= normalizedCap) {
    return diagnostics;
  }

  const kept = diagnostics.slice(0, Math.max(0, normalizedCap - 1));
  const dropped = diagnostics.slice(kept.length);
  const droppedCount = dropped.length;
  const truncationNotice: Diagnostic = {
    code: MESSAGE_SPEC_DIAGNOSTIC_CODES.DIAGNOSTICS_TRUNCATED,
    path,
    severity: dropped.some((diagnostic) => diagnostic.severity === 'error') ? 'error' : 'warning',
    message: `Diagnostic limit reached; ${droppedCount} additional diagnostic(s) were truncated.`,
    suggestion: 'Fix the reported issues first or raise diagnostics.maxPerStage when triaging.',
  };

  return [...kept, truncationNotice];
}

function identityOf(diagnostic: Diagnostic): string {
  const { code, path, severity, message, suggestion, source, artifact, expected, actual } = diagnostic;
  return JSON.stringify([code, path, severity, message, suggestion, source?.sheet, source?.rowNumber, artifact, expected, actual]);
}
