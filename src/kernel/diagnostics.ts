import type { MessageSpecDiagnosticCode } from './diagnostic-codes.js';

export type DiagnosticSeverity = 'error' | 'warning';

export interface DiagnosticRowSource {
  readonly sheet: string;
  readonly rowNumber: number;
}

export interface Diagnostic {
  readonly code: MessageSpecDiagnosticCode;
  readonly path: string;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly suggestion?: string;
  readonly source?: DiagnosticRowSource;
  readonly artifact?: string;
  readonly expected?: string;
  readonly actual?: string;
}

export function hasErrorDiagnostics(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}
