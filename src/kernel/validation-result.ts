import type { Diagnostic } from './diagnostics.js';

export type ExitSignal = 0 | 1;

/**
 * Ordered, immutable set of findings from one validation pass.
 *
 * Success means no error-severity issue; warnings never affect the exit signal.
 */
export class ValidationResult {
  private static readonly EMPTY = new ValidationResult([]);

  readonly issues: readonly Diagnostic[];

  private constructor(issues: readonly Diagnostic[]) {
    this.issues = Object.freeze([...issues]);
  }

  static empty(): ValidationResult {
    return ValidationResult.EMPTY;
  }

  static of(issues: readonly Diagnostic[]): ValidationResult {
    return issues.length === 0 ? ValidationResult.EMPTY : new ValidationResult(issues);
  }

  get success(): boolean {
    return this.errorCount === 0;
  }

  get errorCount(): number {
    return this.issues.filter((issue) => issue.severity === 'error').length;
  }

  get warningCount(): number {
    return this.issues.filter((issue) => issue.severity === 'warning').length;
  }

  get exitCode(): ExitSignal {
    return this.success ? 0 : 1;
  }

  errors(): readonly Diagnostic[] {
    return this.issues.filter((issue) => issue.severity === 'error');
  }

  warnings(): readonly Diagnostic[] {
    return this.issues.filter((issue) => issue.severity === 'warning');
  }

  /** Other's issues are appended after this result's issues. */
  merge(other: ValidationResult): ValidationResult {
    if (other.issues.length === 0) {
      return this;
    }
    if (this.issues.length === 0) {
      return other;
    }
    return new ValidationResult([...this.issues, ...other.issues]);
  }

  static mergeAll(results: readonly ValidationResult[]): ValidationResult {
    return results.reduce((merged, result) => merged.merge(result), ValidationResult.EMPTY);
  }
}
