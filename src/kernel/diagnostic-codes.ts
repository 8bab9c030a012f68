export const MESSAGE_SPEC_DIAGNOSTIC_CODES = Object.freeze({
  // row reader
  INVALID_LEVEL: 'InvalidLevelError',
  INVALID_ROW: 'InvalidRowError',
  // IR builder
  HIERARCHY_GAP: 'HierarchyGapError',
  MARKER_LENGTH: 'MarkerLengthError',
  DUPLICATE_FIELD_PATH: 'DuplicateFieldPathError',
  MISSING_FIELD: 'MissingFieldError',
  UNPARSABLE_LENGTH: 'UnparsableLengthError',
  INVALID_OCCURRENCE: 'InvalidOccurrenceError',
  INVALID_OVERRIDE_NAME: 'InvalidOverrideNameError',
  NESTING_TOO_DEEP: 'NestingDepthWarning',
  // layout
  UNBOUNDED_ARRAY: 'UnboundedArrayError',
  INVALID_REPETITION_COUNT: 'InvalidRepetitionCountError',
  REPETITION_COUNT_IGNORED: 'RepetitionCountIgnoredWarning',
  // message conformance
  TRUNCATED_PAYLOAD: 'TruncatedPayloadError',
  VALUE_MISMATCH: 'ValueMismatchError',
  UNVERIFIABLE_FIELD: 'UnverifiableFieldWarning',
  // cross-artifact consistency
  MISSING_IN_ARTIFACT: 'MissingInArtifactError',
  ATTRIBUTE_MISMATCH: 'AttributeMismatchError',
  EXTRANEOUS_FIELD: 'ExtraneousFieldError',
  DUPLICATE_ARTIFACT_FIELD: 'DuplicateArtifactFieldError',
  ORDER_MISMATCH: 'OrderMismatchError',
  // bookkeeping
  DIAGNOSTICS_TRUNCATED: 'DiagnosticsTruncated',
  ERROR_QUOTA_REACHED: 'ErrorQuotaReachedWarning',
} as const);

export type MessageSpecDiagnosticCode =
  (typeof MESSAGE_SPEC_DIAGNOSTIC_CODES)[keyof typeof MESSAGE_SPEC_DIAGNOSTIC_CODES];
