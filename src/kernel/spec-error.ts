export type MessageSpecErrorCode =
  | 'CONFIG_INVALID'
  | 'PERSISTED_MODEL_INVALID'
  | 'ARTIFACT_PROJECTION_INVALID'
  | 'UNKNOWN_NODE'
  | 'OFFSET_TABLE_INVARIANT';

export type MessageSpecErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: MessageSpecErrorContext): string {
  if (context === undefined) {
    return message;
  }

  return `${message} context=${JSON.stringify(context)}`;
}

export class MessageSpecError extends Error {
  readonly code: MessageSpecErrorCode;
  readonly context?: MessageSpecErrorContext;

  constructor(code: MessageSpecErrorCode, message: string, context?: MessageSpecErrorContext) {
    super(formatMessage(message, context));
    this.name = 'MessageSpecError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export function createMessageSpecError(
  code: MessageSpecErrorCode,
  message: string,
  context?: MessageSpecErrorContext,
): MessageSpecError {
  return new MessageSpecError(code, message, context);
}

export function configInvalidError(message: string, context?: MessageSpecErrorContext): MessageSpecError {
  return createMessageSpecError('CONFIG_INVALID', message, context);
}

export function persistedModelInvalidError(message: string, context?: MessageSpecErrorContext): MessageSpecError {
  return createMessageSpecError('PERSISTED_MODEL_INVALID', message, context);
}

export function artifactProjectionInvalidError(message: string, context?: MessageSpecErrorContext): MessageSpecError {
  return createMessageSpecError('ARTIFACT_PROJECTION_INVALID', message, context);
}

export function unknownNodeError(message: string, context?: MessageSpecErrorContext): MessageSpecError {
  return createMessageSpecError('UNKNOWN_NODE', message, context);
}

export function offsetTableInvariantError(message: string, context?: MessageSpecErrorContext): MessageSpecError {
  return createMessageSpecError('OFFSET_TABLE_INVARIANT', message, context);
}

export function isMessageSpecError(error: unknown): error is MessageSpecError {
  return error instanceof MessageSpecError;
}
