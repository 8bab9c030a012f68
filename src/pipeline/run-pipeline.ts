import type { Diagnostic } from '../kernel/diagnostics.js';
import { MESSAGE_SPEC_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import type { MessageModel, MessageType, RenameEntry, RunProvenance, SheetRows } from '../kernel/types.js';
import { MESSAGE_TYPES } from '../kernel/types.js';
import { type ExitSignal, ValidationResult } from '../kernel/validation-result.js';
import { buildMessageModel } from '../ir/build-message-model.js';
import { capDiagnostics, dedupeDiagnostics } from '../ir/diagnostic-limits.js';
import { computeLayout } from '../layout/compute-layout.js';
import type { OffsetTable } from '../layout/offset-table.js';
import { validateConsistency, type TypeMapper } from '../validate/consistency-validator.js';
import { validateMessage, type ValueResolver } from '../validate/message-validator.js';
import type { ArtifactKind, ArtifactProjection } from '../validate/projections.js';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from './config.js';
import { silentLogger, type Logger } from './logger.js';

export type PipelineStage = 'build' | 'layout' | 'message' | 'consistency';

export interface PipelineMessageInput {
  readonly sheet: SheetRows;
  /** Operation-id derived root name. */
  readonly rootName?: string;
  /** Captured wire message to check against the layout. */
  readonly payload?: string | Uint8Array;
  /** Enumerated-rule selections for the payload, keyed by indexed or plain path. */
  readonly overrides?: Readonly<Record<string, string>>;
  /** Field definitions extracted from generated artifacts. */
  readonly artifacts?: readonly ArtifactProjection[];
}

export interface PipelineInput {
  readonly request?: PipelineMessageInput;
  readonly response?: PipelineMessageInput;
  readonly header?: SheetRows;
  readonly provenance?: RunProvenance;
}

export interface RunPipelineOptions {
  readonly logger?: Logger;
  readonly resolver?: ValueResolver;
  readonly typeMappers?: Partial<Readonly<Record<ArtifactKind, TypeMapper>>>;
}

export interface MessageOutcome {
  readonly messageType: MessageType;
  readonly model: MessageModel | null;
  readonly table: OffsetTable | null;
  readonly stages: readonly PipelineStage[];
  readonly result: ValidationResult;
}

export interface PipelineRun {
  readonly outcomes: readonly MessageOutcome[];
  /** Rename ledger of every built model, request first. */
  readonly renames: readonly RenameEntry[];
  readonly result: ValidationResult;
  readonly exitCode: ExitSignal;
  readonly provenance: RunProvenance;
}

/**
 * Runs each supplied message type independently and concurrently, then merges
 * outcomes in request, response order. A failing stage stops only its own message type.
 */
export async function runPipeline(
  input: PipelineInput,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
  options: RunPipelineOptions = {},
): Promise<PipelineRun> {
  const logger = options.logger ?? silentLogger;
  const provenance: RunProvenance = Object.freeze({ ...(input.provenance ?? {}) });

  const jobs = MESSAGE_TYPES.flatMap((messageType) => {
    const messageInput = input[messageType];
    return messageInput === undefined
      ? []
      : [processMessage(messageType, messageInput, input.header, config, options, logger.child(messageType))];
  });
  const outcomes = await Promise.all(jobs);

  const result = ValidationResult.mergeAll(outcomes.map((outcome) => outcome.result));
  const renames = outcomes.flatMap((outcome) => outcome.model?.renames ?? []);
  logger.info('Pipeline run finished', {
    messageTypes: outcomes.map((outcome) => outcome.messageType),
    errors: result.errorCount,
    warnings: result.warningCount,
  });

  return Object.freeze({
    outcomes: Object.freeze(outcomes),
    renames: Object.freeze(renames),
    result,
    exitCode: result.exitCode,
    provenance,
  });
}

async function processMessage(
  messageType: MessageType,
  messageInput: PipelineMessageInput,
  header: SheetRows | undefined,
  config: PipelineConfig,
  options: RunPipelineOptions,
  logger: Logger,
): Promise<MessageOutcome> {
  const maxPerStage = config.diagnostics.maxPerStage;
  const stages: PipelineStage[] = [];
  let result = ValidationResult.empty();
  let model: MessageModel | null = null;
  let table: OffsetTable | null = null;

  const record = (stage: PipelineStage, diagnostics: readonly Diagnostic[]): boolean => {
    stages.push(stage);
    const capped = capDiagnostics(dedupeDiagnostics(diagnostics), maxPerStage, `${messageType}.${stage}`);
    result = result.merge(ValidationResult.of(capped));
    if (result.errorCount < config.validation.maxErrors) {
      return true;
    }
    result = result.merge(
      ValidationResult.of([
        {
          code: MESSAGE_SPEC_DIAGNOSTIC_CODES.ERROR_QUOTA_REACHED,
          path: `${messageType}.${stage}`,
          severity: 'warning',
          message: `Error quota of ${config.validation.maxErrors} reached after the ${stage} stage; remaining ${messageType} stages were skipped.`,
        },
      ]),
    );
    logger.warn('Error quota reached', { stage, errors: result.errorCount });
    return false;
  };
  const outcome = (): MessageOutcome => Object.freeze({ messageType, model, table, stages: Object.freeze([...stages]), result });

  // Stages are synchronous; yielding once lets the other message type start.
  await Promise.resolve();

  const built = buildMessageModel(messageType, messageInput.sheet, {
    ...(messageInput.rootName === undefined ? {} : { rootName: messageInput.rootName }),
    ...(header === undefined ? {} : { header }),
    headerAnchor: config.header.anchor,
    ...(config.header.groupName === undefined ? {} : { headerGroupName: config.header.groupName }),
    maxNameLength: config.naming.maxNameLength,
    descriptionWords: config.naming.descriptionWords,
    maxDiagnostics: maxPerStage,
    maxNestingDepth: config.structure.maxNestingDepth,
  });
  model = built.model;
  const buildContinues = record('build', built.diagnostics);
  if (model === null) {
    logger.error('Message model could not be built', { diagnostics: built.diagnostics.length });
    return outcome();
  }
  logger.info('Built message model', { nodes: model.nodes.length, totalDeclaredLength: model.totalDeclaredLength });
  if (!buildContinues) {
    return outcome();
  }

  const layout = computeLayout(model, { repetitionCounts: config.layout.repetitionCounts[messageType] });
  table = layout.table;
  const layoutContinues = record('layout', layout.diagnostics);
  if (table === null) {
    logger.error('Layout failed', { diagnostics: layout.diagnostics.length });
    return outcome();
  }
  logger.debug('Computed layout', { entries: table.size, totalLength: table.totalLength });
  if (!layoutContinues) {
    return outcome();
  }

  if (messageInput.payload !== undefined) {
    const messageResult = validateMessage(table, messageInput.payload, {
      ...(options.resolver === undefined ? {} : { resolver: options.resolver }),
      ...(messageInput.overrides === undefined ? {} : { overrides: messageInput.overrides }),
      numericDatatypes: config.validation.numericDatatypes,
    });
    logger.info('Validated payload', { errors: messageResult.errorCount, warnings: messageResult.warningCount });
    if (!record('message', messageResult.issues)) {
      return outcome();
    }
  }

  if (messageInput.artifacts !== undefined && messageInput.artifacts.length > 0) {
    const consistency = validateConsistency(model, messageInput.artifacts, {
      ...(options.typeMappers === undefined ? {} : { typeMappers: options.typeMappers }),
    });
    logger.info('Checked artifact consistency', {
      artifacts: messageInput.artifacts.map((artifact) => artifact.artifact),
      errors: consistency.errorCount,
    });
    record('consistency', consistency.issues);
  }

  return outcome();
}
