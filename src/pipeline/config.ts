import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { configInvalidError } from '../kernel/spec-error.js';
import { DEFAULT_MAX_NESTING_DEPTH } from '../ir/build-message-model.js';
import { DEFAULT_MAX_DIAGNOSTICS } from '../ir/diagnostic-limits.js';
import { DEFAULT_DESCRIPTION_WORDS, DEFAULT_MAX_NAME_LENGTH } from '../ir/naming.js';
import { DEFAULT_NUMERIC_DATATYPES } from '../validate/hard-code-rule.js';

const RepetitionCountsSchema = z.record(z.string(), z.number().int().nonnegative());

export const PipelineConfigSchema = z
  .object({
    naming: z
      .object({
        maxNameLength: z.number().int().positive().default(DEFAULT_MAX_NAME_LENGTH),
        descriptionWords: z.number().int().positive().default(DEFAULT_DESCRIPTION_WORDS),
      })
      .strict()
      .default({}),
    structure: z
      .object({
        maxNestingDepth: z.number().int().positive().default(DEFAULT_MAX_NESTING_DEPTH),
      })
      .strict()
      .default({}),
    header: z
      .object({
        anchor: z.number().int().nonnegative().default(0),
        groupName: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    layout: z
      .object({
        repetitionCounts: z
          .object({
            request: RepetitionCountsSchema.default({}),
            response: RepetitionCountsSchema.default({}),
          })
          .strict()
          .default({}),
      })
      .strict()
      .default({}),
    validation: z
      .object({
        numericDatatypes: z.array(z.string().min(1)).default([...DEFAULT_NUMERIC_DATATYPES]),
        maxErrors: z.number().int().positive().default(500),
      })
      .strict()
      .default({}),
    diagnostics: z
      .object({
        maxPerStage: z.number().int().positive().default(DEFAULT_MAX_DIAGNOSTICS),
      })
      .strict()
      .default({}),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Partial configuration as written by users; missing keys take defaults. */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export function resolvePipelineConfig(value: unknown = {}): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(value ?? {});
  if (!parsed.success) {
    throw configInvalidError('Pipeline configuration is invalid.', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export function loadPipelineConfig(yamlText: string): PipelineConfig {
  let value: unknown;
  try {
    value = parseYaml(yamlText);
  } catch (error) {
    throw configInvalidError('Pipeline configuration is not valid YAML.', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return resolvePipelineConfig(value);
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = resolvePipelineConfig({});
