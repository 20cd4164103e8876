import type { z } from 'zod';
import type { PromptVariables, StageName } from '../types';
import type { CompletionService } from './completion';
import { normalizeResponse, type ResponseNormalizer } from '../utils/normalize';
import { decodeJson } from '../utils/decode';
import { DecodeError, SchemaError } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';

/** Everything a pipeline run needs from its caller. */
export interface PipelineContext {
  completion: CompletionService;
  /** Defaults to {@link normalizeResponse}. */
  normalize?: ResponseNormalizer;
  logger?: Logger;
}

export interface StructuredStage<T> {
  name: StageName;
  prompt: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export function stageLogger(ctx: PipelineContext, stage: StageName, iteration?: number): Logger {
  const base = ctx.logger ?? rootLogger;
  return base.child(iteration === undefined ? { stage } : { stage, iteration });
}

/** Renders, completes and normalizes; the text-only half of a stage. */
export async function completeStage(
  ctx: PipelineContext,
  stage: StageName,
  prompt: string,
  variables: PromptVariables,
  iteration?: number,
): Promise<string> {
  const log = stageLogger(ctx, stage, iteration);
  log.debug('Stage started');
  const raw = await ctx.completion.complete(prompt, variables);
  const normalize = ctx.normalize ?? normalizeResponse;
  const text = normalize(raw);
  log.debug('Stage response received', { rawLength: raw.length, normalizedLength: text.length });
  return text;
}

/** complete → normalize → decode → validate. Any failure aborts the caller's run. */
export async function runStructuredStage<T>(
  ctx: PipelineContext,
  stage: StructuredStage<T>,
  variables: PromptVariables,
  iteration?: number,
): Promise<T> {
  const text = await completeStage(ctx, stage.name, stage.prompt, variables, iteration);
  const log = stageLogger(ctx, stage.name, iteration);

  let value: unknown;
  try {
    value = decodeJson(text, stage.name, iteration);
  } catch (err) {
    if (err instanceof DecodeError) log.error('Failed to parse model response', { text: err.text, error: err.message });
    throw err;
  }

  const parsed = stage.schema.safeParse(value);
  if (!parsed.success) {
    log.error('Model response has unexpected shape', {
      issues: parsed.error.issues,
    });
    throw new SchemaError(stage.name, parsed.error.issues, value, iteration);
  }
  return parsed.data;
}

export function toPromptJson(value: unknown, pretty = false): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}
