import type { ZodIssue } from 'zod';
import type { StageName } from '../types';

export class PipelineError extends Error {
  readonly stage: StageName;
  readonly iteration?: number;

  constructor(message: string, stage: StageName, iteration?: number) {
    super(message);
    this.name = 'PipelineError';
    this.stage = stage;
    this.iteration = iteration;
  }
}

function stageLabel(stage: StageName, iteration?: number): string {
  return iteration === undefined ? stage : `${stage}, iteration ${iteration}`;
}

/** Normalized model output that is not valid JSON. */
export class DecodeError extends PipelineError {
  readonly text: string;

  constructor(stage: StageName, text: string, cause: string, iteration?: number) {
    super(`Failed to parse JSON response in ${stageLabel(stage, iteration)}: ${cause}`, stage, iteration);
    this.name = 'DecodeError';
    this.text = text;
  }
}

/** Valid JSON whose shape does not match the stage's output type. */
export class SchemaError extends PipelineError {
  readonly issues: ZodIssue[];
  readonly value: unknown;

  constructor(stage: StageName, issues: ZodIssue[], value: unknown, iteration?: number) {
    const summary = issues
      .map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
      .join('; ');
    super(`Unexpected response shape in ${stageLabel(stage, iteration)}: ${summary}`, stage, iteration);
    this.name = 'SchemaError';
    this.issues = issues;
    this.value = value;
  }
}

/** Failure at the completion-service boundary (API error, network, empty reply). */
export class ServiceError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'ServiceError';
    this.status = status;
  }
}
