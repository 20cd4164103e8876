import type { CallPlan, CallPlanningResult, Intent, StageName, SystemPromptBundle } from '../types';
import { callPlanSchema, intentSchema, systemPromptBundleSchema } from '../schemas';
import { callPlanPrompt, intentPrompt, refinePlanPrompt, systemPromptPrompt } from '../prompts';
import { analyzePlan } from '../utils/plan-graph';
import { parseJson } from '../utils/decode';
import {
  completeStage,
  runStructuredStage,
  stageLogger,
  toPromptJson,
  type PipelineContext,
  type StructuredStage,
} from './stage';

export const DEFAULT_REFINEMENT_ITERATIONS = 2;

const intentStage: StructuredStage<Intent> = {
  name: 'generate_intent',
  prompt: intentPrompt,
  schema: intentSchema,
};

const callPlanStage: StructuredStage<CallPlan> = {
  name: 'generate_call_plan',
  prompt: callPlanPrompt,
  schema: callPlanSchema,
};

const refinementStage: StructuredStage<CallPlan> = {
  name: 'iterative_refinement',
  prompt: refinePlanPrompt,
  schema: callPlanSchema,
};

function assertIterations(iterations: number) {
  if (!Number.isInteger(iterations) || iterations < 0) {
    throw new RangeError(`Refinement iterations must be a non-negative integer, got ${iterations}`);
  }
}

function reportPlan(ctx: PipelineContext, plan: CallPlan, stage: StageName, iteration?: number) {
  const report = analyzePlan(plan);
  const log = stageLogger(ctx, stage, iteration);
  if (report.danglingTransitions.length > 0 || report.duplicateNames.length > 0) {
    log.warn('Call plan has unresolved transitions', {
      scenarios: plan.scenarios.length,
      danglingTransitions: report.danglingTransitions,
      duplicateNames: report.duplicateNames,
    });
  } else {
    log.info('Call plan generated', { scenarios: plan.scenarios.length });
  }
}

export async function generateIntent(ctx: PipelineContext, userInput: string): Promise<Intent> {
  const intent = await runStructuredStage(ctx, intentStage, { user_input: userInput });
  stageLogger(ctx, intentStage.name).info('Intent generated', { intent });
  return intent;
}

export async function generateCallPlan(ctx: PipelineContext, intent: Intent): Promise<CallPlan> {
  const plan = await runStructuredStage(ctx, callPlanStage, { intent: toPromptJson(intent) });
  reportPlan(ctx, plan, callPlanStage.name);
  return plan;
}

/**
 * Regenerates the plan `iterations` times. Each pass replaces the working
 * plan; only the last one is returned. Zero iterations returns `plan` as is.
 */
export async function refineCallPlan(
  ctx: PipelineContext,
  plan: CallPlan,
  intent: Intent,
  iterations: number,
): Promise<CallPlan> {
  assertIterations(iterations);

  let refined = plan;
  for (let i = 1; i <= iterations; i++) {
    refined = await runStructuredStage(
      ctx,
      refinementStage,
      { plan_json: toPromptJson(refined, true), intent: toPromptJson(intent) },
      i,
    );
    reportPlan(ctx, refined, refinementStage.name, i);
  }
  return refined;
}

/** Returns the normalized synthesis text; see {@link parseSystemPromptBundle}. */
export async function createSystemPrompt(ctx: PipelineContext, plan: CallPlan, intent: Intent): Promise<string> {
  const text = await completeStage(ctx, 'create_system_prompt', systemPromptPrompt, {
    plan_json: toPromptJson(plan, true),
    intent: toPromptJson(intent),
  });
  stageLogger(ctx, 'create_system_prompt').info('System prompt generated', { length: text.length });
  return text;
}

export function parseSystemPromptBundle(text: string): SystemPromptBundle | null {
  const parsed = parseJson(text);
  if (!parsed.ok) return null;
  const bundle = systemPromptBundleSchema.safeParse(parsed.value);
  return bundle.success ? bundle.data : null;
}

export interface CallPlanningOptions {
  refinementIterations?: number;
}

export async function runCallPlanning(
  ctx: PipelineContext,
  userInput: string,
  options: CallPlanningOptions = {},
): Promise<CallPlanningResult> {
  const iterations = options.refinementIterations ?? DEFAULT_REFINEMENT_ITERATIONS;
  assertIterations(iterations);

  const intent = await generateIntent(ctx, userInput);
  const initialPlan = await generateCallPlan(ctx, intent);
  const plan = await refineCallPlan(ctx, initialPlan, intent, iterations);
  const systemPrompt = await createSystemPrompt(ctx, plan, intent);

  const bundle = parseSystemPromptBundle(systemPrompt);
  if (!bundle) {
    stageLogger(ctx, 'create_system_prompt').warn('System prompt response is not a prompt bundle; returning text only');
  }

  return { intent, plan, systemPrompt, bundle };
}
