import { z } from 'zod';
import type {
  CallPlan,
  CallSummary,
  Intent,
  PlanAction,
  Scenario,
  SystemPromptBundle,
} from '../types';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCamelCase(key: string): string {
  return key.replace(/_([a-z])/g, (_m: string, ch: string) => ch.toUpperCase());
}

/**
 * Models answer with either spelling (`first_message` / `firstMessage`), and
 * older intent prompts used labelled keys. Aliases are only applied when the
 * canonical key is absent.
 */
function withAliases(aliases: Record<string, string> = {}) {
  return (value: unknown): unknown => {
    if (!isPlainObject(value)) return value;
    const out: Record<string, unknown> = { ...value };
    for (const [key, val] of Object.entries(value)) {
      const target = aliases[key] ?? toCamelCase(key);
      if (target !== key && !(target in out)) {
        out[target] = val;
        delete out[key];
      }
    }
    return out;
  };
}

// Models sometimes answer `null` for an empty field.
const text = z
  .string()
  .nullish()
  .transform((v) => v ?? '');

export const intentSchema: Schema<Intent> = z.preprocess(
  withAliases({ 'Caller(You)': 'callerRole', 'recipient(Opponent)': 'recipientRole' }),
  z
    .object({
      callerRole: z.string().optional(),
      recipientRole: z.string().optional(),
      purpose: z.string().optional(),
      context: z.string().optional(),
    })
    .passthrough(),
);

export const planActionSchema: Schema<PlanAction> = z.preprocess(
  withAliases(),
  z.object({ action: text, next: text }).passthrough(),
);

export const scenarioSchema: Schema<Scenario> = z.preprocess(
  withAliases(),
  z
    .object({
      name: text,
      description: text,
      chainOfThought: text,
      possibleActions: z
        .array(planActionSchema)
        .nullish()
        .transform((v) => v ?? []),
    })
    .passthrough(),
);

export const callPlanSchema: Schema<CallPlan> = z.preprocess(
  withAliases(),
  z.object({ scenarios: z.array(scenarioSchema) }).passthrough(),
);

export const systemPromptBundleSchema: Schema<SystemPromptBundle> = z.preprocess(
  withAliases(),
  z.object({ systemPrompt: z.string(), firstMessage: z.string() }),
);

export const callSummarySchema: Schema<CallSummary> = z.preprocess(
  withAliases(),
  z.object({
    recipient: text,
    purpose: text,
    result: z.preprocess(
      (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
      z.enum(['success', 'failure']),
    ),
    failureReason: z
      .string()
      .nullable()
      .default(null)
      .transform((v) => (v === null || v.trim() === '' ? null : v)),
    nextSteps: text,
    additionalDetails: text,
  }),
);
