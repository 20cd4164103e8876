import dotenv from 'dotenv';
dotenv.config();

function required(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required env var: ${key}`);
  return val;
}

function intFromEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const val = parseInt(raw, 10);
  if (Number.isNaN(val) || val < 0) throw new Error(`Env var ${key} must be a non-negative integer, got "${raw}"`);
  return val;
}

function floatFromEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const val = parseFloat(raw);
  if (Number.isNaN(val)) throw new Error(`Env var ${key} must be a number, got "${raw}"`);
  return val;
}

export const config = {
  port: intFromEnv('PORT', 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  openai: {
    apiKey: required('OPENAI_API_KEY'),
    model: process.env.OPENAI_MODEL || 'gpt-4o',
    temperature: floatFromEnv('OPENAI_TEMPERATURE', 0.7),
  },
  completion: {
    timeoutMs: intFromEnv('COMPLETION_TIMEOUT_MS', 600_000),
    maxRetries: intFromEnv('COMPLETION_MAX_RETRIES', 0),
  },
  planner: {
    refinementIterations: intFromEnv('PLANNER_REFINEMENT_ITERATIONS', 2),
  },
  api: {
    // Optional. When unset the pipeline routes are open.
    key: process.env.API_KEY || '',
  },
};
