import type { StageName } from '../types';
import { DecodeError } from './errors';
import { errorMessage } from './logger';

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: string };

export function parseJson(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

/** All-or-nothing JSON decode; failures carry the stage and offending text. */
export function decodeJson(text: string, stage: StageName, iteration?: number): unknown {
  const parsed = parseJson(text);
  if (!parsed.ok) throw new DecodeError(stage, text, parsed.error, iteration);
  return parsed.value;
}
