import { parseJson } from './decode';

const FENCE = '```';
const LEADING_JSON_MARKER = /^\s*json\s*/i;

/**
 * Strips markdown artifacts from raw model output: every triple-backtick
 * fence, one leading `json` language marker, and surrounding whitespace.
 * Never throws; the result may still be invalid JSON.
 */
export function normalizeResponse(raw: string): string {
  return raw.split(FENCE).join('').replace(LEADING_JSON_MARKER, '').trim();
}

function balancedSpanAt(text: string, start: number): string | null {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') {
      if (stack.pop() !== ch) return null;
      if (stack.length === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function findJsonSpan(text: string): string | null {
  for (let start = 0; start < text.length; start++) {
    const ch = text[start];
    if (ch !== '{' && ch !== '[') continue;
    const span = balancedSpanAt(text, start);
    if (span !== null && parseJson(span).ok) return span;
  }
  return null;
}

/**
 * Tolerant variant of {@link normalizeResponse} for models that wrap JSON in
 * prose: falls back to the first balanced object or array span that parses.
 */
export function extractJsonPayload(raw: string): string {
  const normalized = normalizeResponse(raw);
  if (normalized === '' || parseJson(normalized).ok) return normalized;
  return findJsonSpan(normalized) ?? normalized;
}

export type ResponseNormalizer = (raw: string) => string;
