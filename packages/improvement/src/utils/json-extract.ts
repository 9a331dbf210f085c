/**
 * Pull a JSON object out of model output. Tries the whole text first, then
 * the first balanced `{...}` span (string-aware, so braces inside generated
 * source code do not end the object early). Returns null when nothing parses.
 */
export function extractJson(raw: string): unknown {
  const text = raw.trim();
  if (!text) return null;

  const whole = tryParse(text);
  if (whole.ok) return whole.value;

  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
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
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) {
        const span = tryParse(text.slice(start, i + 1));
        return span.ok ? span.value : null;
      }
    }
  }
  return null;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    if (error instanceof SyntaxError) return { ok: false };
    throw error;
  }
}
