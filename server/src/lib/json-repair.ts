import logger from './logger.js';

// Skip regex-heavy repairs on large inputs to avoid catastrophic backtracking
const AGGRESSIVE_REPAIR_LIMIT = 50_000;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function stripFences(text: string): string {
  return text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();
}

/** Cut the outermost object/array out of surrounding prose. */
function extractOutermost(text: string): string {
  const firstBrace = text.indexOf('{');
  const firstBracket = text.indexOf('[');
  let start = -1;
  let closeChar = '';

  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }
  if (start < 0) return text;

  const lastClose = text.lastIndexOf(closeChar);
  return lastClose > start ? text.slice(start, lastClose + 1) : text.slice(start);
}

function dropTrailingCommas(text: string): string {
  return text.replace(/,\s*([\]}])/g, '$1');
}

function escapeControlCharsAndQuotes(text: string): string {
  return text
    .replace(/(?<=:\s*"[^"]*)\n/g, '\\n')
    .replace(/(?<=:\s*"[^"]*)\t/g, '\\t')
    // Single quotes used as JSON delimiters
    .replace(/(?<=[[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"');
}

function quoteBareKeys(text: string): string {
  return text.replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
}

/** Append the closers a truncated response is missing. */
function closeTruncated(text: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of text) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  const closedString = inString ? '"' : '';
  return text.replace(/,\s*$/, '') + closedString + stack.reverse().join('');
}

/**
 * Multi-step JSON repair for model outputs that may include markdown fences,
 * surrounding prose, trailing commas or truncation. Each step builds on the
 * previous candidate; the first candidate that parses wins.
 *
 * Returns `undefined` when nothing parses.
 */
export function repairJSON(text: string): unknown {
  if (!text.trim()) return undefined;

  const steps: Array<(input: string) => string> = [
    stripFences,
    extractOutermost,
    dropTrailingCommas,
    escapeControlCharsAndQuotes,
    quoteBareKeys,
    closeTruncated,
  ];

  let candidate = text;
  for (const [index, step] of steps.entries()) {
    if (index >= 3 && candidate.length > AGGRESSIVE_REPAIR_LIMIT) {
      logger.warn({ size: candidate.length }, 'Skipping aggressive JSON repair on large input');
      return undefined;
    }
    candidate = step(candidate);
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed.value;
  }

  logger.warn({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return undefined;
}
