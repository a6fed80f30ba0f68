/**
 * Structured output recovery for generation responses
 *
 * Generation models wrap JSON in markdown fences, prefix it with reasoning,
 * or trail it with commentary. Recovery order is fixed:
 *   1. Strip markdown code fences
 *   2. Parse the full cleaned text
 *   3. Parse the first balanced { ... } object
 *   4. Fail with GenerationFormatError
 *
 * @module utils/structured-output
 */

import { GenerationFormatError } from '../server/errors.js';

/** Characters of raw output kept in error details */
const RAW_PREVIEW_CHARS = 500;

/**
 * Remove ```json / ``` fences, keeping the fenced body.
 */
export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json|JSON)?[ \t]*\r?\n?/g, '').trim();
}

/**
 * Locate the first balanced top-level `{ ... }` span.
 * Braces inside JSON string literals are ignored.
 *
 * @returns the span, or null if no opening brace is ever closed
 */
export function findFirstJsonObject(text: string): string | null {
  let start = text.indexOf('{');

  while (start !== -1) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];

      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === '\\') {
          escaped = true;
        } else if (ch === '"') {
          inString = false;
        }
        continue;
      }

      if (ch === '"') {
        inString = true;
      } else if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        depth--;
        if (depth === 0) {
          return text.slice(start, i + 1);
        }
      }
    }

    // Unclosed from here; try the next opening brace
    start = text.indexOf('{', start + 1);
  }

  return null;
}

function tryParseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return null;
  } catch (error) {
    if (error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
}

/**
 * Parse a JSON object out of free-form generation output.
 *
 * @param label - what was being generated, for diagnostics
 * @throws GenerationFormatError when no JSON object can be recovered
 */
export function parseStructuredOutput(text: string, label: string): Record<string, unknown> {
  if (!text || text.trim().length === 0) {
    throw new GenerationFormatError(`Generation returned empty response for ${label}`, { label });
  }

  const clean = stripCodeFences(text);

  const whole = tryParseObject(clean);
  if (whole) {
    return whole;
  }
  console.error(`[StructuredOutput] Full-text parse failed for ${label}, scanning for embedded object`);

  const candidate = findFirstJsonObject(clean);
  if (candidate !== null) {
    const embedded = tryParseObject(candidate);
    if (embedded) {
      return embedded;
    }
    console.error(`[StructuredOutput] Embedded object for ${label} is not valid JSON`);
  }

  throw new GenerationFormatError(
    `Could not extract a JSON object from ${label} output`,
    { label, raw_preview: text.slice(0, RAW_PREVIEW_CHARS) }
  );
}

/**
 * Prompt asking the generator to re-emit malformed output as bare JSON.
 */
export function buildReformatPrompt(rawOutput: string, label: string): string {
  return `The text below was meant to be a single JSON object (${label}) but could not be parsed.
Rewrite it as valid JSON. Keep every field and value; do not add, drop, or reword content.
Return only the JSON object with no markdown fences and no commentary.

TEXT:
${rawOutput}`;
}
