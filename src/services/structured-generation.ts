/**
 * Structured generation
 *
 * One generation call parsed into a validated object, with at most one local
 * reformat call when the first output cannot be recovered. Callers pass the
 * number of calls they can still afford; a reformat is only attempted when
 * budget remains.
 *
 * @module services/structured-generation
 */

import { z } from 'zod';
import { GenerationFormatError } from '../server/errors.js';
import { buildReformatPrompt, parseStructuredOutput } from '../utils/structured-output.js';
import { describeIssues } from '../utils/validation.js';
import type { GenerationCapability } from './capabilities.js';

export interface StructuredGenerationResult<T> {
  value: T;
  /** Generation calls spent, including any reformat call */
  calls: number;
}

function parseAndValidate<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
  label: string
): z.output<S> {
  const parsed = parseStructuredOutput(text, label);
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new GenerationFormatError(`${label} output does not match the expected shape: ${describeIssues(result.error)}`, {
      label,
    });
  }
  return result.data;
}

/**
 * Generate, parse and validate.
 *
 * @param budget - generation calls still available (>= 1)
 * @throws GenerationFormatError when output stays unparseable
 */
export async function generateStructured<S extends z.ZodTypeAny>(
  generation: GenerationCapability,
  prompt: string,
  schema: S,
  label: string,
  budget: number
): Promise<StructuredGenerationResult<z.output<S>>> {
  const raw = await generation.generate(prompt);

  try {
    return { value: parseAndValidate(raw, schema, label), calls: 1 };
  } catch (error) {
    if (!(error instanceof GenerationFormatError) || budget < 2) {
      throw error;
    }
    console.error(`[StructuredGeneration] ${error.message}. Requesting reformat of ${label}`);
  }

  const reformatted = await generation.generate(buildReformatPrompt(raw, label));
  return { value: parseAndValidate(reformatted, schema, label), calls: 2 };
}
