/**
 * Gemini API Configuration
 *
 * @module services/gemini/config
 */

import { z } from 'zod';

export const GEMINI_MODELS = {
  FLASH: 'gemini-2.5-flash',
  PRO: 'gemini-2.5-pro',
} as const;

// Configuration schema
export const GeminiConfigSchema = z.object({
  apiKey: z.string().min(1, 'GEMINI_API_KEY is required'),
  model: z.string().min(1).default(GEMINI_MODELS.FLASH),

  // Generation defaults
  maxOutputTokens: z.number().int().positive().default(8192),
  temperature: z.number().min(0).max(2).default(0.2),
});

export type GeminiConfig = z.infer<typeof GeminiConfigSchema>;

/**
 * Load configuration from environment variables.
 *
 * Checks for GEMINI_API_KEY before Zod validation to provide a clear,
 * actionable error message instead of a cryptic Zod validation failure.
 */
export function loadGeminiConfig(overrides?: Partial<GeminiConfig>): GeminiConfig {
  const apiKey = overrides?.apiKey ?? process.env.GEMINI_API_KEY;
  if (!apiKey || apiKey.trim().length === 0) {
    throw new Error(
      'GEMINI_API_KEY environment variable is not set. ' +
        'Set it in .env or environment to use hypothesis generation and document extraction.'
    );
  }

  const envConfig = {
    apiKey,
    model: process.env.GEMINI_MODEL || GEMINI_MODELS.FLASH,
    maxOutputTokens: process.env.GEMINI_MAX_OUTPUT_TOKENS
      ? parseInt(process.env.GEMINI_MAX_OUTPUT_TOKENS, 10)
      : 8192,
    temperature: process.env.GEMINI_TEMPERATURE ? parseFloat(process.env.GEMINI_TEMPERATURE) : 0.2,
  };

  return GeminiConfigSchema.parse({ ...envConfig, ...overrides });
}

/**
 * Structured output preset: JSON mime type so the model skips prose.
 */
export const JSON_GENERATION_PRESET = {
  responseMimeType: 'application/json',
} as const;
