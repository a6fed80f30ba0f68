/**
 * Gemini API Client
 *
 * Generation capability backed by the Gemini API. One client is created at
 * startup and shared read-only. There is no retry loop here: a failed call is
 * reported to the caller, and semantic retries belong to the RetryCoordinator.
 *
 * @module services/gemini/client
 */

import { GoogleGenAI, type GenerateContentConfig, type GenerateContentResponse } from '@google/genai';

import type { GenerationCapability } from '../capabilities.js';
import { ExternalCapabilityError } from '../../server/errors.js';
import { type GeminiConfig, loadGeminiConfig, JSON_GENERATION_PRESET } from './config.js';

/**
 * Token usage from a Gemini response
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export class GeminiClient implements GenerationCapability {
  readonly name = 'gemini';

  private readonly client: GoogleGenAI;
  private readonly config: GeminiConfig;

  constructor(configOverrides?: Partial<GeminiConfig>) {
    this.config = loadGeminiConfig(configOverrides);
    this.client = new GoogleGenAI({ apiKey: this.config.apiKey });
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Single generation call requesting JSON output.
   *
   * @throws ExternalCapabilityError if the API call fails
   */
  async generate(prompt: string): Promise<string> {
    const startTime = Date.now();
    const requestConfig: GenerateContentConfig = {
      temperature: this.config.temperature,
      maxOutputTokens: this.config.maxOutputTokens,
      ...JSON_GENERATION_PRESET,
    };

    let response: GenerateContentResponse;
    try {
      response = await this.client.models.generateContent({
        model: this.config.model,
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        config: requestConfig,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalCapabilityError('gemini', `Gemini request failed: ${message}`, { cause: error });
    }

    const text = response.text ?? '';
    const usage = this.usageOf(response);

    console.error(
      `[GeminiClient] ${prompt.length} input chars -> ${text.length} output chars, ` +
        `tokens in=${usage.inputTokens} out=${usage.outputTokens}, ${Date.now() - startTime}ms`
    );
    if (text.trim().length === 0) {
      console.error(`[GeminiClient] Empty response from ${this.config.model}`);
    }

    return text;
  }

  private usageOf(response: GenerateContentResponse): TokenUsage {
    const usageMetadata = response.usageMetadata;
    return {
      inputTokens: usageMetadata?.promptTokenCount ?? 0,
      outputTokens: usageMetadata?.candidatesTokenCount ?? 0,
      totalTokens: usageMetadata?.totalTokenCount ?? 0,
    };
  }
}
