/**
 * Unit Tests for GeminiClient
 *
 * The @google/genai SDK is replaced with an in-process stand-in; no network.
 *
 * @module tests/unit/services/gemini/client
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
}));

import { GeminiClient } from '../../../../src/services/gemini/client.js';
import { GEMINI_MODELS, loadGeminiConfig } from '../../../../src/services/gemini/config.js';
import { ExternalCapabilityError } from '../../../../src/server/errors.js';

const CONFIG = { apiKey: 'test-key', model: 'test-model', maxOutputTokens: 1024, temperature: 0.1 };

describe('GeminiClient', () => {
  beforeEach(() => {
    generateContent.mockReset();
  });

  it('requests JSON output with the configured model and limits', async () => {
    generateContent.mockResolvedValue({
      text: '{"ok":true}',
      usageMetadata: { promptTokenCount: 10, candidatesTokenCount: 4, totalTokenCount: 14 },
    });

    const client = new GeminiClient(CONFIG);
    await expect(client.generate('prompt text')).resolves.toBe('{"ok":true}');

    expect(client.name).toBe('gemini');
    expect(client.model).toBe('test-model');
    expect(generateContent).toHaveBeenCalledWith({
      model: 'test-model',
      contents: [{ role: 'user', parts: [{ text: 'prompt text' }] }],
      config: { temperature: 0.1, maxOutputTokens: 1024, responseMimeType: 'application/json' },
    });
  });

  it('returns an empty string when the response has no text', async () => {
    generateContent.mockResolvedValue({});
    await expect(new GeminiClient(CONFIG).generate('p')).resolves.toBe('');
  });

  it('reports API failures as capability errors', async () => {
    generateContent.mockRejectedValue(new Error('quota exhausted'));

    const error = await new GeminiClient(CONFIG).generate('p').then(
      () => null,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(ExternalCapabilityError);
    if (error instanceof ExternalCapabilityError) {
      expect(error.category).toBe('EXTERNAL_CAPABILITY_ERROR');
      expect(error.message).toBe('Gemini request failed: quota exhausted');
      expect(error.capability).toBe('gemini');
    }
  });
});

describe('loadGeminiConfig', () => {
  it('fails fast without an API key', () => {
    expect(() => loadGeminiConfig({ apiKey: ' ' })).toThrow('GEMINI_API_KEY environment variable is not set');
  });

  it('applies overrides over defaults', () => {
    const config = loadGeminiConfig({ apiKey: 'test-key', model: GEMINI_MODELS.PRO, temperature: 0.5 });
    expect(config.apiKey).toBe('test-key');
    expect(config.model).toBe('gemini-2.5-pro');
    expect(config.temperature).toBe(0.5);
  });
});
