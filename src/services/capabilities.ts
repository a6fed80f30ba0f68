/**
 * External capability interfaces
 *
 * The pipeline talks to the outside world only through these handles. They
 * are constructed once at startup and passed in explicitly; nothing in the
 * pipeline reaches for a global client.
 *
 * @module services/capabilities
 */

import type { DocumentRecord, SourceDocument } from '../models/document.js';
import { withTimeout } from '../utils/timeout.js';

/**
 * Turns raw document text into a DocumentRecord.
 * Implementations throw on empty or malformed input.
 */
export interface ExtractionCapability {
  readonly name: string;
  extract(text: string, title: string): Promise<DocumentRecord>;
}

/**
 * Stateless text generation. The returned text may wrap its JSON payload in
 * markdown fences or commentary.
 */
export interface GenerationCapability {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}

/**
 * Supplies the two documents a run compares, in A, B order.
 */
export interface DocumentSource {
  readonly name: string;
  readDocuments(): Promise<[SourceDocument, SourceDocument]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TIME BUDGETS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Wrap a generation capability so every call is bounded by `timeoutMs`.
 */
export function withGenerationTimeout(
  capability: GenerationCapability,
  timeoutMs: number
): GenerationCapability {
  return {
    name: capability.name,
    generate: (prompt) =>
      withTimeout(() => capability.generate(prompt), timeoutMs, `generation:${capability.name}`),
  };
}

/**
 * Wrap an extraction capability so every call is bounded by `timeoutMs`.
 */
export function withExtractionTimeout(
  capability: ExtractionCapability,
  timeoutMs: number
): ExtractionCapability {
  return {
    name: capability.name,
    extract: (text, title) =>
      withTimeout(() => capability.extract(text, title), timeoutMs, `extraction:${capability.name}`),
  };
}
