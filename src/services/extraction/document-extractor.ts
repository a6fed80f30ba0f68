/**
 * Document Extractor
 *
 * Extraction capability built on a generation capability: asks for the six
 * DocumentRecord lists as JSON, defaults absent lists to empty, and keeps at
 * most two evidence items.
 *
 * @module services/extraction/document-extractor
 */

import { MAX_EVIDENCE_ITEMS, type DocumentRecord } from '../../models/document.js';
import { InputValidationError } from '../../server/errors.js';
import { ExtractedDocumentSchema } from '../../utils/validation.js';
import type { ExtractionCapability, GenerationCapability } from '../capabilities.js';
import { generateStructured } from '../structured-generation.js';

/** Calls allowed for one extraction: the request plus one reformat */
const EXTRACTION_CALL_BUDGET = 2;

export function buildExtractionPrompt(text: string, title: string): string {
  return `Extract structured scientific information from the research paper below.

TITLE:
${title || '(untitled)'}

PAPER TEXT:
${text}

Return a single JSON object with these fields, each a list of short strings:
- claims: the main scientific claims, all of them
- methods: the main methods or techniques used
- evidence: one or two concrete supporting results (numbers or experimental details when stated)
- explicit_limitations: limitations the paper states
- implicit_limitations: limitations that follow from the work but are not stated
- variables: variables or factors the paper studies (e.g. temperature, dosage, model size)

Return only the JSON object, with no commentary.`;
}

export class GenerativeDocumentExtractor implements ExtractionCapability {
  readonly name: string;
  private readonly generation: GenerationCapability;

  constructor(generation: GenerationCapability) {
    this.generation = generation;
    this.name = `generative:${generation.name}`;
  }

  /**
   * @throws InputValidationError on empty text
   * @throws GenerationFormatError if the output cannot be parsed
   */
  async extract(text: string, title: string): Promise<DocumentRecord> {
    if (text.trim().length === 0) {
      throw new InputValidationError(`Cannot extract from empty document "${title}"`, { title });
    }

    const { value } = await generateStructured(
      this.generation,
      buildExtractionPrompt(text, title),
      ExtractedDocumentSchema,
      `extraction of "${title}"`,
      EXTRACTION_CALL_BUDGET
    );

    console.error(
      `[Extractor] "${title}": ${value.claims.length} claims, ${value.variables.length} variables`
    );

    return { ...value, evidence: value.evidence.slice(0, MAX_EVIDENCE_ITEMS) };
  }
}
