/**
 * Hypothesis Attestation - Zod Validation Schemas
 *
 * Input validation for tool parameters and for structured data crossing a
 * capability boundary (extracted documents, synergy analyses, generated
 * hypothesis drafts, stored registry rows).
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { CONFIDENCE_LEVELS } from '../models/hypothesis.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Flatten zod issues into one `path: message; ...` string
 */
export function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocumentEntrySchema = z.union([z.string(), z.record(z.unknown())]);

/**
 * Strict document record: every list is required
 */
export const DocumentRecordSchema = z.object({
  claims: z.array(DocumentEntrySchema),
  methods: z.array(DocumentEntrySchema),
  evidence: z.array(DocumentEntrySchema),
  explicit_limitations: z.array(DocumentEntrySchema),
  implicit_limitations: z.array(DocumentEntrySchema),
  variables: z.array(DocumentEntrySchema),
});

/**
 * Extraction output: absent lists default to empty
 */
export const ExtractedDocumentSchema = z.object({
  claims: z.array(DocumentEntrySchema).default([]),
  methods: z.array(DocumentEntrySchema).default([]),
  evidence: z.array(DocumentEntrySchema).default([]),
  explicit_limitations: z.array(DocumentEntrySchema).default([]),
  implicit_limitations: z.array(DocumentEntrySchema).default([]),
  variables: z.array(DocumentEntrySchema).default([]),
});

// ═══════════════════════════════════════════════════════════════════════════════
// SYNERGY ANALYSIS SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const SynergyCandidateSchema = z.object({
  id: z.string().min(1, 'Candidate id is required'),
  description: z.string().default(''),
  paper_A_support: z.array(z.string()).default([]),
  paper_B_support: z.array(z.string()).default([]),
});

export const SynergyAnalysisSchema = z.object({
  overlapping_variables: z.array(z.string()).default([]),
  potential_synergies: z.array(SynergyCandidateSchema).default([]),
  potential_conflicts: z.array(SynergyCandidateSchema).default([]),
});

// ═══════════════════════════════════════════════════════════════════════════════
// HYPOTHESIS SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ConfidenceSchema = z.enum(CONFIDENCE_LEVELS);

const SourceSupportSchema = z.object({
  paper_A_claim_ids: z.array(z.string()).default([]),
  paper_B_claim_ids: z.array(z.string()).default([]),
  variables_used: z.array(z.string()).default([]),
});

const ProposedExperimentSchema = z.object({
  description: z.string().default(''),
  measurements: z.array(z.string()).default([]),
  expected_direction: z.string().default(''),
});

/**
 * Generated hypothesis before an id is assigned. Generators omit fields;
 * gaps become empty values that grounding validation then reports.
 */
export const HypothesisDraftSchema = z.object({
  primary_synergy_id: z.string().default(''),
  hypothesis: z.string().default(''),
  rationale: z.string().default(''),
  source_support: SourceSupportSchema.default({}),
  proposed_experiment: ProposedExperimentSchema.default({}),
  confidence: ConfidenceSchema.catch('medium'),
  risk_notes: z.array(z.string()).default([]),
});

export type HypothesisDraft = z.infer<typeof HypothesisDraftSchema>;

/**
 * Full record as stored in the registry
 */
export const AttestedHypothesisSchema = z.object({
  hypothesis_id: z.string().min(1),
  primary_synergy_id: z.string(),
  hypothesis: z.string(),
  rationale: z.string(),
  source_support: z.object({
    paper_A_claim_ids: z.array(z.string()),
    paper_B_claim_ids: z.array(z.string()),
    variables_used: z.array(z.string()),
  }),
  proposed_experiment: z.object({
    description: z.string(),
    measurements: z.array(z.string()),
    expected_direction: z.string(),
  }),
  confidence: ConfidenceSchema,
  risk_notes: z.array(z.string()),
  content_hash: z.string(),
  created_at: z.string(),
  version: z.string(),
  author_id: z.string(),
  ledger_tx_id: z.string().optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const InlineDocumentSchema = z.object({
  title: z.string().min(1, 'Document title is required'),
  text: z.string().min(1, 'Document text is required'),
});

export const HypothesisGenerateInput = z.object({
  folder_path: z.string().min(1, 'Folder path is required'),
  author_id: z.string().min(1).optional(),
});

export const HypothesisGenerateFromTextInput = z.object({
  document_a: InlineDocumentSchema,
  document_b: InlineDocumentSchema,
  author_id: z.string().min(1).optional(),
});

export const HypothesisGetInput = z.object({
  hypothesis_id: z.string().min(1, 'Hypothesis ID is required'),
});

export const HypothesisListInput = z.object({
  variables_used: z.array(z.string().min(1)).optional(),
  primary_synergy_id: z.string().min(1).optional(),
  confidence: ConfidenceSchema.optional(),
  limit: z.number().int().min(1).max(500).default(50),
});

export const HypothesisVerifyInput = z.object({
  hypothesis_id: z.string().min(1, 'Hypothesis ID is required'),
});
