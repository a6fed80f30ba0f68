/**
 * Hypothesis and attestation models
 *
 * @module models/hypothesis
 */

export const CONFIDENCE_LEVELS = ['low', 'medium', 'high'] as const;

export type Confidence = (typeof CONFIDENCE_LEVELS)[number];

export interface SourceSupport {
  paper_A_claim_ids: string[];
  paper_B_claim_ids: string[];
  variables_used: string[];
}

export interface ProposedExperiment {
  description: string;
  measurements: string[];
  expected_direction: string;
}

export interface HypothesisRecord {
  hypothesis_id: string;
  primary_synergy_id: string;
  hypothesis: string;
  rationale: string;
  source_support: SourceSupport;
  proposed_experiment: ProposedExperiment;
  confidence: Confidence;
  risk_notes: string[];
}

/**
 * Fields covered by the content hash. Anything else on a record is metadata.
 */
export const CANONICAL_FIELDS: ReadonlyArray<keyof HypothesisRecord> = [
  'hypothesis_id',
  'primary_synergy_id',
  'hypothesis',
  'rationale',
  'source_support',
  'proposed_experiment',
  'confidence',
  'risk_notes',
];

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  fixable: boolean;
}

/** Version tag written on every attestation */
export const ATTESTATION_VERSION = 'v1';

export interface AttestationRecord {
  hypothesis_id: string;
  canonical_json: string;
  content_hash: string;
  created_at: string;
  version: string;
  author_id: string;
  ledger_tx_id?: string;
}

/**
 * Registry payload: the hypothesis plus its attestation metadata.
 */
export interface AttestedHypothesis extends HypothesisRecord {
  content_hash: string;
  created_at: string;
  version: string;
  author_id: string;
  ledger_tx_id?: string;
}

export interface RegistryFilters {
  /** Matches records sharing at least one variable */
  variables_used?: string[];
  primary_synergy_id?: string;
  confidence?: Confidence;
}

export interface LedgerReceipt {
  tx_id: string;
  hypothesis_id: string;
  content_hash: string;
  author_id: string;
  recorded_at: string;
}
