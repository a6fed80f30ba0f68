/**
 * Minting Service
 *
 * Commits a hypothesis as a tamper-evident record:
 *   validate -> freeze -> canonicalize -> hash -> enrich -> registry -> ledger -> registry
 *
 * The hash covers only the canonical fields, so the metadata added here
 * (created_at, version, author_id, ledger_tx_id) never changes it.
 *
 * @module services/attestation/minting-service
 */

import {
  ATTESTATION_VERSION,
  CANONICAL_FIELDS,
  type AttestationRecord,
  type AttestedHypothesis,
  type HypothesisRecord,
  type ProposedExperiment,
  type SourceSupport,
} from '../../models/hypothesis.js';
import { InputValidationError, MissingFieldError } from '../../server/errors.js';
import { deepFreeze } from '../../utils/freeze.js';
import { computeHash } from '../../utils/hash.js';
import type { HypothesisRegistry } from '../storage/registry-store.js';
import type { LedgerWriter } from '../storage/ledger.js';
import { canonicalize } from './canonicalizer.js';

export interface MintingServiceOptions {
  registry: HypothesisRegistry;
  ledger: LedgerWriter;
  authorId: string;
  clock?: () => Date;
}

export interface MintResult {
  attestation: AttestationRecord;
  record: AttestedHypothesis;
}

export interface IntegrityReport {
  hypothesis_id: string;
  valid: boolean;
  stored_hash: string;
  computed_hash: string;
}

/** A record that may be missing fields at the top level or one level down */
export type MintCandidate = Partial<Omit<HypothesisRecord, 'source_support' | 'proposed_experiment'>> & {
  source_support?: Partial<SourceSupport> | null;
  proposed_experiment?: Partial<ProposedExperiment> | null;
};

const SOURCE_SUPPORT_FIELDS: readonly (keyof SourceSupport)[] = [
  'paper_A_claim_ids',
  'paper_B_claim_ids',
  'variables_used',
];

const PROPOSED_EXPERIMENT_FIELDS: readonly (keyof ProposedExperiment)[] = [
  'description',
  'measurements',
  'expected_direction',
];

function missingNested<T extends object>(
  parent: string,
  value: Partial<T> | null | undefined,
  fields: readonly (keyof T & string)[]
): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  return fields
    .filter((field) => value[field] === undefined || value[field] === null)
    .map((field) => `${parent}.${field}`);
}

/**
 * Check that every canonical field, and every key of source_support and
 * proposed_experiment, is present and the id is non-empty.
 *
 * @throws MissingFieldError listing every absent field
 */
export function assertMintable(record: MintCandidate): void {
  const missing: string[] = CANONICAL_FIELDS.filter((field) => record[field] === undefined || record[field] === null);
  missing.push(
    ...missingNested('source_support', record.source_support, SOURCE_SUPPORT_FIELDS),
    ...missingNested('proposed_experiment', record.proposed_experiment, PROPOSED_EXPERIMENT_FIELDS)
  );
  if (missing.length > 0) {
    throw new MissingFieldError(missing, 'hypothesis record');
  }
  if (typeof record.hypothesis_id !== 'string' || record.hypothesis_id.trim().length === 0) {
    throw new InputValidationError('hypothesis_id must be a non-empty string');
  }
}

/**
 * Recompute the content hash of a stored record and compare.
 */
export function verifyAttestedHypothesis(record: AttestedHypothesis): IntegrityReport {
  const computed = computeHash(canonicalize(record));
  return {
    hypothesis_id: record.hypothesis_id,
    valid: computed === record.content_hash,
    stored_hash: record.content_hash,
    computed_hash: computed,
  };
}

export class MintingService {
  private readonly registry: HypothesisRegistry;
  private readonly ledger: LedgerWriter;
  private readonly authorId: string;
  private readonly clock: () => Date;

  constructor(options: MintingServiceOptions) {
    this.registry = options.registry;
    this.ledger = options.ledger;
    this.authorId = options.authorId;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Attest, store and record a hypothesis.
   *
   * @param authorId - overrides the configured author for this record
   */
  async mint(record: HypothesisRecord, authorId: string = this.authorId): Promise<MintResult> {
    assertMintable(record);

    const snapshot: HypothesisRecord = structuredClone(record);
    deepFreeze(snapshot);

    const canonical_json = canonicalize(snapshot);
    const content_hash = computeHash(canonical_json);
    const created_at = this.clock().toISOString();

    const attested: AttestedHypothesis = {
      ...snapshot,
      content_hash,
      created_at,
      version: ATTESTATION_VERSION,
      author_id: authorId,
    };
    this.registry.save(attested);

    const ledger_tx_id = await this.ledger.writeReceipt({
      hypothesis_id: snapshot.hypothesis_id,
      content_hash,
      author_id: authorId,
    });

    const committed: AttestedHypothesis = { ...attested, ledger_tx_id };
    this.registry.save(committed);

    console.error(`[Minting] ${snapshot.hypothesis_id} attested as ${content_hash} (tx ${ledger_tx_id})`);

    return {
      attestation: {
        hypothesis_id: snapshot.hypothesis_id,
        canonical_json,
        content_hash,
        created_at,
        version: ATTESTATION_VERSION,
        author_id: authorId,
        ledger_tx_id,
      },
      record: committed,
    };
  }
}
