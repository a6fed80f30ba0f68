import { describe, it, expect } from 'vitest';
import {
  canonicalize,
  compareCodePoints,
  hashHypothesis,
  projectCanonicalFields,
  serializeCanonical,
} from '../../../../src/services/attestation/canonicalizer.js';
import { computeHash, isValidHashFormat, verifyHash } from '../../../../src/utils/hash.js';
import { InputValidationError } from '../../../../src/server/errors.js';
import type { AttestedHypothesis, HypothesisRecord } from '../../../../src/models/hypothesis.js';

const RECORD: HypothesisRecord = {
  hypothesis_id: 'hyp_0001',
  primary_synergy_id: 'syn_1',
  hypothesis: 'H',
  rationale: 'R',
  source_support: {
    paper_A_claim_ids: ['A_claim_1'],
    paper_B_claim_ids: ['B_claim_1'],
    variables_used: ['temperature'],
  },
  proposed_experiment: { description: 'D', measurements: ['m'], expected_direction: 'up' },
  confidence: 'high',
  risk_notes: ['n'],
};

/** Same content, every object's keys in reverse order */
const PERMUTED: HypothesisRecord = {
  risk_notes: ['n'],
  confidence: 'high',
  proposed_experiment: { expected_direction: 'up', measurements: ['m'], description: 'D' },
  source_support: {
    variables_used: ['temperature'],
    paper_B_claim_ids: ['B_claim_1'],
    paper_A_claim_ids: ['A_claim_1'],
  },
  rationale: 'R',
  hypothesis: 'H',
  primary_synergy_id: 'syn_1',
  hypothesis_id: 'hyp_0001',
};

describe('canonicalize', () => {
  it('sorts keys at every depth and drops whitespace', () => {
    expect(canonicalize(RECORD)).toBe(
      '{"confidence":"high","hypothesis":"H","hypothesis_id":"hyp_0001","primary_synergy_id":"syn_1",' +
        '"proposed_experiment":{"description":"D","expected_direction":"up","measurements":["m"]},' +
        '"rationale":"R","risk_notes":["n"],' +
        '"source_support":{"paper_A_claim_ids":["A_claim_1"],"paper_B_claim_ids":["B_claim_1"],"variables_used":["temperature"]}}'
    );
  });

  it('is independent of key order', () => {
    expect(canonicalize(PERMUTED)).toBe(canonicalize(RECORD));
  });

  it('preserves array order', () => {
    const ab = canonicalize({ ...RECORD, risk_notes: ['a', 'b'] });
    const ba = canonicalize({ ...RECORD, risk_notes: ['b', 'a'] });
    expect(ab).not.toBe(ba);
  });

  it('ignores attestation metadata', () => {
    const attested: AttestedHypothesis = {
      ...RECORD,
      content_hash: '0xabc',
      created_at: '2026-01-01T00:00:00.000Z',
      version: 'v1',
      author_id: 'test-author',
      ledger_tx_id: '0xdef',
    };
    expect(canonicalize(attested)).toBe(canonicalize(RECORD));
    expect(hashHypothesis(attested)).toBe(hashHypothesis(RECORD));
  });

  it('projects only the hashed fields', () => {
    expect(Object.keys(projectCanonicalFields(RECORD))).toEqual([
      'hypothesis_id',
      'primary_synergy_id',
      'hypothesis',
      'rationale',
      'source_support',
      'proposed_experiment',
      'confidence',
      'risk_notes',
    ]);
  });
});

describe('serializeCanonical', () => {
  it('writes non-ASCII characters as-is', () => {
    expect(serializeCanonical({ b: 'café', a: 1 })).toBe('{"a":1,"b":"café"}');
  });

  it('omits undefined object members', () => {
    expect(serializeCanonical({ a: undefined, b: null, c: [true, 2.5] })).toBe('{"b":null,"c":[true,2.5]}');
  });

  it('rejects non-finite numbers with their path', () => {
    expect(() => serializeCanonical({ score: { value: Number.NaN } })).toThrow(
      'Cannot canonicalize non-finite number at $.score.value'
    );
    expect(() => serializeCanonical(Number.POSITIVE_INFINITY)).toThrow(InputValidationError);
  });

  it('rejects undefined array elements', () => {
    expect(() => serializeCanonical({ list: [1, undefined] })).toThrow(
      'Cannot canonicalize undefined array element at $.list[1]'
    );
  });

  it('rejects values without a JSON form', () => {
    expect(() => serializeCanonical({ f: () => 1 })).toThrow('Cannot canonicalize function at $.f');
  });
});

describe('compareCodePoints', () => {
  it('orders astral characters after the basic plane', () => {
    expect(compareCodePoints('\u{1F600}', '\uFFFF')).toBeGreaterThan(0);
    expect(compareCodePoints('a', 'ab')).toBeLessThan(0);
    expect(compareCodePoints('b', 'b')).toBe(0);
  });
});

describe('content hash', () => {
  it('matches known SHA-256 vectors with a 0x prefix', () => {
    expect(computeHash('')).toBe('0xe3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(computeHash('abc')).toBe('0xba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('hashes the canonical form', () => {
    expect(hashHypothesis(RECORD)).toBe(computeHash(canonicalize(RECORD)));
    expect(hashHypothesis(PERMUTED)).toBe(hashHypothesis(RECORD));
    expect(isValidHashFormat(hashHypothesis(RECORD))).toBe(true);
  });

  it('changes when content changes', () => {
    expect(hashHypothesis({ ...RECORD, hypothesis: 'H2' })).not.toBe(hashHypothesis(RECORD));
  });

  it('verifies content against an expected hash', () => {
    expect(verifyHash('abc', computeHash('abc'))).toBe(true);
    expect(verifyHash('abd', computeHash('abc'))).toBe(false);
    expect(isValidHashFormat('0xABC')).toBe(false);
  });
});
