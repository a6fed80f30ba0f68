/**
 * Unit Tests for the SQLite hypothesis registry and local ledger
 *
 * NO MOCK DATA - Uses real in-memory SQLite databases.
 *
 * @module tests/unit/services/storage/registry-store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type Database from 'better-sqlite3';

import { openRegistryDatabase, REGISTRY_DB_FILENAME } from '../../../../src/services/storage/database.js';
import { SqliteHypothesisRegistry } from '../../../../src/services/storage/registry-store.js';
import { LocalLedger, computeTransactionId } from '../../../../src/services/storage/ledger.js';
import type { AttestedHypothesis, HypothesisRecord } from '../../../../src/models/hypothesis.js';
import { hypothesisRecord } from '../../../helpers/fixtures.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function attested(overrides: Partial<HypothesisRecord>, createdAt: string): AttestedHypothesis {
  return {
    ...hypothesisRecord(overrides),
    content_hash: `0x${'0'.repeat(64)}`,
    created_at: createdAt,
    version: 'v1',
    author_id: 'test-author',
  };
}

function support(variables: string[]): HypothesisRecord['source_support'] {
  return { paper_A_claim_ids: ['A_claim_1'], paper_B_claim_ids: ['B_claim_1'], variables_used: variables };
}

// ═══════════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

describe('SqliteHypothesisRegistry', () => {
  let db: Database.Database;
  let registry: SqliteHypothesisRegistry;

  beforeEach(() => {
    db = openRegistryDatabase(':memory:');
    registry = new SqliteHypothesisRegistry(db);
  });

  afterEach(() => {
    db.close();
  });

  it('round-trips a saved record', () => {
    const record = attested({ hypothesis_id: 'hyp_a' }, '2026-01-01T00:00:00.000Z');
    registry.save(record);
    expect(registry.get('hyp_a')).toEqual(record);
  });

  it('returns null for an unknown id', () => {
    expect(registry.get('hyp_missing')).toBeNull();
  });

  it('replaces a record saved under the same id', () => {
    registry.save(attested({ hypothesis_id: 'hyp_a' }, '2026-01-01T00:00:00.000Z'));
    registry.save({ ...attested({ hypothesis_id: 'hyp_a' }, '2026-01-01T00:00:00.000Z'), ledger_tx_id: '0xabc' });

    expect(registry.list()).toHaveLength(1);
    expect(registry.get('hyp_a')?.ledger_tx_id).toBe('0xabc');
  });

  describe('list', () => {
    beforeEach(() => {
      registry.save(
        attested(
          { hypothesis_id: 'hyp_c', confidence: 'low', source_support: support(['Voltage']) },
          '2026-01-03T00:00:00.000Z'
        )
      );
      registry.save(
        attested(
          { hypothesis_id: 'hyp_a', primary_synergy_id: 'syn_2', source_support: support(['temperature']) },
          '2026-01-01T00:00:00.000Z'
        )
      );
      registry.save(
        attested(
          { hypothesis_id: 'hyp_b', confidence: 'high', source_support: support(['temperature', 'pressure']) },
          '2026-01-02T00:00:00.000Z'
        )
      );
    });

    it('orders records oldest first', () => {
      expect(registry.list().map((r) => r.hypothesis_id)).toEqual(['hyp_a', 'hyp_b', 'hyp_c']);
    });

    it('filters by confidence', () => {
      expect(registry.list({ confidence: 'high' }).map((r) => r.hypothesis_id)).toEqual(['hyp_b']);
    });

    it('filters by primary synergy id', () => {
      expect(registry.list({ primary_synergy_id: 'syn_2' }).map((r) => r.hypothesis_id)).toEqual(['hyp_a']);
    });

    it('matches any shared variable, ignoring case', () => {
      expect(registry.list({ variables_used: ['TEMPERATURE'] }).map((r) => r.hypothesis_id)).toEqual([
        'hyp_a',
        'hyp_b',
      ]);
      expect(registry.list({ variables_used: ['voltage', 'pressure'] }).map((r) => r.hypothesis_id)).toEqual([
        'hyp_b',
        'hyp_c',
      ]);
    });

    it('ignores case for non-ASCII variable names', () => {
      registry.save(
        attested(
          { hypothesis_id: 'hyp_d', source_support: support(['Énergie']) },
          '2026-01-04T00:00:00.000Z'
        )
      );
      expect(registry.list({ variables_used: ['ÉNERGIE'] }).map((r) => r.hypothesis_id)).toEqual(['hyp_d']);
    });

    it('combines filters', () => {
      expect(
        registry.list({ variables_used: ['temperature'], confidence: 'medium' }).map((r) => r.hypothesis_id)
      ).toEqual(['hyp_a']);
    });

    it('applies the limit', () => {
      expect(registry.list({}, 2).map((r) => r.hypothesis_id)).toEqual(['hyp_a', 'hyp_b']);
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// LEDGER
// ═══════════════════════════════════════════════════════════════════════════════

describe('LocalLedger', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openRegistryDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  const body = { hypothesis_id: 'hyp_a', content_hash: '0x01', author_id: 'test-author' };

  it('returns the transaction id of the receipt body', async () => {
    const ledger = new LocalLedger(db, () => new Date('2026-02-01T00:00:00.000Z'));
    const txId = await ledger.writeReceipt(body);

    expect(txId).toBe(computeTransactionId(body));
    expect(ledger.getReceipt(txId)).toEqual({
      tx_id: txId,
      ...body,
      recorded_at: '2026-02-01T00:00:00.000Z',
    });
  });

  it('keeps the first receipt when the same body is written again', async () => {
    let tick = 0;
    const ledger = new LocalLedger(db, () => new Date(Date.UTC(2026, 1, 1 + tick++)));

    const first = await ledger.writeReceipt(body);
    const second = await ledger.writeReceipt(body);

    expect(second).toBe(first);
    expect(ledger.getReceipt(first)?.recorded_at).toBe('2026-02-01T00:00:00.000Z');
  });

  it('gives different bodies different ids', () => {
    expect(computeTransactionId({ ...body, author_id: 'someone-else' })).not.toBe(computeTransactionId(body));
  });

  it('returns null for an unknown transaction', () => {
    expect(new LocalLedger(db).getReceipt('0xmissing')).toBeNull();
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE FILE
// ═══════════════════════════════════════════════════════════════════════════════

describe('openRegistryDatabase', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'registry-test-'));
  });

  afterEach(() => {
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('creates missing parent directories and reopens existing data', () => {
    const location = join(tempDir, 'nested', REGISTRY_DB_FILENAME);

    const first = openRegistryDatabase(location);
    new SqliteHypothesisRegistry(first).save(attested({ hypothesis_id: 'hyp_a' }, '2026-01-01T00:00:00.000Z'));
    first.close();

    expect(existsSync(location)).toBe(true);

    const second = openRegistryDatabase(location);
    expect(new SqliteHypothesisRegistry(second).get('hyp_a')?.hypothesis_id).toBe('hyp_a');
    second.close();
  });
});
