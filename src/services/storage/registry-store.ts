/**
 * Hypothesis registry
 *
 * Key-value store of attested hypotheses keyed by hypothesis_id. Saving an
 * existing id replaces the stored record (minting saves twice: before and
 * after the ledger receipt).
 *
 * @module services/storage/registry-store
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { AttestedHypothesis, RegistryFilters } from '../../models/hypothesis.js';
import { InputValidationError } from '../../server/errors.js';
import { AttestedHypothesisSchema, describeIssues } from '../../utils/validation.js';

export interface HypothesisRegistry {
  save(record: AttestedHypothesis): void;
  get(hypothesisId: string): AttestedHypothesis | null;
  /** Records matching every given filter, oldest first */
  list(filters?: RegistryFilters, limit?: number): AttestedHypothesis[];
}

const PayloadRowSchema = z.object({ payload: z.string() });

function parsePayload(row: unknown): AttestedHypothesis {
  const { payload } = PayloadRowSchema.parse(row);
  const result = AttestedHypothesisSchema.safeParse(JSON.parse(payload));
  if (!result.success) {
    throw new InputValidationError(`Stored hypothesis is malformed: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * SQLite-backed registry
 */
export class SqliteHypothesisRegistry implements HypothesisRegistry {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    // Unicode case folding for the variables filter (SQLite lower() is ASCII-only)
    this.db.function('fold_case', { deterministic: true }, (value: unknown) =>
      typeof value === 'string' ? value.toLowerCase() : null
    );
  }

  save(record: AttestedHypothesis): void {
    this.db
      .prepare(
        `INSERT INTO hypotheses (
           hypothesis_id, primary_synergy_id, confidence, content_hash,
           author_id, created_at, ledger_tx_id, payload
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(hypothesis_id) DO UPDATE SET
           primary_synergy_id = excluded.primary_synergy_id,
           confidence = excluded.confidence,
           content_hash = excluded.content_hash,
           author_id = excluded.author_id,
           created_at = excluded.created_at,
           ledger_tx_id = excluded.ledger_tx_id,
           payload = excluded.payload`
      )
      .run(
        record.hypothesis_id,
        record.primary_synergy_id,
        record.confidence,
        record.content_hash,
        record.author_id,
        record.created_at,
        record.ledger_tx_id ?? null,
        JSON.stringify(record)
      );
  }

  get(hypothesisId: string): AttestedHypothesis | null {
    const row = this.db.prepare('SELECT payload FROM hypotheses WHERE hypothesis_id = ?').get(hypothesisId);
    return row === undefined ? null : parsePayload(row);
  }

  list(filters: RegistryFilters = {}, limit = 50): AttestedHypothesis[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (filters.primary_synergy_id !== undefined) {
      conditions.push('primary_synergy_id = ?');
      params.push(filters.primary_synergy_id);
    }

    if (filters.confidence !== undefined) {
      conditions.push('confidence = ?');
      params.push(filters.confidence);
    }

    if (filters.variables_used !== undefined && filters.variables_used.length > 0) {
      const placeholders = filters.variables_used.map(() => '?').join(', ');
      conditions.push(
        `EXISTS (SELECT 1 FROM json_each(payload, '$.source_support.variables_used') v
                 WHERE fold_case(v.value) IN (${placeholders}))`
      );
      params.push(...filters.variables_used.map((name) => name.toLowerCase()));
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(limit);

    return this.db
      .prepare(`SELECT payload FROM hypotheses ${where} ORDER BY created_at ASC, hypothesis_id ASC LIMIT ?`)
      .all(...params)
      .map(parsePayload);
  }
}
