/**
 * Local ledger
 *
 * Stands in for an external ledger: records a receipt binding a hypothesis id
 * to its content hash and author, and returns a transaction id. The id is
 * '0x' + sha256 of the canonical receipt body, so writing the same receipt
 * twice yields the same id and one stored row.
 *
 * @module services/storage/ledger
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { LedgerReceipt } from '../../models/hypothesis.js';
import { computeHash } from '../../utils/hash.js';
import { serializeCanonical } from '../attestation/canonicalizer.js';

export interface ReceiptBody {
  hypothesis_id: string;
  content_hash: string;
  author_id: string;
}

export interface LedgerWriter {
  /** Record a receipt and return its transaction id */
  writeReceipt(body: ReceiptBody): Promise<string>;
  getReceipt(txId: string): LedgerReceipt | null;
}

const ReceiptRowSchema = z.object({
  tx_id: z.string(),
  hypothesis_id: z.string(),
  content_hash: z.string(),
  author_id: z.string(),
  recorded_at: z.string(),
});

/**
 * Transaction id of a receipt body
 */
export function computeTransactionId(body: ReceiptBody): string {
  return computeHash(
    serializeCanonical({
      author_id: body.author_id,
      content_hash: body.content_hash,
      hypothesis_id: body.hypothesis_id,
    })
  );
}

export class LocalLedger implements LedgerWriter {
  private readonly db: Database.Database;
  private readonly clock: () => Date;

  constructor(db: Database.Database, clock: () => Date = () => new Date()) {
    this.db = db;
    this.clock = clock;
  }

  async writeReceipt(body: ReceiptBody): Promise<string> {
    const txId = computeTransactionId(body);
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO ledger_receipts (tx_id, hypothesis_id, content_hash, author_id, recorded_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(txId, body.hypothesis_id, body.content_hash, body.author_id, this.clock().toISOString());

    if (result.changes === 0) {
      console.error(`[Ledger] Receipt ${txId} already recorded`);
    }
    return txId;
  }

  getReceipt(txId: string): LedgerReceipt | null {
    const row = this.db.prepare('SELECT * FROM ledger_receipts WHERE tx_id = ?').get(txId);
    return row === undefined ? null : ReceiptRowSchema.parse(row);
  }
}
