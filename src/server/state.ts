/**
 * MCP Server State Management
 *
 * Holds the services composed once at startup. Capabilities are explicit
 * handles: tools receive them from here, never from module-level clients.
 * FAIL FAST: All state access throws immediately if services are missing.
 *
 * @module server/state
 */

import type Database from 'better-sqlite3';
import {
  withExtractionTimeout,
  withGenerationTimeout,
  type ExtractionCapability,
  type GenerationCapability,
} from '../services/capabilities.js';
import { MintingService } from '../services/attestation/minting-service.js';
import { GenerativeDocumentExtractor } from '../services/extraction/document-extractor.js';
import type { PipelineConfig } from '../services/pipeline/config.js';
import { LocalLedger, type LedgerWriter } from '../services/storage/ledger.js';
import { SqliteHypothesisRegistry, type HypothesisRegistry } from '../services/storage/registry-store.js';
import { servicesNotInitializedError } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerServices {
  config: PipelineConfig;
  db: Database.Database;
  registry: HypothesisRegistry;
  ledger: LedgerWriter;
  minting: MintingService;
  /** Time-bounded generation capability */
  generation: GenerationCapability;
  /** Time-bounded extraction capability */
  extraction: ExtractionCapability;
  /** Hypothesis id generator override (deterministic runs) */
  idGenerator?: () => string;
}

export interface ComposeOptions {
  config: PipelineConfig;
  db: Database.Database;
  generation: GenerationCapability;
  /** Defaults to a generative extractor over `generation` */
  extraction?: ExtractionCapability;
  clock?: () => Date;
  idGenerator?: () => string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export const state: { services: ServerServices | null } = {
  services: null,
};

// ═══════════════════════════════════════════════════════════════════════════════
// COMPOSITION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Wire storage, capabilities and minting together. Every generation call, and
 * every call to a supplied extraction capability, is bounded by
 * `config.capabilityTimeoutMs`.
 */
export function composeServices(options: ComposeOptions): ServerServices {
  const { config, db } = options;
  const generation = withGenerationTimeout(options.generation, config.capabilityTimeoutMs);
  // The generative extractor is bounded through its generation calls
  const extraction = options.extraction
    ? withExtractionTimeout(options.extraction, config.capabilityTimeoutMs)
    : new GenerativeDocumentExtractor(generation);

  const registry = new SqliteHypothesisRegistry(db);
  const ledger = new LocalLedger(db, options.clock);
  const minting = new MintingService({
    registry,
    ledger,
    authorId: config.authorId,
    clock: options.clock,
  });

  return {
    config,
    db,
    registry,
    ledger,
    minting,
    generation,
    extraction,
    idGenerator: options.idGenerator,
  };
}

export function initializeServices(services: ServerServices): void {
  state.services = services;
  console.error(
    `[State] Services initialized (mode=${services.config.executionMode}, ` +
      `timeout=${services.config.capabilityTimeoutMs}ms, author=${services.config.authorId})`
  );
}

/**
 * Require services to be initialized - FAIL FAST if not
 *
 * @throws PipelineError with SERVICES_NOT_INITIALIZED
 */
export function requireServices(): ServerServices {
  if (!state.services) {
    throw servicesNotInitializedError();
  }
  return state.services;
}

/**
 * Close the registry database and clear state
 */
export function resetState(): void {
  if (state.services) {
    state.services.db.close();
  }
  state.services = null;
}
