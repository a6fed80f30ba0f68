/**
 * Pipeline state
 *
 * The shared record every node reads from and adds to. Keys are written once:
 * a node may only fill keys that are still unset. Once `error` is set, no
 * further node runs.
 *
 * @module services/pipeline/state
 */

import type { DocumentRecord, SourceDocument } from '../../models/document.js';
import type { KnowledgeGraph, SynergyAnalysis, SynergyCandidate } from '../../models/knowledge-graph.js';
import type { AttestationRecord, HypothesisRecord } from '../../models/hypothesis.js';
import type { ErrorCategory } from '../../server/errors.js';
import { OrchestrationError } from '../../server/errors.js';
import type { AttemptRecord, RetryOutcome } from '../hypothesis/retry-coordinator.js';

export type PipelineNodeName =
  | 'read_documents'
  | 'extract_document_a'
  | 'extract_document_b'
  | 'analyze_synergy'
  | 'generate_hypothesis'
  | 'mint_hypothesis';

export interface GenerationReport {
  outcome: RetryOutcome;
  attempts: number;
  generation_calls: number;
  history: AttemptRecord[];
}

export interface PipelineState {
  source_documents?: [SourceDocument, SourceDocument];
  document_a?: DocumentRecord;
  document_b?: DocumentRecord;
  synergy_analysis?: SynergyAnalysis;
  knowledge_graph?: KnowledgeGraph;
  /** null when the analysis produced no synergy */
  primary_synergy?: SynergyCandidate | null;
  hypothesis?: HypothesisRecord;
  generation_report?: GenerationReport;
  attestation?: AttestationRecord;
  author_id?: string;
  error?: string;
  error_phase?: PipelineNodeName;
  error_category?: ErrorCategory;
}

export type StatePatch = Partial<PipelineState>;

const STATE_KEYS: Record<keyof PipelineState, true> = {
  source_documents: true,
  document_a: true,
  document_b: true,
  synergy_analysis: true,
  knowledge_graph: true,
  primary_synergy: true,
  hypothesis: true,
  generation_report: true,
  attestation: true,
  author_id: true,
  error: true,
  error_phase: true,
  error_category: true,
};

function isStateKey(key: string): key is keyof PipelineState {
  return Object.prototype.hasOwnProperty.call(STATE_KEYS, key);
}

function copyKey<K extends keyof PipelineState>(target: PipelineState, source: PipelineState, key: K): void {
  target[key] = source[key];
}

/**
 * Merge a node's patch into the state, returning a new state.
 * Keys with undefined values are ignored.
 *
 * @throws OrchestrationError if the patch rewrites a key that is already set
 */
export function mergePatch(state: PipelineState, patch: StatePatch, phase: PipelineNodeName): PipelineState {
  const merged: PipelineState = { ...state };

  for (const key of Object.keys(patch)) {
    if (!isStateKey(key) || patch[key] === undefined) {
      continue;
    }
    if (state[key] !== undefined) {
      throw new OrchestrationError(phase, `Node "${phase}" attempted to overwrite state key "${key}"`, {
        key,
      });
    }
    copyKey(merged, patch, key);
  }

  return merged;
}

/**
 * Read a key a node depends on.
 *
 * @throws OrchestrationError if an upstream node did not provide it
 */
export function requireStateValue<K extends keyof PipelineState>(
  state: PipelineState,
  key: K,
  phase: PipelineNodeName
): NonNullable<PipelineState[K]> {
  const value = state[key];
  if (value === undefined || value === null) {
    throw new OrchestrationError(phase, `Node "${phase}" requires state key "${key}", which is not set`, {
      key,
    });
  }
  return value;
}
