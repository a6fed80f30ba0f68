/**
 * Grounding Validator
 *
 * Checks a generated hypothesis against the knowledge graph and the two
 * source documents. Every claim id must name a claim node of the matching
 * document, every variable must be one of the documents' variables
 * (case-insensitive), and the primary synergy id must name a known synergy.
 *
 * Side-effect free.
 *
 * @module services/hypothesis/grounding-validator
 */

import { entryText, type DocumentRecord } from '../../models/document.js';
import type { KnowledgeGraph, SynergyAnalysis } from '../../models/knowledge-graph.js';
import type { HypothesisRecord, ValidationResult } from '../../models/hypothesis.js';
import { claimIdsFor } from '../knowledge-graph/graph-builder.js';

// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE SETS
// ═══════════════════════════════════════════════════════════════════════════════

export interface GroundingContext {
  claimIdsA: ReadonlySet<string>;
  claimIdsB: ReadonlySet<string>;
  /** Lowercased variable names of both documents */
  variables: ReadonlySet<string>;
  synergyIds: ReadonlySet<string>;
  /** Synergy ids in analysis order, for repair substitution */
  synergyOrder: readonly string[];
  /** Variable names as written in the documents, for prompts */
  variableNames: readonly string[];
}

/**
 * Build the reference sets a hypothesis is checked against.
 */
export function buildGroundingContext(
  graph: KnowledgeGraph,
  documentA: DocumentRecord,
  documentB: DocumentRecord,
  analysis: SynergyAnalysis
): GroundingContext {
  const variableNames: string[] = [];
  const variables = new Set<string>();
  for (const entry of [...documentA.variables, ...documentB.variables]) {
    const name = entryText(entry);
    const key = name.toLowerCase();
    if (!variables.has(key)) {
      variables.add(key);
      variableNames.push(name);
    }
  }

  const synergyOrder = analysis.potential_synergies.map((synergy) => synergy.id);

  return {
    claimIdsA: new Set(claimIdsFor(graph, 'A')),
    claimIdsB: new Set(claimIdsFor(graph, 'B')),
    variables,
    synergyIds: new Set(synergyOrder),
    synergyOrder,
    variableNames,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Whether a primary synergy id is acceptable. With no known synergies the
 * only grounded value is the empty id.
 */
export function isGroundedSynergyId(id: string, context: GroundingContext): boolean {
  if (context.synergyIds.size === 0) {
    return id === '';
  }
  return context.synergyIds.has(id);
}

export function isGroundedVariable(name: string, context: GroundingContext): boolean {
  return context.variables.has(name.toLowerCase());
}

/**
 * Validate a hypothesis. One error per violated category, naming the
 * offending values.
 *
 * `fixable` is false only when the statement itself is empty: id and
 * variable violations can always be repaired by removal or substitution.
 */
export function validateGrounding(
  record: HypothesisRecord,
  context: GroundingContext
): ValidationResult {
  const errors: string[] = [];
  let fixable = true;

  if (record.hypothesis.trim().length === 0) {
    errors.push('Empty hypothesis statement');
    fixable = false;
  }

  if (!isGroundedSynergyId(record.primary_synergy_id, context)) {
    errors.push(`Invalid primary_synergy_id: ${record.primary_synergy_id || '(empty)'}`);
  }

  const support = record.source_support;

  const invalidA = support.paper_A_claim_ids.filter((id) => !context.claimIdsA.has(id));
  if (invalidA.length > 0) {
    errors.push(`Invalid paper_A_claim_ids: ${invalidA.join(', ')}`);
  }

  const invalidB = support.paper_B_claim_ids.filter((id) => !context.claimIdsB.has(id));
  if (invalidB.length > 0) {
    errors.push(`Invalid paper_B_claim_ids: ${invalidB.join(', ')}`);
  }

  const invalidVariables = support.variables_used.filter((name) => !isGroundedVariable(name, context));
  if (invalidVariables.length > 0) {
    errors.push(`Invalid variables_used (not in either document): ${invalidVariables.join(', ')}`);
  }

  return { valid: errors.length === 0, errors, fixable };
}
