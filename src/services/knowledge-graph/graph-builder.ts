/**
 * Document Graph Builder
 *
 * Builds the cross-document knowledge graph from two extracted documents:
 * one node per claim and per variable, and a `uses_variable` edge from every
 * claim to every variable of the same document.
 *
 * Pure and deterministic: the same documents always produce the same graph,
 * with nodes and edges in list order (A before B).
 *
 * @module services/knowledge-graph/graph-builder
 */

import { InputValidationError, MissingFieldError } from '../../server/errors.js';
import {
  DOCUMENT_REQUIRED_FIELDS,
  entryText,
  type DocumentEntry,
  type DocumentRecord,
} from '../../models/document.js';
import type {
  DocumentOrigin,
  GraphEdge,
  GraphNode,
  KnowledgeGraph,
} from '../../models/knowledge-graph.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT CHECKS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Collect every absent required field of both documents, prefixed by origin
 * (e.g. `A.methods`), and throw once.
 *
 * @throws MissingFieldError listing all absent fields
 * @throws InputValidationError if a present field is not a list
 */
export function assertDocumentsComplete(
  documentA: Partial<DocumentRecord>,
  documentB: Partial<DocumentRecord>
): void {
  const missing: string[] = [];
  const malformed: string[] = [];

  const pairs: Array<[DocumentOrigin, Partial<DocumentRecord>]> = [
    ['A', documentA],
    ['B', documentB],
  ];

  for (const [origin, document] of pairs) {
    for (const field of DOCUMENT_REQUIRED_FIELDS) {
      const value = document[field];
      if (value === undefined || value === null) {
        missing.push(`${origin}.${field}`);
      } else if (!Array.isArray(value)) {
        malformed.push(`${origin}.${field}`);
      }
    }
  }

  if (missing.length > 0) {
    throw new MissingFieldError(missing, 'document pair');
  }
  if (malformed.length > 0) {
    throw new InputValidationError(`Document fields must be lists: ${malformed.join(', ')}`, {
      fields: malformed,
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════════

function addDocument(
  origin: DocumentOrigin,
  claims: DocumentEntry[],
  variables: DocumentEntry[],
  nodes: GraphNode[],
  edges: GraphEdge[]
): void {
  const claimIds = claims.map((claim, i) => {
    const id = `${origin}_claim_${i + 1}`;
    nodes.push({ id, type: 'claim', source: origin, text: entryText(claim) });
    return id;
  });

  const variableIds = variables.map((variable, i) => {
    const id = `${origin}_var_${i + 1}`;
    nodes.push({ id, type: 'variable', source: origin, text: entryText(variable) });
    return id;
  });

  for (const claimId of claimIds) {
    for (const variableId of variableIds) {
      edges.push({ source: claimId, target: variableId, relation: 'uses_variable' });
    }
  }
}

/**
 * Build the knowledge graph for a document pair.
 *
 * @throws MissingFieldError if either document lacks a required field
 */
export function buildKnowledgeGraph(
  documentA: Partial<DocumentRecord>,
  documentB: Partial<DocumentRecord>
): KnowledgeGraph {
  assertDocumentsComplete(documentA, documentB);

  const nodes: GraphNode[] = [];
  const edges: GraphEdge[] = [];

  addDocument('A', documentA.claims ?? [], documentA.variables ?? [], nodes, edges);
  addDocument('B', documentB.claims ?? [], documentB.variables ?? [], nodes, edges);

  return { nodes, edges };
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH QUERIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Claim node ids of one document, in graph order
 */
export function claimIdsFor(graph: KnowledgeGraph, origin: DocumentOrigin): string[] {
  return graph.nodes
    .filter((node) => node.type === 'claim' && node.source === origin)
    .map((node) => node.id);
}

/**
 * Look up a node by id
 */
export function findNode(graph: KnowledgeGraph, id: string): GraphNode | undefined {
  return graph.nodes.find((node) => node.id === id);
}
