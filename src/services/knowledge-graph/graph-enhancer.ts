/**
 * Graph Enhancer
 *
 * Folds a synergy analysis into the knowledge graph: shared variables become
 * `both`-sourced nodes, and every synergy or conflict candidate contributes one
 * edge per (A claim, B claim) support pair.
 *
 * The input graph is never mutated. Nodes already present (by id) are skipped;
 * edges are always appended.
 *
 * @module services/knowledge-graph/graph-enhancer
 */

import {
  overlapNodeId,
  type EdgeRelation,
  type GraphEdge,
  type GraphNode,
  type KnowledgeGraph,
  type SynergyAnalysis,
  type SynergyCandidate,
} from '../../models/knowledge-graph.js';

function supportEdges(
  candidate: SynergyCandidate,
  relation: Extract<EdgeRelation, 'potential_synergy' | 'potential_conflict'>
): GraphEdge[] {
  const edges: GraphEdge[] = [];
  for (const source of candidate.paper_A_support) {
    for (const target of candidate.paper_B_support) {
      edges.push(
        relation === 'potential_synergy'
          ? { source, target, relation, synergy_id: candidate.id }
          : { source, target, relation, conflict_id: candidate.id }
      );
    }
  }
  return edges;
}

/**
 * Return a new graph with overlap nodes and candidate edges added.
 */
export function enhanceGraph(graph: KnowledgeGraph, analysis: SynergyAnalysis): KnowledgeGraph {
  const nodes: GraphNode[] = graph.nodes.map((node) => ({ ...node }));
  const edges: GraphEdge[] = graph.edges.map((edge) => ({ ...edge }));
  const seen = new Set(nodes.map((node) => node.id));

  for (const name of analysis.overlapping_variables) {
    const id = overlapNodeId(name);
    if (seen.has(id)) {
      continue;
    }
    seen.add(id);
    nodes.push({ id, type: 'variable', source: 'both', text: name });
  }

  for (const synergy of analysis.potential_synergies) {
    edges.push(...supportEdges(synergy, 'potential_synergy'));
  }
  for (const conflict of analysis.potential_conflicts) {
    edges.push(...supportEdges(conflict, 'potential_conflict'));
  }

  console.error(
    `[GraphEnhancer] Added ${nodes.length - graph.nodes.length} overlap nodes, ` +
      `${edges.length - graph.edges.length} candidate edges`
  );

  return { nodes, edges };
}
