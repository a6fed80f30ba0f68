/**
 * Cross-document knowledge graph models
 *
 * @module models/knowledge-graph
 */

export type DocumentOrigin = 'A' | 'B';

export type NodeSource = DocumentOrigin | 'both';

export type NodeType = 'claim' | 'variable';

export type EdgeRelation = 'uses_variable' | 'potential_synergy' | 'potential_conflict';

export interface GraphNode {
  id: string;
  type: NodeType;
  source: NodeSource;
  text: string;
}

export interface GraphEdge {
  source: string;
  target: string;
  relation: EdgeRelation;
  synergy_id?: string;
  conflict_id?: string;
}

/**
 * Node ids are unique; edges may repeat. Enhancement only appends.
 */
export interface KnowledgeGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

/**
 * A proposed relation between the two documents, backed by claim ids from each.
 */
export interface SynergyCandidate {
  id: string;
  description: string;
  paper_A_support: string[];
  paper_B_support: string[];
}

export interface SynergyAnalysis {
  overlapping_variables: string[];
  potential_synergies: SynergyCandidate[];
  potential_conflicts: SynergyCandidate[];
}

/**
 * Node id for a variable shared by both documents.
 * 'Reaction Time' -> 'var_reaction_time'
 */
export function overlapNodeId(name: string): string {
  return `var_${name.toLowerCase().replace(/ /g, '_')}`;
}
