import { describe, it, expect } from 'vitest';
import { buildKnowledgeGraph } from '../../../../src/services/knowledge-graph/graph-builder.js';
import { enhanceGraph } from '../../../../src/services/knowledge-graph/graph-enhancer.js';
import { overlapNodeId, type SynergyAnalysis } from '../../../../src/models/knowledge-graph.js';
import { ANALYSIS, DOCUMENT_A, DOCUMENT_B } from '../../../helpers/fixtures.js';

const BASE = buildKnowledgeGraph(DOCUMENT_A, DOCUMENT_B);

describe('enhanceGraph', () => {
  it('adds a both-sourced node for each shared variable', () => {
    const graph = enhanceGraph(BASE, ANALYSIS);

    expect(graph.nodes).toHaveLength(7);
    expect(graph.nodes[6]).toEqual({
      id: 'var_temperature',
      type: 'variable',
      source: 'both',
      text: 'temperature',
    });
  });

  it('adds N x M support edges per synergy', () => {
    const analysis: SynergyAnalysis = {
      overlapping_variables: [],
      potential_synergies: [
        {
          id: 'syn_7',
          description: 'x',
          paper_A_support: ['A_claim_1', 'A_claim_2'],
          paper_B_support: ['B_claim_1', 'B_claim_2', 'B_claim_3'],
        },
      ],
      potential_conflicts: [],
    };
    const graph = enhanceGraph(BASE, analysis);
    const added = graph.edges.slice(BASE.edges.length);

    expect(added).toHaveLength(6);
    expect(added.every((edge) => edge.relation === 'potential_synergy' && edge.synergy_id === 'syn_7')).toBe(
      true
    );
    expect(added[0]).toEqual({
      source: 'A_claim_1',
      target: 'B_claim_1',
      relation: 'potential_synergy',
      synergy_id: 'syn_7',
    });
    expect(added[5]).toEqual({
      source: 'A_claim_2',
      target: 'B_claim_3',
      relation: 'potential_synergy',
      synergy_id: 'syn_7',
    });
  });

  it('adds conflict edges after synergy edges, tagged with the conflict id', () => {
    const analysis: SynergyAnalysis = {
      ...ANALYSIS,
      potential_conflicts: [
        { id: 'con_1', description: 'y', paper_A_support: ['A_claim_2'], paper_B_support: ['B_claim_1'] },
      ],
    };
    const graph = enhanceGraph(BASE, analysis);

    expect(graph.edges.slice(BASE.edges.length)).toEqual([
      { source: 'A_claim_1', target: 'B_claim_1', relation: 'potential_synergy', synergy_id: 'syn_1' },
      { source: 'A_claim_2', target: 'B_claim_1', relation: 'potential_conflict', conflict_id: 'con_1' },
    ]);
  });

  it('adds no edges for a candidate with empty support on one side', () => {
    const analysis: SynergyAnalysis = {
      overlapping_variables: [],
      potential_synergies: [{ id: 'syn_1', description: 'x', paper_A_support: ['A_claim_1'], paper_B_support: [] }],
      potential_conflicts: [],
    };
    expect(enhanceGraph(BASE, analysis).edges).toHaveLength(BASE.edges.length);
  });

  it('skips overlap nodes whose id already exists', () => {
    const graph = enhanceGraph(BASE, {
      overlapping_variables: ['Temperature', 'temperature'],
      potential_synergies: [],
      potential_conflicts: [],
    });

    expect(graph.nodes.filter((node) => node.id === 'var_temperature')).toHaveLength(1);
    expect(graph.nodes[6].text).toBe('Temperature');
  });

  it('does not mutate the input graph', () => {
    const before = JSON.stringify(BASE);
    enhanceGraph(BASE, ANALYSIS);
    expect(JSON.stringify(BASE)).toBe(before);
  });
});

describe('overlapNodeId', () => {
  it('lowercases and replaces spaces', () => {
    expect(overlapNodeId('Reaction Time')).toBe('var_reaction_time');
  });
});
