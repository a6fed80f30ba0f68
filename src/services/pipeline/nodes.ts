/**
 * Pipeline nodes
 *
 *   read_documents -> extract_document_a --\
 *                  -> extract_document_b ---> analyze_synergy -> generate_hypothesis -> mint_hypothesis
 *
 * Each node reads what its dependencies wrote and returns a patch of new keys.
 * Nodes throw on failure; the orchestrator turns the throw into the run's error.
 *
 * @module services/pipeline/nodes
 */

import type { ExtractionCapability, GenerationCapability, DocumentSource } from '../capabilities.js';
import type { MintingService } from '../attestation/minting-service.js';
import { buildKnowledgeGraph } from '../knowledge-graph/graph-builder.js';
import { enhanceGraph } from '../knowledge-graph/graph-enhancer.js';
import { analyzeSynergy } from '../knowledge-graph/synergy-analyzer.js';
import { buildGroundingContext } from '../hypothesis/grounding-validator.js';
import { RetryCoordinator } from '../hypothesis/retry-coordinator.js';
import { selectPrimarySynergy } from '../hypothesis/synergy-selector.js';
import { requireStateValue, type PipelineNodeName, type PipelineState, type StatePatch } from './state.js';

export interface PipelineNode {
  name: PipelineNodeName;
  dependsOn: readonly PipelineNodeName[];
  run(state: Readonly<PipelineState>): Promise<StatePatch>;
}

export interface PipelineServices {
  source: DocumentSource;
  extraction: ExtractionCapability;
  generation: GenerationCapability;
  minting: MintingService;
  /** Hypothesis id generator; defaults to random ids */
  idGenerator?: () => string;
}

function extractionNode(
  name: 'extract_document_a' | 'extract_document_b',
  index: 0 | 1,
  extraction: ExtractionCapability
): PipelineNode {
  return {
    name,
    dependsOn: ['read_documents'],
    async run(state) {
      const source = requireStateValue(state, 'source_documents', name)[index];
      const record = await extraction.extract(source.text, source.title);
      return index === 0 ? { document_a: record } : { document_b: record };
    },
  };
}

/**
 * Nodes in declaration order. Declaration order is also the tie-break order
 * for scheduling and for merging results of nodes that run together.
 */
export function createPipelineNodes(services: PipelineServices): PipelineNode[] {
  const coordinator = new RetryCoordinator(services.generation, { idGenerator: services.idGenerator });

  return [
    {
      name: 'read_documents',
      dependsOn: [],
      async run() {
        return { source_documents: await services.source.readDocuments() };
      },
    },

    extractionNode('extract_document_a', 0, services.extraction),
    extractionNode('extract_document_b', 1, services.extraction),

    {
      name: 'analyze_synergy',
      dependsOn: ['extract_document_a', 'extract_document_b'],
      async run(state) {
        const documentA = requireStateValue(state, 'document_a', 'analyze_synergy');
        const documentB = requireStateValue(state, 'document_b', 'analyze_synergy');

        // Build first: a document missing fields fails before any generation call
        const graph = buildKnowledgeGraph(documentA, documentB);
        const analysis = await analyzeSynergy(services.generation, documentA, documentB);

        return { synergy_analysis: analysis, knowledge_graph: enhanceGraph(graph, analysis) };
      },
    },

    {
      name: 'generate_hypothesis',
      dependsOn: ['analyze_synergy'],
      async run(state) {
        const documentA = requireStateValue(state, 'document_a', 'generate_hypothesis');
        const documentB = requireStateValue(state, 'document_b', 'generate_hypothesis');
        const analysis = requireStateValue(state, 'synergy_analysis', 'generate_hypothesis');
        const graph = requireStateValue(state, 'knowledge_graph', 'generate_hypothesis');

        const primary = selectPrimarySynergy(analysis.potential_synergies, analysis.overlapping_variables);
        const result = await coordinator.run({
          documentA,
          documentB,
          analysis,
          primary,
          context: buildGroundingContext(graph, documentA, documentB, analysis),
        });

        return {
          primary_synergy: primary,
          hypothesis: result.record,
          generation_report: {
            outcome: result.outcome,
            attempts: result.attempts,
            generation_calls: result.generationCalls,
            history: result.history,
          },
        };
      },
    },

    {
      name: 'mint_hypothesis',
      dependsOn: ['generate_hypothesis'],
      async run(state) {
        const hypothesis = requireStateValue(state, 'hypothesis', 'mint_hypothesis');
        const { attestation } = await services.minting.mint(hypothesis, state.author_id);
        return { attestation };
      },
    },
  ];
}
