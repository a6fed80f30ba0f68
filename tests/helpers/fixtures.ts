/**
 * Shared test fixtures: a small document pair, its synergy analysis, and
 * in-process stand-ins for the generation and extraction capabilities.
 *
 * @module tests/helpers/fixtures
 */

import { vi, type Mock } from 'vitest';

import type { DocumentRecord } from '../../src/models/document.js';
import type { SynergyAnalysis } from '../../src/models/knowledge-graph.js';
import type { HypothesisRecord } from '../../src/models/hypothesis.js';
import { InputValidationError } from '../../src/server/errors.js';
import type { ExtractionCapability, GenerationCapability } from '../../src/services/capabilities.js';
import { buildKnowledgeGraph } from '../../src/services/knowledge-graph/graph-builder.js';
import { enhanceGraph } from '../../src/services/knowledge-graph/graph-enhancer.js';
import {
  buildGroundingContext,
  type GroundingContext,
} from '../../src/services/hypothesis/grounding-validator.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export const DOCUMENT_A: DocumentRecord = {
  claims: ['c1', 'c2'],
  methods: ['Cryogenic cooling of the substrate'],
  evidence: ['Yield rose by 12% at 80 K'],
  explicit_limitations: ['Only tested on one substrate'],
  implicit_limitations: [],
  variables: ['temperature'],
};

export const DOCUMENT_B: DocumentRecord = {
  claims: ['c3'],
  methods: ['Pulsed bias driving'],
  evidence: [],
  explicit_limitations: ['Output degrades as the device heats up'],
  implicit_limitations: ['Single device geometry'],
  variables: ['temperature', 'voltage'],
};

export const ANALYSIS: SynergyAnalysis = {
  overlapping_variables: ['temperature'],
  potential_synergies: [
    {
      id: 'syn_1',
      description: 'Cooling from A removes the temperature limit of B',
      paper_A_support: ['A_claim_1'],
      paper_B_support: ['B_claim_1'],
    },
  ],
  potential_conflicts: [],
};

/**
 * Grounding context for DOCUMENT_A / DOCUMENT_B under `analysis`
 */
export function contextFor(analysis: SynergyAnalysis = ANALYSIS): GroundingContext {
  const graph = enhanceGraph(buildKnowledgeGraph(DOCUMENT_A, DOCUMENT_B), analysis);
  return buildGroundingContext(graph, DOCUMENT_A, DOCUMENT_B, analysis);
}

// ═══════════════════════════════════════════════════════════════════════════════
// HYPOTHESES
// ═══════════════════════════════════════════════════════════════════════════════

/** A generated draft that is fully grounded against the fixtures */
export const GROUNDED_DRAFT = {
  primary_synergy_id: 'syn_1',
  hypothesis:
    'If the substrate of B is cooled as in A, output under pulsed bias will increase because heating is suppressed.',
  rationale: 'A_claim_1 reports the gain from cooling; B_claim_1 reports heat-limited output.',
  source_support: {
    paper_A_claim_ids: ['A_claim_1'],
    paper_B_claim_ids: ['B_claim_1'],
    variables_used: ['temperature'],
  },
  proposed_experiment: {
    description: 'Drive the B device with and without substrate cooling',
    measurements: ['output power'],
    expected_direction: 'increase',
  },
  confidence: 'medium',
  risk_notes: ['Cooling may shift the bias response'],
};

/**
 * JSON text of GROUNDED_DRAFT with top-level fields replaced
 */
export function draftJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({ ...GROUNDED_DRAFT, ...overrides });
}

/**
 * A complete hypothesis record matching GROUNDED_DRAFT
 */
export function hypothesisRecord(overrides: Partial<HypothesisRecord> = {}): HypothesisRecord {
  return {
    hypothesis_id: 'hyp_0000test',
    primary_synergy_id: 'syn_1',
    hypothesis: GROUNDED_DRAFT.hypothesis,
    rationale: GROUNDED_DRAFT.rationale,
    source_support: {
      paper_A_claim_ids: ['A_claim_1'],
      paper_B_claim_ids: ['B_claim_1'],
      variables_used: ['temperature'],
    },
    proposed_experiment: {
      description: 'Drive the B device with and without substrate cooling',
      measurements: ['output power'],
      expected_direction: 'increase',
    },
    confidence: 'medium',
    risk_notes: ['Cooling may shift the bias response'],
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CAPABILITY STAND-INS
// ═══════════════════════════════════════════════════════════════════════════════

/** A scripted reply: fixed text, or a function producing the reply */
export type Reply = string | (() => Promise<string>);

export interface GenerationScript {
  synergy?: Reply[];
  hypothesis?: Reply[];
  reformat?: Reply[];
}

type PromptKind = keyof GenerationScript;

export type ScriptedGeneration = GenerationCapability & {
  generate: Mock<(prompt: string) => Promise<string>>;
};

function promptKind(prompt: string): PromptKind {
  if (prompt.startsWith('You compare two structured research papers')) {
    return 'synergy';
  }
  if (prompt.startsWith('You generate testable research hypotheses')) {
    return 'hypothesis';
  }
  if (prompt.startsWith('The text below was meant to be')) {
    return 'reformat';
  }
  throw new Error(`Unexpected prompt: ${prompt.slice(0, 60)}`);
}

/**
 * Generation stand-in that answers by prompt kind. Each kind replays its
 * replies in order and repeats the last one once exhausted.
 */
export function scriptedGeneration(script: GenerationScript): ScriptedGeneration {
  const cursors: Record<PromptKind, number> = { synergy: 0, hypothesis: 0, reformat: 0 };

  const generate = vi.fn(async (prompt: string): Promise<string> => {
    const kind = promptKind(prompt);
    const replies = script[kind] ?? [];
    if (replies.length === 0) {
      throw new Error(`No scripted ${kind} reply`);
    }
    const reply = replies[Math.min(cursors[kind], replies.length - 1)];
    cursors[kind]++;
    return typeof reply === 'string' ? reply : reply();
  });

  return { name: 'scripted', generate };
}

/** Generation stand-in that answers every prompt kind with grounded output */
export function groundedGeneration(): ScriptedGeneration {
  return scriptedGeneration({
    synergy: [JSON.stringify(ANALYSIS)],
    hypothesis: [draftJson()],
  });
}

export type StubExtraction = ExtractionCapability & {
  extract: Mock<(text: string, title: string) => Promise<DocumentRecord>>;
};

/**
 * Extraction stand-in returning fixed records by document title
 */
export function stubExtraction(
  records: Record<string, DocumentRecord> = { 'Paper A': DOCUMENT_A, 'Paper B': DOCUMENT_B }
): StubExtraction {
  const extract = vi.fn(async (_text: string, title: string): Promise<DocumentRecord> => {
    const record = records[title];
    if (!record) {
      throw new InputValidationError(`No stub document for "${title}"`);
    }
    return record;
  });
  return { name: 'stub', extract };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DETERMINISM
// ═══════════════════════════════════════════════════════════════════════════════

export const FIXED_NOW = '2026-01-15T12:00:00.000Z';

export function fixedClock(): Date {
  return new Date(FIXED_NOW);
}

/**
 * Id generator yielding hyp_test0001, hyp_test0002, ...
 */
export function sequentialIds(prefix = 'hyp_test'): () => string {
  let n = 0;
  return () => {
    n++;
    return `${prefix}${String(n).padStart(4, '0')}`;
  };
}
