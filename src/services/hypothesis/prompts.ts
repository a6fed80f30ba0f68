/**
 * Hypothesis generation prompts
 *
 * Each generation call is stateless, so the retry prompt repeats the full
 * context plus the previous attempt's errors and every id the generator is
 * allowed to use.
 *
 * @module services/hypothesis/prompts
 */

import { entryText, type DocumentEntry, type DocumentRecord } from '../../models/document.js';
import type { DocumentOrigin, SynergyAnalysis, SynergyCandidate } from '../../models/knowledge-graph.js';
import type { GroundingContext } from './grounding-validator.js';

export interface HypothesisPromptInput {
  documentA: DocumentRecord;
  documentB: DocumentRecord;
  analysis: SynergyAnalysis;
  primary: SynergyCandidate | null;
}

const OUTPUT_SHAPE = `{
  "primary_synergy_id": "syn_1",
  "hypothesis": "If <method from one paper> is applied to <system from the other>, then <variable> will <increase|decrease> because <mechanism>.",
  "rationale": "Why the combination should work, citing claim ids such as A_claim_1 and B_claim_2.",
  "source_support": {
    "paper_A_claim_ids": ["A_claim_1"],
    "paper_B_claim_ids": ["B_claim_1"],
    "variables_used": ["variable named in one of the papers"]
  },
  "proposed_experiment": {
    "description": "Concrete comparison that would confirm or refute the hypothesis.",
    "measurements": ["metric"],
    "expected_direction": "increase"
  },
  "confidence": "low | medium | high",
  "risk_notes": ["What could make the hypothesis fail"]
}`;

const RULES = `Rules:
1. Propose ONE new, falsifiable hypothesis that combines both papers. Do not summarize.
2. Use only claims, methods, and variables listed above. Do not invent datasets, variables, or numbers.
3. Claim ids must be copied exactly (A_claim_N for paper A, B_claim_N for paper B).
4. variables_used may only contain variables listed for paper A or paper B.
5. Return only the JSON object, with no commentary.`;

function section(origin: DocumentOrigin, document: DocumentRecord): string {
  const list = (entries: DocumentEntry[]): string =>
    entries.length === 0 ? '  (none)' : entries.map((entry) => `  - ${entryText(entry)}`).join('\n');
  const claims =
    document.claims.length === 0
      ? '  (none)'
      : document.claims.map((claim, i) => `  ${origin}_claim_${i + 1}: ${entryText(claim)}`).join('\n');

  return `PAPER ${origin}
Claims:
${claims}
Methods:
${list(document.methods)}
Explicit limitations:
${list(document.explicit_limitations)}
Variables:
${list(document.variables)}`;
}

function candidates(analysis: SynergyAnalysis): string {
  const describe = (candidate: SynergyCandidate): string =>
    `  ${candidate.id}: ${candidate.description} ` +
    `[A: ${candidate.paper_A_support.join(', ') || '-'}; B: ${candidate.paper_B_support.join(', ') || '-'}]`;

  const synergies =
    analysis.potential_synergies.length === 0 ? '  (none)' : analysis.potential_synergies.map(describe).join('\n');
  const conflicts =
    analysis.potential_conflicts.length === 0 ? '  (none)' : analysis.potential_conflicts.map(describe).join('\n');
  const shared = analysis.overlapping_variables.length === 0 ? '(none)' : analysis.overlapping_variables.join(', ');

  return `Potential synergies:
${synergies}
Potential conflicts:
${conflicts}
Shared variables: ${shared}`;
}

function focus(primary: SynergyCandidate | null): string {
  if (!primary) {
    return 'No synergy was identified. Set "primary_synergy_id" to "" and "confidence" to "low".';
  }
  return `Build the hypothesis around ${primary.id}: ${primary.description}`;
}

/**
 * Prompt for the first generation attempt
 */
export function buildHypothesisPrompt(input: HypothesisPromptInput): string {
  return `You generate testable research hypotheses that bridge two papers.

${section('A', input.documentA)}

${section('B', input.documentB)}

${candidates(input.analysis)}

${focus(input.primary)}

Return a single JSON object of this shape:
${OUTPUT_SHAPE}

${RULES}`;
}

/**
 * Prompt for a regeneration attempt after failed grounding
 */
export function buildRetryPrompt(
  input: HypothesisPromptInput,
  errors: string[],
  context: GroundingContext
): string {
  const quoted = (values: Iterable<string>): string => JSON.stringify([...values]);

  return `${buildHypothesisPrompt(input)}

Your previous answer referenced content that does not exist in the papers:
${errors.map((error) => `  - ${error}`).join('\n')}

Use ONLY these values:
  paper_A_claim_ids must be drawn from ${quoted(context.claimIdsA)}
  paper_B_claim_ids must be drawn from ${quoted(context.claimIdsB)}
  variables_used must be drawn from ${quoted(context.variableNames)}
  primary_synergy_id must be one of ${quoted(context.synergyOrder)}`;
}
