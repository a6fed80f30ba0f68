/**
 * Synergy Analyzer
 *
 * Asks the generation capability where one document's methods address the
 * other's limitations, and which variables the documents share. Claim ids in
 * the prompt match the ids the graph builder assigns.
 *
 * @module services/knowledge-graph/synergy-analyzer
 */

import { entryText, type DocumentEntry, type DocumentRecord } from '../../models/document.js';
import type { DocumentOrigin, SynergyAnalysis } from '../../models/knowledge-graph.js';
import { SynergyAnalysisSchema } from '../../utils/validation.js';
import type { GenerationCapability } from '../capabilities.js';
import { generateStructured } from '../structured-generation.js';

/** Calls allowed for one analysis: the request plus one reformat */
const ANALYSIS_CALL_BUDGET = 2;

function numbered(origin: DocumentOrigin, kind: string, entries: DocumentEntry[]): string {
  if (entries.length === 0) {
    return '  (none)';
  }
  return entries.map((entry, i) => `  ${origin}_${kind}_${i + 1}: ${entryText(entry)}`).join('\n');
}

function plain(entries: DocumentEntry[]): string {
  if (entries.length === 0) {
    return '  (none)';
  }
  return entries.map((entry) => `  - ${entryText(entry)}`).join('\n');
}

function describeDocument(origin: DocumentOrigin, document: DocumentRecord): string {
  return `PAPER ${origin}
Claims:
${numbered(origin, 'claim', document.claims)}
Methods:
${plain(document.methods)}
Evidence:
${plain(document.evidence)}
Explicit limitations:
${plain(document.explicit_limitations)}
Implicit limitations:
${plain(document.implicit_limitations)}
Variables:
${plain(document.variables)}`;
}

/**
 * Prompt for the cross-document analysis
 */
export function buildSynergyPrompt(documentA: DocumentRecord, documentB: DocumentRecord): string {
  return `You compare two structured research papers and report where they can be combined.
Use only the content below. Do not invent claims, variables, or claim ids.

${describeDocument('A', documentA)}

${describeDocument('B', documentB)}

Find places where a method in one paper addresses an explicit limitation of the other
(potential synergies) and places where their claims contradict (potential conflicts).
Support lists must contain claim ids exactly as written above (A_claim_N, B_claim_N).

Return a single JSON object:
{
  "overlapping_variables": ["variable named in both papers"],
  "potential_synergies": [
    { "id": "syn_1", "description": "...", "paper_A_support": ["A_claim_1"], "paper_B_support": ["B_claim_1"] }
  ],
  "potential_conflicts": [
    { "id": "con_1", "description": "...", "paper_A_support": ["A_claim_2"], "paper_B_support": ["B_claim_1"] }
  ]
}
Return only the JSON object.`;
}

/**
 * Run the synergy analysis for a document pair.
 *
 * @throws GenerationFormatError if the output cannot be parsed after one reformat
 */
export async function analyzeSynergy(
  generation: GenerationCapability,
  documentA: DocumentRecord,
  documentB: DocumentRecord
): Promise<SynergyAnalysis> {
  const { value, calls } = await generateStructured(
    generation,
    buildSynergyPrompt(documentA, documentB),
    SynergyAnalysisSchema,
    'synergy analysis',
    ANALYSIS_CALL_BUDGET
  );

  console.error(
    `[SynergyAnalyzer] ${value.potential_synergies.length} synergies, ` +
      `${value.potential_conflicts.length} conflicts, ` +
      `${value.overlapping_variables.length} shared variables (${calls} generation call${calls === 1 ? '' : 's'})`
  );

  return value;
}
