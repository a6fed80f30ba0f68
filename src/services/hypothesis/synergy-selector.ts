/**
 * Synergy Selector
 *
 * Picks the primary cross-document relation the hypothesis is built around.
 *
 * @module services/hypothesis/synergy-selector
 */

import type { SynergyCandidate } from '../../models/knowledge-graph.js';

/** Weight of each supporting claim id in the score */
const SUPPORT_WEIGHT = 0.5;

/**
 * Score = distinct overlap variable names found (case-insensitively) in the
 *         description + 0.5 x total supporting claim ids
 */
export function scoreCandidate(candidate: SynergyCandidate, overlappingVariables: string[]): number {
  const description = candidate.description.toLowerCase();
  const names = new Set(overlappingVariables.map((name) => name.toLowerCase()));
  const mentions = [...names].filter((name) => name.length > 0 && description.includes(name)).length;
  return (
    mentions +
    SUPPORT_WEIGHT * (candidate.paper_A_support.length + candidate.paper_B_support.length)
  );
}

/**
 * Select the highest-scoring candidate. Ties keep the earliest candidate.
 *
 * @returns null when there are no candidates
 */
export function selectPrimarySynergy(
  candidates: SynergyCandidate[],
  overlappingVariables: string[]
): SynergyCandidate | null {
  if (candidates.length === 0) {
    return null;
  }
  if (candidates.length === 1) {
    return candidates[0];
  }

  let best = candidates[0];
  let bestScore = scoreCandidate(best, overlappingVariables);

  for (const candidate of candidates.slice(1)) {
    const score = scoreCandidate(candidate, overlappingVariables);
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}
