/**
 * Retry Coordinator
 *
 * Generates a hypothesis and drives it to a grounded state with a small,
 * explicit state machine:
 *
 *   GENERATE -> VALIDATE -> ACCEPT      (grounded)
 *                        -> REGENERATE  (ungrounded, retries left) -> GENERATE
 *                        -> REPAIR      (ungrounded, retries spent)
 *
 * At most MAX_RETRIES + 1 generation calls are made per hypothesis, counting
 * any reformat call spent recovering unparseable output. When a later attempt
 * is unparseable and no call is left for a reformat, the last parsed draft goes
 * to REPAIR instead. Attempts run strictly one after another since each retry
 * prompt carries the previous errors.
 *
 * @module services/hypothesis/retry-coordinator
 */

import { v4 as uuidv4 } from 'uuid';
import type { HypothesisRecord, ValidationResult } from '../../models/hypothesis.js';
import { GenerationFormatError, OrchestrationError, SemanticGroundingError } from '../../server/errors.js';
import { HypothesisDraftSchema, type HypothesisDraft } from '../../utils/validation.js';
import type { GenerationCapability } from '../capabilities.js';
import { generateStructured, type StructuredGenerationResult } from '../structured-generation.js';
import {
  isGroundedSynergyId,
  isGroundedVariable,
  validateGrounding,
  type GroundingContext,
} from './grounding-validator.js';
import { buildHypothesisPrompt, buildRetryPrompt, type HypothesisPromptInput } from './prompts.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS & TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const MAX_RETRIES = 2;

export const MAX_GENERATION_CALLS = MAX_RETRIES + 1;

export type RetryState = 'GENERATE' | 'VALIDATE' | 'ACCEPT' | 'REGENERATE' | 'REPAIR';

/** Allowed transitions. ACCEPT and REPAIR are terminal. */
export const RETRY_TRANSITIONS: Readonly<Record<RetryState, readonly RetryState[]>> = {
  GENERATE: ['VALIDATE'],
  VALIDATE: ['ACCEPT', 'REGENERATE', 'REPAIR'],
  REGENERATE: ['GENERATE'],
  ACCEPT: [],
  REPAIR: [],
};

export type RetryOutcome = 'accepted' | 'repaired' | 'degraded';

export interface AttemptRecord {
  attempt: number;
  hypothesis_id: string;
  errors: string[];
}

export interface HypothesisGenerationInput extends HypothesisPromptInput {
  context: GroundingContext;
}

export interface RetryResult {
  record: HypothesisRecord;
  outcome: RetryOutcome;
  /** Generation attempts made (1-based count) */
  attempts: number;
  /** Generation calls spent, including reformat calls */
  generationCalls: number;
  history: AttemptRecord[];
  /** Validation of the returned record */
  validation: ValidationResult;
}

export interface RetryCoordinatorOptions {
  idGenerator?: () => string;
}

/**
 * Opaque hypothesis id: `hyp_` + 8 hex characters
 */
export function generateHypothesisId(): string {
  return `hyp_${uuidv4().replace(/-/g, '').slice(0, 8)}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PURE STEPS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Next state after VALIDATE.
 *
 * @param attempt - 0-based index of the attempt just validated
 * @param callsUsed - generation calls spent so far
 */
export function decideAfterValidation(
  validation: ValidationResult,
  attempt: number,
  callsUsed: number
): RetryState {
  if (validation.valid) {
    return 'ACCEPT';
  }
  if (attempt < MAX_RETRIES && callsUsed < MAX_GENERATION_CALLS) {
    return 'REGENERATE';
  }
  return 'REPAIR';
}

/**
 * Strip ungrounded ids and variables from source_support (order preserved)
 * and replace an ungrounded primary_synergy_id with `preferredSynergyId`, or
 * the first known synergy. Returns a new record.
 *
 * Idempotent: repairing a repaired record changes nothing.
 */
export function repairHypothesis(
  record: HypothesisRecord,
  context: GroundingContext,
  preferredSynergyId?: string
): HypothesisRecord {
  const support = record.source_support;

  let primary = record.primary_synergy_id;
  if (!isGroundedSynergyId(primary, context)) {
    if (preferredSynergyId !== undefined && isGroundedSynergyId(preferredSynergyId, context)) {
      primary = preferredSynergyId;
    } else {
      primary = context.synergyOrder[0] ?? '';
    }
  }

  return {
    ...record,
    primary_synergy_id: primary,
    source_support: {
      paper_A_claim_ids: support.paper_A_claim_ids.filter((id) => context.claimIdsA.has(id)),
      paper_B_claim_ids: support.paper_B_claim_ids.filter((id) => context.claimIdsB.has(id)),
      variables_used: support.variables_used.filter((name) => isGroundedVariable(name, context)),
    },
    proposed_experiment: {
      ...record.proposed_experiment,
      measurements: [...record.proposed_experiment.measurements],
    },
    risk_notes: [...record.risk_notes],
  };
}

/**
 * Mark a record that repair could not ground: low confidence plus a note.
 */
export function degradeHypothesis(
  record: HypothesisRecord,
  errors: string[],
  attempts: number
): HypothesisRecord {
  const failure = new SemanticGroundingError(errors);
  return {
    ...record,
    confidence: 'low',
    risk_notes: [...record.risk_notes, `${failure.message} (unresolved after ${attempts} attempts)`],
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// COORDINATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class RetryCoordinator {
  private readonly generation: GenerationCapability;
  private readonly idGenerator: () => string;

  constructor(generation: GenerationCapability, options: RetryCoordinatorOptions = {}) {
    this.generation = generation;
    this.idGenerator = options.idGenerator ?? generateHypothesisId;
  }

  /**
   * Produce a hypothesis for the given documents and synergy analysis.
   *
   * @throws GenerationFormatError if output stays unparseable after a reformat call
   * @throws ExternalCapabilityError if the generation capability fails
   */
  async run(input: HypothesisGenerationInput): Promise<RetryResult> {
    const history: AttemptRecord[] = [];
    let state: RetryState = 'GENERATE';
    let attempt = 0;
    let calls = 0;
    let lastErrors: string[] = [];
    let lastRecord: HypothesisRecord | null = null;

    for (;;) {
      const prompt =
        attempt === 0 ? buildHypothesisPrompt(input) : buildRetryPrompt(input, lastErrors, input.context);

      const budget = MAX_GENERATION_CALLS - calls;
      let generated: StructuredGenerationResult<HypothesisDraft>;
      try {
        generated = await generateStructured(this.generation, prompt, HypothesisDraftSchema, 'hypothesis', budget);
      } catch (error) {
        // No call left for a reformat: fall back to repairing the last parsed draft
        if (!(error instanceof GenerationFormatError) || budget >= 2 || lastRecord === null) {
          throw error;
        }
        calls += 1;
        console.error(`[RetryCoordinator] Attempt ${attempt + 1} output unparseable: ${error.message}`);
        state = this.transition(this.transition(state, 'VALIDATE'), 'REPAIR');
        return this.repair(lastRecord, input, { attempts: attempt + 1, calls, history });
      }
      calls += generated.calls;

      const record: HypothesisRecord = { hypothesis_id: this.idGenerator(), ...generated.value };
      lastRecord = record;
      state = this.transition(state, 'VALIDATE');

      const validation = validateGrounding(record, input.context);
      history.push({ attempt: attempt + 1, hypothesis_id: record.hypothesis_id, errors: validation.errors });

      const next = decideAfterValidation(validation, attempt, calls);
      state = this.transition(state, next);

      if (next === 'ACCEPT') {
        if (attempt > 0) {
          console.error(`[RetryCoordinator] Hypothesis grounded after ${attempt} retr${attempt === 1 ? 'y' : 'ies'}`);
        }
        return { record, outcome: 'accepted', attempts: attempt + 1, generationCalls: calls, history, validation };
      }

      console.error(
        `[RetryCoordinator] Attempt ${attempt + 1}/${MAX_RETRIES + 1} failed grounding: ${validation.errors.join('; ')}`
      );

      if (next === 'REPAIR') {
        return this.repair(record, input, { attempts: attempt + 1, calls, history });
      }

      lastErrors = validation.errors;
      attempt++;
      state = this.transition(state, 'GENERATE');
    }
  }

  private repair(
    record: HypothesisRecord,
    input: HypothesisGenerationInput,
    progress: { attempts: number; calls: number; history: AttemptRecord[] }
  ): RetryResult {
    const repaired = repairHypothesis(record, input.context, input.primary?.id);
    const validation = validateGrounding(repaired, input.context);

    if (validation.valid) {
      console.error(`[RetryCoordinator] Repaired ${repaired.hypothesis_id} by removing ungrounded references`);
      return {
        record: repaired,
        outcome: 'repaired',
        attempts: progress.attempts,
        generationCalls: progress.calls,
        history: progress.history,
        validation,
      };
    }

    console.error(`[RetryCoordinator] Repair could not ground ${repaired.hypothesis_id}; downgrading confidence`);
    return {
      record: degradeHypothesis(repaired, validation.errors, progress.attempts),
      outcome: 'degraded',
      attempts: progress.attempts,
      generationCalls: progress.calls,
      history: progress.history,
      validation,
    };
  }

  private transition(from: RetryState, to: RetryState): RetryState {
    if (!RETRY_TRANSITIONS[from].includes(to)) {
      throw new OrchestrationError('generate_hypothesis', `Illegal retry transition ${from} -> ${to}`);
    }
    return to;
  }
}
