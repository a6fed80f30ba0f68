/**
 * Pipeline Orchestrator
 *
 * Runs pipeline nodes over a shared state, in dependency order.
 *
 * Two strategies, chosen at construction:
 *   - 'dag': every node whose dependencies are done starts together (a wave).
 *     Patches from a wave are merged in declaration order; once a patch carries
 *     an error, the rest of the wave is discarded.
 *   - 'sequential': one node at a time in topological order.
 *
 * FAIL FAST: the first error stops scheduling. Nodes downstream of a failure
 * never run, so both strategies end with the same state for the same input.
 *
 * @module services/pipeline/orchestrator
 */

import {
  OrchestrationError,
  PipelineError,
  type ErrorCategory,
} from '../../server/errors.js';
import type { AttestationRecord, HypothesisRecord } from '../../models/hypothesis.js';
import type { ExecutionMode } from './config.js';
import type { PipelineNode } from './nodes.js';
import {
  mergePatch,
  type GenerationReport,
  type PipelineNodeName,
  type PipelineState,
  type StatePatch,
} from './state.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RUN RESULT
// ═══════════════════════════════════════════════════════════════════════════════

export interface PipelineFailure {
  phase: PipelineNodeName | 'pipeline';
  category: ErrorCategory;
  message: string;
}

export type PipelineRunResult =
  | {
      success: true;
      hypothesis: HypothesisRecord;
      attestation: AttestationRecord;
      generation: GenerationReport;
      state: PipelineState;
    }
  | {
      success: false;
      error: PipelineFailure;
      state: PipelineState;
    };

/**
 * Classify a final state. A low-confidence hypothesis is still a success.
 */
export function summarizeRun(state: PipelineState): PipelineRunResult {
  if (state.error !== undefined) {
    return {
      success: false,
      error: {
        phase: state.error_phase ?? 'pipeline',
        category: state.error_category ?? 'INTERNAL_ERROR',
        message: state.error,
      },
      state,
    };
  }

  if (!state.hypothesis || !state.attestation || !state.generation_report) {
    return {
      success: false,
      error: {
        phase: 'pipeline',
        category: 'ORCHESTRATION_ERROR',
        message: 'Pipeline finished without producing an attested hypothesis',
      },
      state,
    };
  }

  return {
    success: true,
    hypothesis: state.hypothesis,
    attestation: state.attestation,
    generation: state.generation_report,
    state,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Stable topological order: among ready nodes, declaration order wins.
 *
 * @throws OrchestrationError on duplicate names, unknown dependencies, or cycles
 */
export function topologicalOrder(nodes: readonly PipelineNode[]): PipelineNode[] {
  const names = new Set<PipelineNodeName>();
  for (const node of nodes) {
    if (names.has(node.name)) {
      throw new OrchestrationError(node.name, `Duplicate pipeline node "${node.name}"`);
    }
    names.add(node.name);
  }
  for (const node of nodes) {
    const unknown = node.dependsOn.filter((dep) => !names.has(dep));
    if (unknown.length > 0) {
      throw new OrchestrationError(node.name, `Node "${node.name}" depends on unknown nodes: ${unknown.join(', ')}`);
    }
  }

  const ordered: PipelineNode[] = [];
  const placed = new Set<PipelineNodeName>();

  while (ordered.length < nodes.length) {
    const next = nodes.find(
      (node) => !placed.has(node.name) && node.dependsOn.every((dep) => placed.has(dep))
    );
    if (!next) {
      const stuck = nodes.filter((node) => !placed.has(node.name)).map((node) => node.name);
      throw new OrchestrationError(stuck[0], `Pipeline has a dependency cycle among: ${stuck.join(', ')}`);
    }
    ordered.push(next);
    placed.add(next.name);
  }

  return ordered;
}

function errorPatch(phase: PipelineNodeName, error: unknown): StatePatch {
  const typed = PipelineError.fromUnknown(error);
  return {
    error: typed.message,
    error_phase: phase,
    error_category: typed.category,
  };
}

export class PipelineOrchestrator {
  readonly mode: ExecutionMode;
  private readonly order: PipelineNode[];

  constructor(nodes: readonly PipelineNode[], mode: ExecutionMode = 'dag') {
    this.order = topologicalOrder(nodes);
    this.mode = mode;
  }

  async run(initial: PipelineState = {}): Promise<PipelineState> {
    console.error(`[Pipeline] Starting ${this.order.length} nodes (${this.mode})`);
    const state = this.mode === 'dag' ? await this.runWaves(initial) : await this.runSequential(initial);

    if (state.error !== undefined) {
      console.error(`[Pipeline] Failed in ${state.error_phase}: [${state.error_category}] ${state.error}`);
    } else {
      console.error('[Pipeline] Completed');
    }
    return state;
  }

  private async runSequential(initial: PipelineState): Promise<PipelineState> {
    let state = initial;
    for (const node of this.order) {
      if (state.error !== undefined) {
        break;
      }
      state = this.apply(state, node, await this.execute(node, state));
    }
    return state;
  }

  private async runWaves(initial: PipelineState): Promise<PipelineState> {
    let state = initial;
    const done = new Set<PipelineNodeName>();

    while (done.size < this.order.length && state.error === undefined) {
      const wave = this.order.filter(
        (node) => !done.has(node.name) && node.dependsOn.every((dep) => done.has(dep))
      );

      const snapshot = state;
      const patches = await Promise.all(wave.map((node) => this.execute(node, snapshot)));

      for (let i = 0; i < wave.length; i++) {
        if (state.error !== undefined) {
          break;
        }
        state = this.apply(state, wave[i], patches[i]);
        done.add(wave[i].name);
      }
    }

    return state;
  }

  /**
   * Run one node. Never rejects: failures come back as an error patch.
   */
  private async execute(node: PipelineNode, state: PipelineState): Promise<StatePatch> {
    if (state.error !== undefined) {
      return {};
    }
    const startTime = Date.now();
    try {
      const patch = await node.run(state);
      console.error(`[Pipeline] ${node.name} done in ${Date.now() - startTime}ms`);
      return patch;
    } catch (error) {
      return errorPatch(node.name, error);
    }
  }

  private apply(state: PipelineState, node: PipelineNode, patch: StatePatch): PipelineState {
    try {
      return mergePatch(state, patch, node.name);
    } catch (error) {
      return mergePatch(state, errorPatch(node.name, error), node.name);
    }
  }
}
