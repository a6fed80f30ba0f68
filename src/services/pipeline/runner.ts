/**
 * Pipeline entry point
 *
 * @module services/pipeline/runner
 */

import type { ExecutionMode } from './config.js';
import { createPipelineNodes, type PipelineServices } from './nodes.js';
import { PipelineOrchestrator, summarizeRun, type PipelineRunResult } from './orchestrator.js';
import type { PipelineState } from './state.js';

export interface PipelineRunOptions {
  mode?: ExecutionMode;
  /** Author recorded on the attestation; defaults to the minting service's author */
  authorId?: string;
}

/**
 * Build the node graph for `services` and run it once.
 */
export async function runHypothesisPipeline(
  services: PipelineServices,
  options: PipelineRunOptions = {}
): Promise<PipelineRunResult> {
  const orchestrator = new PipelineOrchestrator(createPipelineNodes(services), options.mode ?? 'dag');
  const initial: PipelineState = options.authorId !== undefined ? { author_id: options.authorId } : {};
  return summarizeRun(await orchestrator.run(initial));
}
