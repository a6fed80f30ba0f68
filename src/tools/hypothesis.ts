/**
 * Hypothesis MCP Tools
 *
 * Tools: hypothesis_generate, hypothesis_generate_from_text, hypothesis_get,
 *        hypothesis_list, hypothesis_verify
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/hypothesis
 */

import { requireServices, type ServerServices } from '../server/state.js';
import { PipelineError, hypothesisNotFoundError } from '../server/errors.js';
import {
  HypothesisGenerateFromTextInput,
  HypothesisGenerateInput,
  HypothesisGetInput,
  HypothesisListInput,
  HypothesisVerifyInput,
  validateInput,
} from '../utils/validation.js';
import type { DocumentSource } from '../services/capabilities.js';
import { verifyAttestedHypothesis } from '../services/attestation/minting-service.js';
import { FolderDocumentSource, InlineDocumentSource } from '../services/extraction/document-reader.js';
import { runHypothesisPipeline } from '../services/pipeline/runner.js';
import type { AttestedHypothesis } from '../models/hypothesis.js';
import {
  errorResponse,
  successResponse,
  toolHandler,
  type ToolDefinition,
  type ToolResponse,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

async function runWithSource(
  services: ServerServices,
  source: DocumentSource,
  authorId: string | undefined
): Promise<ToolResponse> {
  const result = await runHypothesisPipeline(
    {
      source,
      extraction: services.extraction,
      generation: services.generation,
      minting: services.minting,
      idGenerator: services.idGenerator,
    },
    { mode: services.config.executionMode, authorId }
  );

  if (!result.success) {
    const { phase, category, message } = result.error;
    return errorResponse(new PipelineError(category, message, { phase }));
  }

  return successResponse({
    hypothesis: result.hypothesis,
    attestation: result.attestation,
    generation: result.generation,
    primary_synergy: result.state.primary_synergy ?? null,
  });
}

function requireHypothesis(services: ServerServices, hypothesisId: string): AttestedHypothesis {
  const record = services.registry.get(hypothesisId);
  if (!record) {
    throw hypothesisNotFoundError(hypothesisId);
  }
  return record;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle hypothesis_generate - run the pipeline over two papers in a folder
 */
export const handleHypothesisGenerate = toolHandler('hypothesis_generate', async (params) => {
  const input = validateInput(HypothesisGenerateInput, params);
  const services = requireServices();
  return runWithSource(services, new FolderDocumentSource(input.folder_path), input.author_id);
});

/**
 * Handle hypothesis_generate_from_text - run the pipeline over two inline texts
 */
export const handleHypothesisGenerateFromText = toolHandler('hypothesis_generate_from_text', async (params) => {
  const input = validateInput(HypothesisGenerateFromTextInput, params);
  const services = requireServices();
  return runWithSource(services, new InlineDocumentSource(input.document_a, input.document_b), input.author_id);
});

/**
 * Handle hypothesis_get - fetch one attested hypothesis
 */
export const handleHypothesisGet = toolHandler('hypothesis_get', async (params) => {
  const input = validateInput(HypothesisGetInput, params);
  const services = requireServices();
  return successResponse({ hypothesis: requireHypothesis(services, input.hypothesis_id) });
});

/**
 * Handle hypothesis_list - list attested hypotheses with optional filters
 */
export const handleHypothesisList = toolHandler('hypothesis_list', async (params) => {
  const input = validateInput(HypothesisListInput, params);
  const services = requireServices();
  const hypotheses = services.registry.list(
    {
      variables_used: input.variables_used,
      primary_synergy_id: input.primary_synergy_id,
      confidence: input.confidence,
    },
    input.limit
  );
  return successResponse({ total: hypotheses.length, hypotheses });
});

/**
 * Handle hypothesis_verify - recompute the content hash and check the ledger receipt
 */
export const handleHypothesisVerify = toolHandler('hypothesis_verify', async (params) => {
  const input = validateInput(HypothesisVerifyInput, params);
  const services = requireServices();
  const record = requireHypothesis(services, input.hypothesis_id);
  const report = verifyAttestedHypothesis(record);

  const receipt = record.ledger_tx_id ? services.ledger.getReceipt(record.ledger_tx_id) : null;

  if (!report.valid || receipt === null || receipt.content_hash !== record.content_hash) {
    throw new PipelineError(
      'INTEGRITY_VERIFICATION_FAILED',
      `Hypothesis "${record.hypothesis_id}" failed integrity verification`,
      {
        content_hash_valid: report.valid,
        ledger_receipt_valid: receipt !== null && receipt.content_hash === record.content_hash,
        stored_hash: report.stored_hash,
        computed_hash: report.computed_hash,
        ledger_tx_id: record.ledger_tx_id ?? null,
      }
    );
  }

  return successResponse({
    hypothesis_id: record.hypothesis_id,
    verified: true,
    content_hash: report.computed_hash,
    ledger_tx_id: receipt.tx_id,
    recorded_at: receipt.recorded_at,
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Hypothesis tools collection for MCP server registration
 */
export const hypothesisTools: Record<string, ToolDefinition> = {
  hypothesis_generate: {
    description:
      'Read exactly two .txt/.md papers from a folder, extract their structure, find cross-paper synergies, generate a grounded hypothesis, and attest it with a content hash.',
    inputSchema: HypothesisGenerateInput.shape,
    handler: handleHypothesisGenerate,
  },
  hypothesis_generate_from_text: {
    description:
      'Same as hypothesis_generate, but for two papers given inline as { title, text }.',
    inputSchema: HypothesisGenerateFromTextInput.shape,
    handler: handleHypothesisGenerateFromText,
  },
  hypothesis_get: {
    description: 'Get an attested hypothesis by ID, including content hash and ledger transaction ID.',
    inputSchema: HypothesisGetInput.shape,
    handler: handleHypothesisGet,
  },
  hypothesis_list: {
    description:
      'List attested hypotheses. Filter by shared variables (any match, case-insensitive), primary synergy ID, or confidence.',
    inputSchema: HypothesisListInput.shape,
    handler: handleHypothesisList,
  },
  hypothesis_verify: {
    description:
      'Recompute the content hash of a stored hypothesis and check it against the stored hash and its ledger receipt.',
    inputSchema: HypothesisVerifyInput.shape,
    handler: handleHypothesisVerify,
  },
};
