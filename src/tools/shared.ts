/**
 * Shared Tool Utilities
 *
 * Response envelopes and the error boundary every hypothesis tool runs inside.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { PipelineError, formatErrorResponse } from '../server/errors.js';
import { successResult } from '../server/types.js';

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }> };

export type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

export interface ToolDefinition {
  description: string;
  inputSchema: z.ZodRawShape;
  handler: ToolHandler;
}

function textResponse(payload: unknown): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  };
}

/**
 * `{ success: true, data }` as tool content
 */
export function successResponse<T>(data: T): ToolResponse {
  return textResponse(successResult(data));
}

/**
 * `{ success: false, error }` as tool content
 */
export function errorResponse(error: PipelineError): ToolResponse {
  return textResponse(formatErrorResponse(error));
}

/**
 * Wrap a handler so anything it throws comes back as a categorized error
 * response, logged under the tool's name.
 */
export function toolHandler(toolName: string, run: ToolHandler): ToolHandler {
  return async (params) => {
    try {
      return await run(params);
    } catch (error) {
      const pipelineError = PipelineError.fromUnknown(error);
      console.error(`[${toolName}] ${pipelineError.category}: ${pipelineError.message}`);
      return errorResponse(pipelineError);
    }
  };
}
