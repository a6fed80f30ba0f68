/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

/**
 * Successful tool payload
 */
export interface SuccessResult<T> {
  success: true;
  data: T;
}

/**
 * Wrap tool data in the success envelope
 */
export function successResult<T>(data: T): SuccessResult<T> {
  return { success: true, data };
}
