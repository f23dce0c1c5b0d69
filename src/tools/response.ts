import type { ToolCallResponse } from '../types/tools.js';
import { SimulatorError, toError } from '../errors/index.js';

export function jsonResponse(data: unknown): ToolCallResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

/**
 * Error payload for a failed tool call; simulator errors keep their code
 */
export function errorResponse(error: unknown, extra: Record<string, unknown> = {}): ToolCallResponse {
  const err = toError(error);
  const body =
    err instanceof SimulatorError
      ? { error: err.message, code: err.code, type: err.name, ...extra }
      : { error: err.message, ...extra };
  return {
    content: [{ type: 'text', text: JSON.stringify(body, null, 2) }],
    isError: true,
  };
}
