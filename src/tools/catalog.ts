/**
 * Catalog tools: hardware presets and fused ops
 */

import { listHardwarePresets } from '../hardware/index.js';
import { listFusedOps } from '../ops/index.js';
import type { ListFusedOpsArgs, ToolCallResponse } from '../types/tools.js';
import { errorResponse, jsonResponse } from './response.js';

export function listHardwarePresetsTool(): ToolCallResponse {
  try {
    return jsonResponse({ presets: listHardwarePresets() });
  } catch (error) {
    return errorResponse(error);
  }
}

export function listFusedOpsTool(args: ListFusedOpsArgs): ToolCallResponse {
  const ops = listFusedOps(args.family);
  return jsonResponse({ family: args.family ?? 'all', count: ops.length, ops });
}
