/**
 * estimate_layer tool
 * Estimates a single scenario-style layer entry on one hardware profile
 */

import type { EstimatorContext } from '../backends/context.js';
import { parseRuntimeShape } from '../estimators/index.js';
import { parseScenario } from '../simulator/index.js';
import type { EstimateLayerArgs, ToolCallResponse } from '../types/tools.js';
import { errorResponse, jsonResponse } from './response.js';

export function estimateLayerTool(args: EstimateLayerArgs, context: EstimatorContext): ToolCallResponse {
  try {
    const scenario = parseScenario(
      { hardware: args.hardware, layers: [args.layer] },
      { baseDir: process.cwd(), defaultName: 'estimate_layer' }
    );
    const runtime = parseRuntimeShape({
      batchSize: args.batchSize,
      seqLen: args.seqLen,
      microBatch: args.microBatch,
      tokensPerExpert: args.tokensPerExpert,
    });

    const [layer] = scenario.layers;
    if (!layer) {
      return errorResponse(new Error('No layer to estimate'));
    }

    return jsonResponse({
      hardware: scenario.hardware.name,
      runtime,
      execution: context.backend.estimate(layer, runtime, scenario.hardware),
    });
  } catch (error) {
    return errorResponse(error);
  }
}
