/**
 * simulate_scenario tool
 * Runs a full scenario (file or inline document) for one runtime shape
 */

import type { EstimatorContext } from '../backends/context.js';
import { parseRuntimeShape } from '../estimators/index.js';
import {
  layerTable,
  loadScenario,
  parseScenario,
  runSimulation,
  summaryRow,
  type Scenario,
} from '../simulator/index.js';
import type { SimulateScenarioArgs, ToolCallResponse } from '../types/tools.js';
import { errorResponse, jsonResponse } from './response.js';

function resolveScenario(args: SimulateScenarioArgs): Scenario {
  if (args.scenarioPath !== undefined) {
    return loadScenario(args.scenarioPath);
  }
  return parseScenario(args.scenario, { baseDir: process.cwd(), defaultName: 'inline' });
}

export function simulateScenario(args: SimulateScenarioArgs, context: EstimatorContext): ToolCallResponse {
  try {
    const scenario = resolveScenario(args);
    const runtime = parseRuntimeShape({
      batchSize: args.batchSize,
      seqLen: args.seqLen,
      microBatch: args.microBatch,
      tokensPerExpert: args.tokensPerExpert,
    });
    const result = runSimulation(scenario.layers, scenario.hardware, runtime, context.backend);

    return jsonResponse({
      scenario: scenario.name,
      hardware: scenario.hardware.name,
      workflow: args.workflow,
      runtime,
      summary: summaryRow(result),
      layers: layerTable(result),
      result,
    });
  } catch (error) {
    return errorResponse(error);
  }
}
