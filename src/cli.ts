#!/usr/bin/env node
/**
 * infersim command-line interface
 *
 *   infersim afd simulate <scenario> --batch 8 --seq 4096
 *   infersim large-ep evaluate <scenario> --batch 8 --seq 4096 --tokens-per-expert 512
 *   infersim afd sweep <scenario> --batch 1,2,4,8 --seq 2048
 */

import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { getConfig, type Config } from './config/index.js';
import type { OutputFormat } from './config/schema.js';
import { getLogger } from './logger/index.js';
import { EstimatorContext } from './backends/index.js';
import { parseRuntimeShape } from './estimators/index.js';
import {
  loadScenario,
  renderCsv,
  renderJson,
  renderTable,
  renderTotals,
  runSimulation,
  runSweep,
  type Scenario,
  type SweepPoint,
  type Workflow,
} from './simulator/index.js';
import type { BackendName } from './types/execution.js';
import type { RuntimeShape } from './types/runtime.js';
import { UsageError, toError } from './errors/index.js';

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliOptions {
  workflow: Workflow;
  command: 'run' | 'sweep';
  scenario: string;
  batch: number[];
  seq: number[];
  microBatch?: number;
  tokensPerExpert?: number;
  format?: OutputFormat;
  output?: string;
  backend?: BackendName;
  model?: string;
  precision?: number;
}

const RUN_COMMANDS: Readonly<Record<Workflow, string>> = {
  afd: 'simulate',
  'large-ep': 'evaluate',
};

export const USAGE = `Usage: infersim <workflow> <command> <scenario> [options]

Workflows:
  afd simulate <scenario>        Compute / memory / latency per layer
  large-ep evaluate <scenario>   Bytes moved / latency per layer
  <workflow> sweep <scenario>    One simulation per --batch (and --seq) value

Options:
  --batch N[,N...]               Batch size (required; a list for sweep)
  --seq N[,N...]                 Sequence length (required; a list for sweep)
  --micro-batch N                Micro-batch size
  --tokens-per-expert N          Measured tokens per expert (MoE layers)
  --format table|csv|json        Output format
  --output FILE                  Also write the JSON result to FILE
  --backend analytic|ml          Estimator backend
  --model FILE                   Latency model for the ml backend
  --precision N                  Decimal places in tables
  --help                         Show this help message`;

function parseNumber(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed)) {
    throw new UsageError(`${flag} expects a number`, { flag, value });
  }
  return parsed;
}

function parseList(flag: string, value: string | undefined): number[] {
  if (value === undefined) {
    throw new UsageError(`${flag} expects a value`, { flag });
  }
  return value.split(',').map((item) => parseNumber(flag, item));
}

function parseChoice<T extends string>(flag: string, value: string | undefined, choices: readonly T[]): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new UsageError(`${flag} must be one of ${choices.join(', ')}`, { flag, value });
  }
  return match;
}

function parseWorkflow(value: string | undefined): Workflow {
  return parseChoice('workflow', value, ['afd', 'large-ep']);
}

/**
 * Returns null when help was requested
 */
export function parseCliArgs(argv: readonly string[]): CliOptions | null {
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return null;
  }

  const positional: string[] = [];
  const flags: Partial<Omit<CliOptions, 'workflow' | 'command' | 'scenario'>> = {};

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? '';
    const value = argv[i + 1];
    switch (arg) {
      case '--batch':
        flags.batch = parseList(arg, value);
        i += 2;
        break;
      case '--seq':
        flags.seq = parseList(arg, value);
        i += 2;
        break;
      case '--micro-batch':
        flags.microBatch = parseNumber(arg, value);
        i += 2;
        break;
      case '--tokens-per-expert':
        flags.tokensPerExpert = parseNumber(arg, value);
        i += 2;
        break;
      case '--format':
        flags.format = parseChoice<OutputFormat>(arg, value, ['table', 'csv', 'json']);
        i += 2;
        break;
      case '--output':
        if (value === undefined) {
          throw new UsageError('--output expects a file path');
        }
        flags.output = value;
        i += 2;
        break;
      case '--backend':
        flags.backend = parseChoice<BackendName>(arg, value, ['analytic', 'ml']);
        i += 2;
        break;
      case '--model':
        if (value === undefined) {
          throw new UsageError('--model expects a file path');
        }
        flags.model = value;
        i += 2;
        break;
      case '--precision':
        flags.precision = parseNumber(arg, value);
        i += 2;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option ${arg}`, { option: arg });
        }
        positional.push(arg);
        i += 1;
    }
  }

  const [workflowArg, commandArg, scenario, ...extra] = positional;
  const workflow = parseWorkflow(workflowArg);
  const runCommand = RUN_COMMANDS[workflow];
  if (commandArg !== runCommand && commandArg !== 'sweep') {
    throw new UsageError(`${workflow} takes '${runCommand}' or 'sweep', got '${String(commandArg)}'`);
  }
  if (!scenario) {
    throw new UsageError('Missing scenario path');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  const { batch, seq } = flags;
  if (!batch || !seq) {
    throw new UsageError('--batch and --seq are required');
  }
  const command = commandArg === 'sweep' ? 'sweep' : 'run';
  if (command === 'run' && (batch.length > 1 || seq.length > 1)) {
    throw new UsageError('Lists of values need the sweep command');
  }

  return { ...flags, workflow, command, scenario, batch, seq };
}

function runtimesFor(options: CliOptions): RuntimeShape[] {
  const runtimes: RuntimeShape[] = [];
  for (const batchSize of options.batch) {
    for (const seqLen of options.seq) {
      runtimes.push(
        parseRuntimeShape({
          batchSize,
          seqLen,
          microBatch: options.microBatch,
          tokensPerExpert: options.tokensPerExpert,
        })
      );
    }
  }
  return runtimes;
}

function renderSweep(points: readonly SweepPoint[], format: OutputFormat, precision: number): string {
  if (format === 'json') {
    return JSON.stringify(points, null, 2);
  }

  const header = ['batch', 'seq', 'total_latency_ms', 'overlap_adjusted_ms', 'total_gflops', 'peak_memory_gb', 'bottleneck'];
  const rows = points.map(({ runtime, result }) => [
    String(runtime.batchSize),
    String(runtime.seqLen),
    result.totalLatencyMs.toFixed(precision),
    result.totalOverlapAdjustedLatencyMs.toFixed(precision),
    (result.totalFlops / 1e9).toFixed(precision),
    (result.peakMemoryBytes / 1e9).toFixed(precision),
    result.bottleneckLayer ?? '',
  ]);

  if (format === 'csv') {
    return [header, ...rows].map((row) => row.join(',')).join('\n');
  }
  const widths = header.map((title, col) => Math.max(title.length, ...rows.map((row) => row[col]?.length ?? 0)));
  return [header, ...rows]
    .map((row) => row.map((cell, col) => cell.padStart(widths[col] ?? 0)).join('  '))
    .join('\n');
}

function execute(options: CliOptions, scenario: Scenario, context: EstimatorContext, config: Config, io: CliIO): void {
  const format = options.format ?? config.output.format;
  const precision = options.precision ?? config.output.precision;
  const runtimes = runtimesFor(options);

  let payload: unknown;
  if (options.command === 'sweep') {
    const points = runSweep(scenario.layers, scenario.hardware, runtimes, context.backend);
    payload = points;
    if (format === 'table') {
      io.out(`Scenario: ${scenario.name}`);
      io.out(`Hardware: ${scenario.hardware.name}`);
    }
    io.out(renderSweep(points, format, precision));
  } else {
    const runtime = runtimes[0];
    if (!runtime) {
      throw new UsageError('--batch and --seq are required');
    }
    const result = runSimulation(scenario.layers, scenario.hardware, runtime, context.backend);
    payload = result;

    if (format === 'json') {
      io.out(renderJson(result));
    } else if (format === 'csv') {
      io.out(renderCsv(result));
    } else {
      io.out(`Scenario: ${scenario.name}`);
      io.out(`Hardware: ${scenario.hardware.name}`);
      io.out(`Backend: ${result.backend}`);
      io.out(renderTable(result, options.workflow, precision));
      io.out('');
      io.out(renderTotals(result, precision));
      const fallbacks = result.layers.filter((layer) => layer.metadata.fallback !== undefined).length;
      if (fallbacks > 0) {
        io.out(`  Analytic fallback: ${fallbacks} of ${result.layers.length} layers`);
      }
    }
  }

  if (options.output) {
    const path = resolve(options.output);
    writeFileSync(path, JSON.stringify(payload, null, 2));
    io.err(`Saved raw result to ${path}`);
  }
}

const consoleIO: CliIO = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

/**
 * Run the CLI and return the process exit code
 */
export function runCli(argv: readonly string[], io: CliIO = consoleIO, configOverride?: Config): number {
  let context: EstimatorContext | null = null;
  try {
    const config = configOverride ?? getConfig();
    const options = parseCliArgs(argv);
    if (!options) {
      io.out(USAGE);
      return 0;
    }

    const logger = getLogger(config.logging).child({ component: 'cli' });
    const scenario = loadScenario(options.scenario);
    logger.debug('Scenario loaded', { scenario: scenario.name, layers: scenario.layers.length });

    context = new EstimatorContext({
      backend: options.backend ?? config.simulator.backend,
      modelPath: options.model ?? config.simulator.modelPath,
      plausibility: config.simulator.plausibility,
      logger,
    });
    context.load();

    execute(options, scenario, context, config, io);
    return 0;
  } catch (error) {
    const err = toError(error);
    io.err(`Error: ${err.message}`);
    if (err instanceof UsageError) {
      io.err('Run infersim --help for usage.');
    }
    return 1;
  } finally {
    context?.unload();
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
