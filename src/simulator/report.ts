/**
 * Report rendering for simulation results
 */

import type { SimulationResult } from '../types/execution.js';

export type Workflow = 'afd' | 'large-ep';

export const WORKFLOWS: readonly Workflow[] = ['afd', 'large-ep'];

const GIGA = 1e9;
const MIN_COLUMN_WIDTH = 12;

export interface LayerRow {
  layer: string;
  type: string;
  gflops: number;
  computeMs: number;
  memoryMs: number;
  latencyMs: number;
  overlapAdjustedMs: number;
  bytesGb: number;
  backend: string;
  fallback: boolean;
}

export interface SummaryRow {
  totalLatencyMs: number;
  totalOverlapAdjustedLatencyMs: number;
  totalFlopsG: number;
  peakMemoryGb: number;
  bottleneckLayer: string | null;
  backend: string;
}

type NumericColumn = 'gflops' | 'computeMs' | 'memoryMs' | 'latencyMs' | 'overlapAdjustedMs' | 'bytesGb';

interface Column {
  header: string;
  value: (row: LayerRow, precision: number) => string;
}

const textColumn = (header: string, key: 'layer' | 'type'): Column => ({ header, value: (row) => row[key] });

const numberColumn = (header: string, key: NumericColumn): Column => ({
  header,
  value: (row, precision) => row[key].toFixed(precision),
});

const TABLE_COLUMNS: Readonly<Record<Workflow, readonly Column[]>> = {
  afd: [
    textColumn('layer', 'layer'),
    textColumn('type', 'type'),
    numberColumn('gflops', 'gflops'),
    numberColumn('compute_ms', 'computeMs'),
    numberColumn('memory_ms', 'memoryMs'),
    numberColumn('latency_ms', 'latencyMs'),
  ],
  'large-ep': [
    textColumn('layer', 'layer'),
    textColumn('type', 'type'),
    numberColumn('gflops', 'gflops'),
    numberColumn('bytes_gb', 'bytesGb'),
    numberColumn('latency_ms', 'latencyMs'),
  ],
};

export function layerTable(result: SimulationResult): LayerRow[] {
  return result.layers.map((layer) => ({
    layer: layer.layerName,
    type: layer.layerType,
    gflops: layer.flops / GIGA,
    computeMs: layer.computeTimeMs,
    memoryMs: layer.memoryTimeMs,
    latencyMs: layer.dominantLatencyMs,
    overlapAdjustedMs: layer.overlapAdjustedLatencyMs,
    bytesGb: (layer.bytesRead + layer.bytesWritten) / GIGA,
    backend: layer.metadata.backend,
    fallback: layer.metadata.fallback !== undefined,
  }));
}

export function summaryRow(result: SimulationResult): SummaryRow {
  return {
    totalLatencyMs: result.totalLatencyMs,
    totalOverlapAdjustedLatencyMs: result.totalOverlapAdjustedLatencyMs,
    totalFlopsG: result.totalFlops / GIGA,
    peakMemoryGb: result.peakMemoryBytes / GIGA,
    bottleneckLayer: result.bottleneckLayer,
    backend: result.backend,
  };
}

/**
 * Right-aligned fixed-width table with the workflow's column set
 */
export function renderTable(result: SimulationResult, workflow: Workflow, precision = 3): string {
  const columns = TABLE_COLUMNS[workflow];
  const cells = layerTable(result).map((row) => columns.map((column) => column.value(row, precision)));
  const widths = columns.map((column, i) =>
    Math.max(MIN_COLUMN_WIDTH, column.header.length, ...cells.map((line) => line[i]?.length ?? 0))
  );

  const format = (line: readonly string[]) => line.map((cell, i) => cell.padStart(widths[i] ?? 0)).join(' ');
  return [format(columns.map((column) => column.header)), ...cells.map(format)].join('\n');
}

export function renderTotals(result: SimulationResult, precision = 3): string {
  const summary = summaryRow(result);
  return [
    'Totals:',
    `  Total latency (ms): ${summary.totalLatencyMs.toFixed(precision)}`,
    `  Overlap-adjusted latency (ms): ${summary.totalOverlapAdjustedLatencyMs.toFixed(precision)}`,
    `  Total FLOPs (GFLOPs): ${summary.totalFlopsG.toFixed(precision)}`,
    `  Peak memory (GB): ${summary.peakMemoryGb.toFixed(precision)}`,
    `  Bottleneck layer: ${summary.bottleneckLayer ?? 'none'}`,
  ].join('\n');
}

function csvField(value: string | number | boolean): string {
  const raw = String(value);
  return /[",\n]/.test(raw) ? `"${raw.replace(/"/g, '""')}"` : raw;
}

const CSV_HEADER = [
  'layer',
  'type',
  'gflops',
  'compute_ms',
  'memory_ms',
  'latency_ms',
  'overlap_adjusted_ms',
  'bytes_gb',
  'backend',
  'fallback',
];

/**
 * One line per layer, full-precision numbers
 */
export function renderCsv(result: SimulationResult): string {
  const lines = layerTable(result).map((row) =>
    [
      row.layer,
      row.type,
      row.gflops,
      row.computeMs,
      row.memoryMs,
      row.latencyMs,
      row.overlapAdjustedMs,
      row.bytesGb,
      row.backend,
      row.fallback,
    ]
      .map(csvField)
      .join(',')
  );
  return [CSV_HEADER.join(','), ...lines].join('\n');
}

export function renderJson(result: SimulationResult): string {
  return JSON.stringify(result, null, 2);
}
