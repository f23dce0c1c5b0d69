/**
 * Unit tests for the command-line interface
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { readFileSync } from 'fs';
import { join } from 'path';
import { parseCliArgs, runCli, USAGE, type CliIO } from './cli.js';
import { defaultConfig } from './config/defaults.js';
import type { Config } from './config/schema.js';
import { createTempFiles } from './__tests__/utils.js';

const config: Config = { ...defaultConfig, logging: { ...defaultConfig.logging, level: 'error' } };

const SCENARIO = [
  'hardware:',
  '  name: LabGPU',
  '  peak_tflops: 100',
  '  memory_bandwidth_gbps: 1000',
  '  hbm_gb: 40',
  '  interconnect_gbps: 100',
  'layers:',
  '  - type: ffn',
  '    ffn_config: { d_model: 1024, d_ff: 4096, activation: relu }',
].join('\n');

function capture(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => {
      stdout.push(text);
    },
    err: (text) => {
      stderr.push(text);
    },
  };
}

describe('parseCliArgs', () => {
  it('should return null for help', () => {
    expect(parseCliArgs([])).toBeNull();
    expect(parseCliArgs(['afd', '--help'])).toBeNull();
  });

  it('should parse a large-ep evaluation', () => {
    expect(
      parseCliArgs(['large-ep', 'evaluate', 's.yaml', '--batch', '8', '--seq', '4096', '--tokens-per-expert', '512'])
    ).toEqual({
      workflow: 'large-ep',
      command: 'run',
      scenario: 's.yaml',
      batch: [8],
      seq: [4096],
      tokensPerExpert: 512,
    });
  });

  it('should parse sweep lists', () => {
    expect(parseCliArgs(['afd', 'sweep', 's.yaml', '--batch', '1,2,4', '--seq', '128'])).toMatchObject({
      command: 'sweep',
      batch: [1, 2, 4],
      seq: [128],
    });
  });

  it('should reject malformed options', () => {
    expect(() => parseCliArgs(['afd', 'simulate', 's.yaml', '--batch', 'abc', '--seq', '1'])).toThrow(
      '--batch expects a number'
    );
    expect(() => parseCliArgs(['afd', 'simulate', 's.yaml', '--fast'])).toThrow('Unknown option --fast');
    expect(() => parseCliArgs(['afd', 'simulate', 's.yaml', '--format', 'xml'])).toThrow(
      '--format must be one of table, csv, json'
    );
  });

  it('should reject the wrong command for a workflow', () => {
    expect(() => parseCliArgs(['afd', 'evaluate', 's.yaml', '--batch', '1', '--seq', '1'])).toThrow(
      "afd takes 'simulate' or 'sweep', got 'evaluate'"
    );
  });

  it('should only allow lists with sweep', () => {
    expect(() => parseCliArgs(['afd', 'simulate', 's.yaml', '--batch', '1,2', '--seq', '1'])).toThrow(
      'Lists of values need the sweep command'
    );
  });
});

describe('runCli', () => {
  let dir = '';
  let cleanup: () => void = () => undefined;
  let scenarioPath = '';

  beforeAll(() => {
    const files = createTempFiles({ 'block.yaml': SCENARIO });
    dir = files.dir;
    cleanup = files.cleanup;
    scenarioPath = join(dir, 'block.yaml');
  });

  afterAll(() => {
    cleanup();
  });

  it('should print usage for --help', () => {
    const io = capture();

    expect(runCli(['--help'], io, config)).toBe(0);
    expect(io.stdout).toEqual([USAGE]);
  });

  it('should print the afd table and totals', () => {
    const io = capture();

    expect(runCli(['afd', 'simulate', scenarioPath, '--batch', '1', '--seq', '1024'], io, config)).toBe(0);

    expect(io.stdout.slice(0, 3)).toEqual(['Scenario: block', 'Hardware: LabGPU', 'Backend: analytic']);
    expect(io.stdout[3]?.split('\n')[1]?.trim().split(/\s+/)).toEqual([
      'ffn_0',
      'ffn',
      '17.1841',
      '0.1718',
      '0.0545',
      '0.1718',
    ]);
    expect(io.stdout[4]).toBe('');
    expect(io.stdout[5]).toBe(
      [
        'Totals:',
        '  Total latency (ms): 0.1718',
        '  Overlap-adjusted latency (ms): 0.1718',
        '  Total FLOPs (GFLOPs): 17.1841',
        '  Peak memory (GB): 0.0545',
        '  Bottleneck layer: ffn_0',
      ].join('\n')
    );
    expect(io.stderr).toEqual([]);
  });

  it('should honour --precision', () => {
    const io = capture();

    runCli(['afd', 'simulate', scenarioPath, '--batch', '1', '--seq', '1024', '--precision', '1'], io, config);

    expect(io.stdout[5]?.split('\n')[3]).toBe('  Total FLOPs (GFLOPs): 17.2');
  });

  it('should print csv', () => {
    const io = capture();

    runCli(['afd', 'simulate', scenarioPath, '--batch', '1', '--seq', '1024', '--format', 'csv'], io, config);

    expect(io.stdout).toHaveLength(1);
    expect(io.stdout[0]?.split('\n')[0]).toBe(
      'layer,type,gflops,compute_ms,memory_ms,latency_ms,overlap_adjusted_ms,bytes_gb,backend,fallback'
    );
  });

  it('should print json', () => {
    const io = capture();

    runCli(['large-ep', 'evaluate', scenarioPath, '--batch', '1', '--seq', '1024', '--format', 'json'], io, config);

    const body: unknown = JSON.parse(io.stdout[0] ?? 'null');
    expect(body).toMatchObject({ bottleneckLayer: 'ffn_0', backend: 'analytic', totalFlops: 17184063488 });
  });

  it('should sweep every batch and sequence combination', () => {
    const io = capture();

    const code = runCli(
      ['afd', 'sweep', scenarioPath, '--batch', '1,2', '--seq', '512,1024', '--format', 'csv'],
      io,
      config
    );

    expect(code).toBe(0);
    const lines = io.stdout[0]?.split('\n') ?? [];
    expect(lines[0]).toBe('batch,seq,total_latency_ms,overlap_adjusted_ms,total_gflops,peak_memory_gb,bottleneck');
    expect(lines.slice(1).map((line) => line.split(',').slice(0, 2).join(','))).toEqual([
      '1,512',
      '1,1024',
      '2,512',
      '2,1024',
    ]);
  });

  it('should report analytic fallback for an ml backend without a model', () => {
    const io = capture();

    runCli(['afd', 'simulate', scenarioPath, '--batch', '1', '--seq', '1024', '--backend', 'ml'], io, config);

    expect(io.stdout[2]).toBe('Backend: ml');
    expect(io.stdout[io.stdout.length - 1]).toBe('  Analytic fallback: 1 of 1 layers');
  });

  it('should save the raw result with --output', () => {
    const io = capture();
    const output = join(dir, 'result.json');

    runCli(['afd', 'simulate', scenarioPath, '--batch', '1', '--seq', '1024', '--output', output], io, config);

    expect(io.stderr).toEqual([`Saved raw result to ${output}`]);
    const saved: unknown = JSON.parse(readFileSync(output, 'utf-8'));
    expect(saved).toMatchObject({ bottleneckLayer: 'ffn_0' });
  });

  it('should print usage errors with a hint', () => {
    const io = capture();

    expect(runCli(['afd', 'simulate', scenarioPath], io, config)).toBe(1);
    expect(io.stderr).toEqual(['Error: --batch and --seq are required', 'Run infersim --help for usage.']);
  });

  it('should print runtime shape errors', () => {
    const io = capture();

    expect(runCli(['afd', 'simulate', scenarioPath, '--batch', '0', '--seq', '8'], io, config)).toBe(1);
    expect(io.stderr).toEqual([
      'Error: Invalid runtime shape: batchSize: Number must be greater than or equal to 1',
    ]);
  });

  it('should fail on a missing scenario file', () => {
    const io = capture();

    expect(runCli(['afd', 'simulate', join(dir, 'missing.yaml'), '--batch', '1', '--seq', '8'], io, config)).toBe(1);
    expect(io.stderr[0]).toBe(`Error: Cannot read ${join(dir, 'missing.yaml')}`);
  });
});
