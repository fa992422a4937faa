/**
 * Run Utility Tests
 *
 * Contract for run status, listing, diff and cleanup over the runs directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import {
  changedSettingKeys,
  diffClassifiedRecords,
  runCleanup,
  runDiff,
  runList,
  runStatus,
} from '../src/tools/utilities.js';
import { classifyBatch } from '../src/tools/batch.js';
import { ClassifyBatchSchema, RunCleanupSchema, RunDiffSchema, RunListSchema } from '../src/schemas.js';
import { RuntimeConfig, setRuntimeConfig } from '../src/runtime-config.js';
import { initRunManager } from '../src/run-manager.js';
import { isToolError } from '../src/utils.js';

const UNKNOWN_RUN = '0190a1b2-0000-7000-8000-000000000000';

const PRIME_ALGEBRA = {
  problem: { text: 'Let p be a prime. Find the remainder when 2^p is divided by p.' },
  math_structure: { from_text: { domain: 'algebra' } },
};

// ============================================================================
// Pure Helpers
// ============================================================================

describe('changedSettingKeys', () => {
  it('compares values independent of key order', () => {
    expect(changedSettingKeys(
      { a: 1, b: { x: 1, y: 2 } },
      { b: { y: 2, x: 1 }, c: 3 }
    )).toEqual(['a', 'c']);
  });

  it('treats non-objects as empty', () => {
    expect(changedSettingKeys(null, { margin_threshold: 6 })).toEqual(['margin_threshold']);
  });
});

describe('diffClassifiedRecords', () => {
  const a = [
    { math_structure: { domain: 'algebra', from_text: { objects: ['integer'] } } },
    null,
  ];
  const b = [
    { math_structure: { domain: 'algebra', from_text: { objects: ['real'] } } },
  ];

  it('counts field changes over the shared prefix', () => {
    const diff = diffClassifiedRecords(a, b, false);
    expect(diff.count_a).toBe(2);
    expect(diff.count_b).toBe(1);
    expect(diff.compared).toBe(1);
    expect(diff.domain_changed).toBe(0);
    expect(diff.field_changes.objects).toBe(1);
    expect(diff.field_changes.case_split).toBe(0);
    expect(diff.changes).toBeUndefined();
  });

  it('lists per-line changes on request', () => {
    expect(diffClassifiedRecords(a, b, true).changes).toEqual([
      { line: 1, domain_a: 'algebra', domain_b: 'algebra', fields: ['objects'] },
    ]);
  });
});

// ============================================================================
// Run Tools
// ============================================================================

describe('Run tools', () => {
  let tempDir: string;
  let inputPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'mathtax-runs-'));
    initRunManager(tempDir, { runs_dir: 'runs' });
    const { config } = await RuntimeConfig.open(path.join(tempDir, 'config', 'settings.json'));
    setRuntimeConfig(config);
    inputPath = path.join(tempDir, 'prime.jsonl');
    await writeFile(inputPath, JSON.stringify(PRIME_ALGEBRA) + '\n');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function runBatch(marginThreshold?: number): Promise<string> {
    const result = await classifyBatch(ClassifyBatchSchema.parse({
      input: inputPath,
      margin_threshold: marginThreshold,
    }));
    if (isToolError(result)) throw new Error(result.message);
    return result.run_id;
  }

  it('returns RUN_NOT_FOUND for an unknown run', async () => {
    const result = await runStatus({ run_id: UNKNOWN_RUN });
    expect(isToolError(result)).toBe(true);
    if (isToolError(result)) expect(result.code).toBe('RUN_NOT_FOUND');
  });

  it('lists runs with their totals', async () => {
    const runId = await runBatch();

    const result = await runList(RunListSchema.parse({}));
    if (isToolError(result)) throw new Error(result.message);
    expect(result.total).toBe(1);
    expect(result.runs[0]).toMatchObject({
      run_id: runId,
      status: 'completed',
      records_classified: 1,
      records_skipped: 0,
    });
  });

  it('filters runs by status', async () => {
    await runBatch();
    const result = await runList(RunListSchema.parse({ status: 'partial' }));
    if (isToolError(result)) throw new Error(result.message);
    expect(result.total).toBe(0);
  });

  it('diffs two runs of the same input under different settings', async () => {
    const runA = await runBatch();
    const runB = await runBatch(0);

    const result = await runDiff(RunDiffSchema.parse({ run_id_a: runA, run_id_b: runB, include_records: true }));
    if (isToolError(result)) throw new Error(result.message);

    expect(result.config_changed).toBe(true);
    expect(result.settings_changed).toEqual(['margin_threshold']);
    expect(result.sources).toEqual({ added: [], removed: [], modified: [], unchanged: 1 });
    expect(result.records.domain_changed).toBe(1);
    expect(result.records.changes).toEqual([
      { line: 1, domain_a: 'algebra', domain_b: 'number_theory', fields: [] },
    ]);
    expect(result.summary).toBe('Settings changed (margin_threshold), 1 domain changes');
  });

  it('reports no changes for identical runs', async () => {
    const runA = await runBatch();
    const runB = await runBatch();

    const result = await runDiff(RunDiffSchema.parse({ run_id_a: runA, run_id_b: runB }));
    if (isToolError(result)) throw new Error(result.message);
    expect(result.config_changed).toBe(false);
    expect(result.records.changes).toBeUndefined();
    expect(result.summary).toBe('No changes detected');
  });

  it('returns RUN_NOT_FOUND when diffing an unknown run', async () => {
    const runA = await runBatch();
    const result = await runDiff(RunDiffSchema.parse({ run_id_a: runA, run_id_b: UNKNOWN_RUN }));
    expect(isToolError(result)).toBe(true);
    if (isToolError(result)) expect(result.code).toBe('RUN_NOT_FOUND');
  });

  it('leaves recent runs alone on cleanup', async () => {
    await runBatch();
    const result = await runCleanup(RunCleanupSchema.parse({ older_than_days: 1 }));
    if (isToolError(result)) throw new Error(result.message);
    expect(result).toEqual({ dry_run: true, runs_checked: 0, runs_deleted: [], errors: [] });
  });
});
