/**
 * MathTaxonomy-MCP: Utility Tools
 *
 * Run management utilities: status, list, diff, cleanup.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import { ATTRIBUTE_FIELDS } from "../types.js";
import type { AttributeField, RunManifest, ToolError } from "../types.js";
import type {
  RunStatusInput,
  RunListInput,
  RunDiffInput,
  RunCleanupInput
} from "../schemas.js";
import {
  pathExists,
  readJson,
  readJsonl,
  readLines,
  createToolError,
  errorMessage,
  isPlainObject,
  stableStringify,
} from "../utils.js";
import { getRunManager, RunNotFoundError } from "../run-manager.js";
import { perField } from "../classifier/stats.js";

/** Per-line changes returned by run diff when include_records is set */
const MAX_RECORD_CHANGES = 200;

const TEXT_FIELDS: ReadonlySet<AttributeField> = new Set(["objects", "constraints", "mechanisms", "output_type"]);

// ============================================================================
// Run Status
// ============================================================================

export interface RunStatusResult {
  run_id: string;
  status: RunManifest["status"];
  created_at: string;
  completed_at?: string;
  phases: {
    [key: string]: {
      status: string;
      duration_ms?: number;
      inputs?: number;
      outputs?: number;
      errors?: number;
    };
  };
  totals: RunManifest["totals"];
  timing: RunManifest["timing"];
}

export async function runStatus(input: RunStatusInput): Promise<RunStatusResult | ToolError> {
  const manager = getRunManager();

  try {
    const { manifest } = await manager.getRun(input.run_id);

    const phases: RunStatusResult["phases"] = {};

    for (const [phaseName, phaseData] of Object.entries(manifest.phases)) {
      if (phaseData) {
        const startTime = new Date(phaseData.started_at).getTime();
        const endTime = phaseData.completed_at
          ? new Date(phaseData.completed_at).getTime()
          : Date.now();

        phases[phaseName] = {
          status: phaseData.status,
          duration_ms: endTime - startTime,
          inputs: phaseData.inputs.count,
          outputs: phaseData.outputs.count,
          errors: phaseData.errors.length,
        };
      }
    }

    return {
      run_id: manifest.run_id,
      status: manifest.status,
      created_at: manifest.created_at,
      completed_at: manifest.completed_at,
      phases,
      totals: manifest.totals,
      timing: manifest.timing,
    };
  } catch (err) {
    if (err instanceof RunNotFoundError) {
      return createToolError("RUN_NOT_FOUND", err.message, {
        recoverable: false,
      });
    }
    throw err;
  }
}

// ============================================================================
// Run List
// ============================================================================

export interface RunListResult {
  runs: Array<{
    run_id: string;
    status: string;
    created_at: string;
    records_classified: number;
    records_skipped: number;
  }>;
  total: number;
}

export async function runList(input: RunListInput): Promise<RunListResult | ToolError> {
  const manager = getRunManager();

  try {
    const runs = await manager.listRuns({
      status: input.status === "all" ? undefined : input.status,
      limit: input.limit,
      before: input.before,
      after: input.after,
    });

    const listed = runs.map(run => ({
      run_id: run.run_id,
      status: run.status,
      created_at: run.created_at,
      records_classified: run.totals.records_classified,
      records_skipped: run.totals.records_skipped,
    }));

    return { runs: listed, total: listed.length };
  } catch (err) {
    return createToolError("READ_FAILED", `Failed to list runs: ${errorMessage(err)}`, {
      recoverable: true,
    });
  }
}

// ============================================================================
// Run Diff
// ============================================================================

interface SourceEntry {
  uri: string;
  sha256: string;
}

export interface RecordChange {
  line: number;
  domain_a: unknown;
  domain_b: unknown;
  fields: AttributeField[];
}

export interface RunDiffResult {
  run_a: { run_id: string; created_at: string };
  run_b: { run_id: string; created_at: string };
  config_changed: boolean;
  settings_changed: string[];
  sources: {
    added: string[];
    removed: string[];
    modified: string[];
    unchanged: number;
  };
  records: {
    count_a: number;
    count_b: number;
    compared: number;
    domain_changed: number;
    field_changes: Record<AttributeField, number>;
    changes?: RecordChange[];
  };
  summary: string;
}

/** Keys whose values differ between two settings snapshots, sorted */
export function changedSettingKeys(a: unknown, b: unknown): string[] {
  const objA = isPlainObject(a) ? a : {};
  const objB = isPlainObject(b) ? b : {};
  const keys = new Set([...Object.keys(objA), ...Object.keys(objB)]);
  return [...keys]
    .filter(key => stableStringify(objA[key]) !== stableStringify(objB[key]))
    .sort();
}

async function readSources(runDir: string): Promise<SourceEntry[]> {
  const sourcesPath = path.join(runDir, "input", "sources.jsonl");
  if (!await pathExists(sourcesPath)) return [];
  return readJsonl<SourceEntry>(sourcesPath);
}

async function readSettingsSnapshot(runDir: string): Promise<unknown> {
  const configPath = path.join(runDir, "config.json");
  return await pathExists(configPath) ? readJson<unknown>(configPath) : {};
}

/** Classified records in file order; unparseable lines hold null so line numbers stay aligned */
async function readClassified(filePath: string): Promise<unknown[]> {
  if (!await pathExists(filePath)) return [];
  const records: unknown[] = [];
  for await (const line of readLines(filePath)) {
    if (!line.trim()) continue;
    try {
      records.push(JSON.parse(line));
    } catch {
      records.push(null);
    }
  }
  return records;
}

function mathStructure(record: unknown): Record<string, unknown> {
  if (!isPlainObject(record)) return {};
  const structure = record.math_structure;
  return isPlainObject(structure) ? structure : {};
}

function fieldValue(structure: Record<string, unknown>, field: AttributeField): string {
  const group = TEXT_FIELDS.has(field) ? structure.from_text : structure.from_solution;
  return stableStringify(isPlainObject(group) ? group[field] ?? null : null);
}

export function diffClassifiedRecords(
  recordsA: unknown[],
  recordsB: unknown[],
  includeRecords: boolean
): RunDiffResult["records"] {
  const compared = Math.min(recordsA.length, recordsB.length);
  const fieldChanges = perField(() => 0);
  const changes: RecordChange[] = [];
  let domainChanged = 0;

  for (let i = 0; i < compared; i++) {
    const a = mathStructure(recordsA[i]);
    const b = mathStructure(recordsB[i]);
    const domainA = a.domain ?? null;
    const domainB = b.domain ?? null;
    const fields = ATTRIBUTE_FIELDS.filter(f => fieldValue(a, f) !== fieldValue(b, f));

    if (domainA !== domainB) domainChanged++;
    for (const field of fields) fieldChanges[field]++;

    if (includeRecords && (domainA !== domainB || fields.length) && changes.length < MAX_RECORD_CHANGES) {
      changes.push({ line: i + 1, domain_a: domainA, domain_b: domainB, fields });
    }
  }

  return {
    count_a: recordsA.length,
    count_b: recordsB.length,
    compared,
    domain_changed: domainChanged,
    field_changes: fieldChanges,
    ...(includeRecords ? { changes } : {}),
  };
}

export async function runDiff(input: RunDiffInput): Promise<RunDiffResult | ToolError> {
  const manager = getRunManager();

  try {
    const { manifest: manifestA, runDir: runDirA } = await manager.getRun(input.run_id_a);
    const { manifest: manifestB, runDir: runDirB } = await manager.getRun(input.run_id_b);

    const configChanged = manifestA.config_hash !== manifestB.config_hash;
    const settingsChanged = configChanged
      ? changedSettingKeys(await readSettingsSnapshot(runDirA), await readSettingsSnapshot(runDirB))
      : [];

    const sourcesA = new Map((await readSources(runDirA)).map(s => [s.uri, s.sha256]));
    const sourcesB = new Map((await readSources(runDirB)).map(s => [s.uri, s.sha256]));

    const added = [...sourcesB.keys()].filter(u => !sourcesA.has(u));
    const removed = [...sourcesA.keys()].filter(u => !sourcesB.has(u));
    const shared = [...sourcesA.keys()].filter(u => sourcesB.has(u));
    const modified = shared.filter(u => sourcesA.get(u) !== sourcesB.get(u));

    const records = diffClassifiedRecords(
      await readClassified(path.join(manager.getClassifiedDir(input.run_id_a), input.output_file)),
      await readClassified(path.join(manager.getClassifiedDir(input.run_id_b), input.output_file)),
      input.include_records
    );

    const summaryParts: string[] = [];
    if (configChanged) {
      summaryParts.push(settingsChanged.length ? `Settings changed (${settingsChanged.join(", ")})` : "Config changed");
    }
    if (added.length) summaryParts.push(`+${added.length} sources`);
    if (removed.length) summaryParts.push(`-${removed.length} sources`);
    if (modified.length) summaryParts.push(`~${modified.length} sources`);
    if (records.count_a !== records.count_b) summaryParts.push(`records ${records.count_a} -> ${records.count_b}`);
    if (records.domain_changed) summaryParts.push(`${records.domain_changed} domain changes`);
    const fieldTotal = Object.values(records.field_changes).reduce((sum, n) => sum + n, 0);
    if (fieldTotal) summaryParts.push(`${fieldTotal} attribute changes`);

    return {
      run_a: { run_id: manifestA.run_id, created_at: manifestA.created_at },
      run_b: { run_id: manifestB.run_id, created_at: manifestB.created_at },
      config_changed: configChanged,
      settings_changed: settingsChanged,
      sources: { added, removed, modified, unchanged: shared.length - modified.length },
      records,
      summary: summaryParts.length ? summaryParts.join(", ") : "No changes detected",
    };
  } catch (err) {
    if (err instanceof RunNotFoundError) {
      return createToolError("RUN_NOT_FOUND", err.message, {
        recoverable: false,
      });
    }
    throw err;
  }
}

// ============================================================================
// Run Cleanup
// ============================================================================

export interface RunCleanupResult {
  dry_run: boolean;
  runs_checked: number;
  runs_deleted: string[];
  errors: string[];
}

export async function runCleanup(input: RunCleanupInput): Promise<RunCleanupResult | ToolError> {
  const manager = getRunManager();

  try {
    const result = await manager.cleanup({
      older_than_days: input.older_than_days,
      keep_manifests: input.keep_manifests,
      dry_run: input.dry_run,
    });

    return {
      dry_run: input.dry_run,
      runs_checked: result.checked,
      runs_deleted: result.deleted,
      errors: result.errors,
    };
  } catch (err) {
    return createToolError("WRITE_FAILED", `Failed to cleanup runs: ${errorMessage(err)}`, {
      recoverable: true,
    });
  }
}
