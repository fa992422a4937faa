/**
 * MathTaxonomy-MCP: Batch Tools
 *
 * Line-oriented JSONL classification into a run directory, and statistics
 * recomputed from any classified output.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import { glob, hasMagic } from "glob";
import type { BatchStatistics, ErrorRecord, RunManifest, ToolError } from "../types.js";
import type { BatchStatsInput, ClassifyBatchInput } from "../schemas.js";
import {
  appendJsonl,
  createToolError,
  errorMessage,
  hashConfig,
  hashFile,
  isPlainObject,
  now,
  pathExists,
  readLines,
  writeJson,
  writeJsonl,
} from "../utils.js";
import { getRunManager, RunNotFoundError } from "../run-manager.js";
import { getRuntimeConfig } from "../runtime-config.js";
import { classifyRecord } from "../classifier/pipeline.js";
import { getPatternRegistry } from "../classifier/registry.js";
import { foldStatistics, StatisticsAccumulator } from "../classifier/stats.js";

const TOOL = "mathtax_classify_batch";

/** Skipped lines recorded in the manifest; the rest only go to logs/errors.ndjson */
const MAX_PHASE_ERRORS = 100;

// ============================================================================
// Input Discovery
// ============================================================================

/**
 * Resolve a file path or glob pattern to a sorted list of files
 */
export async function resolveInputFiles(input: string): Promise<string[]> {
  if (hasMagic(input)) {
    const files = await glob(input.replace(/\\/g, "/"), { nodir: true, absolute: true });
    return files.sort();
  }
  const resolved = path.resolve(input);
  return await pathExists(resolved) ? [resolved] : [];
}

// ============================================================================
// Classify Batch
// ============================================================================

export interface ClassifyBatchResult {
  success: true;
  run_id: string;
  status: RunManifest["status"];
  files: string[];
  output_path: string;
  stats_path: string;
  totals: RunManifest["totals"];
  settings_changes: string[];
  statistics: BatchStatistics;
}

export async function classifyBatch(input: ClassifyBatchInput): Promise<ClassifyBatchResult | ToolError> {
  const manager = getRunManager();
  const config = getRuntimeConfig();

  const files = await resolveInputFiles(input.input);
  if (files.length === 0) {
    return createToolError("NOT_FOUND", `No input files match: ${input.input}`, {
      recoverable: false,
      suggestion: "Pass an existing JSONL path or a glob such as 'data/**/*.jsonl'",
    });
  }

  try {
    getPatternRegistry();
  } catch (err) {
    return createToolError("CONFIG_INVALID", errorMessage(err), { recoverable: false });
  }

  let settings = config.withOverrides({ margin_threshold: input.margin_threshold });

  const { runId, runDir } = input.run_id
    ? await manager.ensureRun(input.run_id, settings)
    : await manager.createRun(undefined, settings);
  const { logger, manifest } = await manager.getRun(runId);
  await logger.init();

  // A reused run records the settings of its latest batch
  if (manifest.config_hash !== hashConfig(settings)) {
    await manager.updateConfigSnapshot(runId, settings);
  }

  const classifiedDir = manager.getClassifiedDir(runId);
  const outputPath = path.join(classifiedDir, input.output_file);
  const statsPath = path.join(classifiedDir, "stats.json");
  const sourcesPath = path.join(manager.getInputDir(runId), "sources.jsonl");

  const totals: RunManifest["totals"] = {
    records_read: 0,
    records_classified: 0,
    records_skipped: 0,
    errors_encountered: 0,
  };
  const phaseErrors: ErrorRecord[] = [];
  const settingsChanges: string[] = [];
  const stats = new StatisticsAccumulator();
  let buffer: unknown[] = [];

  const skipLine = async (file: string, lineNumber: number, reason: string): Promise<void> => {
    totals.records_skipped++;
    totals.errors_encountered++;
    await logger.error("classify", TOOL, "Skipping malformed line", { file, line: lineNumber, reason });
    if (phaseErrors.length < MAX_PHASE_ERRORS) {
      phaseErrors.push({
        timestamp: now(),
        code: "PARSE_ERROR",
        message: `${path.basename(file)}:${lineNumber}: ${reason}`,
        recoverable: true,
      });
    }
  };

  const flush = async (): Promise<void> => {
    await appendJsonl(outputPath, buffer);
    buffer = [];
  };

  try {
    await manager.startPhase(runId, "classify");
    await logger.info("classify", TOOL, "Batch started", { files, output_file: input.output_file });

    await writeJsonl(outputPath, []);
    await writeJsonl(sourcesPath, []);
    const inputHashes: string[] = [];

    for (const file of files) {
      const sha = await hashFile(file);
      inputHashes.push(sha);
      let lineNumber = 0;
      let fileRecords = 0;

      for await (const line of readLines(file)) {
        lineNumber++;
        if (!line.trim()) continue;
        totals.records_read++;

        let parsed: unknown;
        try {
          parsed = JSON.parse(line);
        } catch (err) {
          await skipLine(file, lineNumber, errorMessage(err));
          continue;
        }
        if (!isPlainObject(parsed)) {
          await skipLine(file, lineNumber, "Line is not a JSON object");
          continue;
        }

        const { record } = classifyRecord(parsed, settings);
        buffer.push(record);
        stats.add(record);
        totals.records_classified++;
        fileRecords++;

        if (buffer.length >= input.flush_every) await flush();

        if (input.reload_every > 0 && totals.records_classified % input.reload_every === 0) {
          const reload = await config.reload();
          if (reload.error) {
            await logger.warn("classify", TOOL, "Settings reload failed; keeping previous settings", reload.error);
          } else if (reload.changes.length) {
            settingsChanges.push(...reload.changes);
            settings = config.withOverrides({ margin_threshold: input.margin_threshold });
            await manager.updateConfigSnapshot(runId, settings);
            await logger.info("classify", TOOL, "Settings reloaded", { changes: reload.changes });
          }
        }
      }

      await appendJsonl(sourcesPath, [{
        uri: `file://${file}`,
        sha256: sha,
        lines_read: lineNumber,
        records_classified: fileRecords,
      }]);
    }
    await flush();

    await manager.completePhase(runId, "classify", {
      inputs: { count: files.length, hashes: inputHashes },
      outputs: { count: totals.records_classified, hashes: [await hashFile(outputPath)] },
      errors: phaseErrors,
    });

    await manager.startPhase(runId, "report");
    const statistics = stats.result();
    await writeJson(statsPath, statistics);
    await manager.completePhase(runId, "report", {
      inputs: { count: 1, hashes: [await hashFile(outputPath)] },
      outputs: { count: 1, hashes: [await hashFile(statsPath)] },
      errors: [],
    });

    const status: RunManifest["status"] = totals.records_skipped > 0 ? "partial" : "completed";
    await manager.updateManifest(runId, { totals });
    await manager.completeRun(runId, status);
    await logger.info("report", TOOL, "Batch finished", { status, totals });

    return {
      success: true,
      run_id: runId,
      status,
      files,
      output_path: outputPath,
      stats_path: statsPath,
      totals,
      settings_changes: settingsChanges,
      statistics,
    };
  } catch (err) {
    await logger.error("classify", TOOL, "Batch aborted", { error: errorMessage(err) });
    await manager.updateManifest(runId, { totals });
    await manager.completeRun(runId, "failed");
    return createToolError("READ_FAILED", `Batch failed: ${errorMessage(err)}`, {
      details: { run_id: runId, run_dir: runDir },
      recoverable: true,
    });
  }
}

// ============================================================================
// Batch Statistics
// ============================================================================

export interface BatchStatsResult {
  success: true;
  source: string;
  lines_skipped: number;
  statistics: BatchStatistics;
}

export async function batchStats(input: BatchStatsInput): Promise<BatchStatsResult | ToolError> {
  let source: string;

  if (input.run_id) {
    const manager = getRunManager();
    try {
      await manager.getRun(input.run_id);
    } catch (err) {
      if (err instanceof RunNotFoundError) {
        return createToolError("RUN_NOT_FOUND", err.message, { recoverable: false });
      }
      throw err;
    }
    source = path.join(manager.getClassifiedDir(input.run_id), input.output_file);
  } else if (input.path) {
    source = path.resolve(input.path);
  } else {
    return createToolError("INVALID_INPUT", "Provide exactly one of run_id or path", { recoverable: false });
  }

  if (!await pathExists(source)) {
    return createToolError("NOT_FOUND", `Classified output not found: ${source}`, { recoverable: false });
  }

  const records: unknown[] = [];
  let linesSkipped = 0;
  try {
    for await (const line of readLines(source)) {
      if (!line.trim()) continue;
      try {
        records.push(JSON.parse(line));
      } catch {
        linesSkipped++;
      }
    }
  } catch (err) {
    return createToolError("READ_FAILED", `Cannot read ${source}: ${errorMessage(err)}`, { recoverable: true });
  }

  return {
    success: true,
    source,
    lines_skipped: linesSkipped,
    statistics: foldStatistics(records),
  };
}
