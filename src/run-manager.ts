/**
 * MathTaxonomy-MCP: Run Manager
 *
 * Manages run directories, manifests, and phase coordination.
 * Ensures isolated workspaces for each batch classification run.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import * as fs from "fs/promises";
import type { ClassifierSettings, RunManifest, PhaseManifest } from "./types.js";
import { DEFAULT_CLASSIFIER_SETTINGS } from "./schemas.js";
import {
  generateRunId,
  ensureDir,
  pathExists,
  writeJson,
  readJson,
  hashConfig,
  now,
  RunLogger,
} from "./utils.js";

export const TOOL_VERSION = "1.0.0";

export interface RunManagerOptions {
  runs_dir: string;
}

const DEFAULT_OPTIONS: RunManagerOptions = {
  runs_dir: "runs",
};

export class RunNotFoundError extends Error {
  constructor(readonly runId: string) {
    super(`Run not found: ${runId}`);
    this.name = "RunNotFoundError";
  }
}

// ============================================================================
// Run Manager Class
// ============================================================================

export class RunManager {
  private baseDir: string;
  private options: RunManagerOptions;

  constructor(baseDir: string, options?: Partial<RunManagerOptions>) {
    this.baseDir = baseDir;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  // --------------------------------------------------------------------------
  // Run Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Create a new run directory with all subdirectories.
   * The settings snapshot is stored as config.json and hashed into the manifest.
   */
  async createRun(
    runId?: string,
    settings: Readonly<ClassifierSettings> = DEFAULT_CLASSIFIER_SETTINGS
  ): Promise<{ runId: string; runDir: string; logger: RunLogger }> {
    const id = runId || generateRunId();
    const runDir = this.getRunDir(id);

    await ensureDir(path.join(runDir, "input"));
    await ensureDir(path.join(runDir, "classified"));
    await ensureDir(path.join(runDir, "logs"));

    const manifest: RunManifest = {
      run_id: id,
      created_at: now(),
      status: "running",
      config_hash: hashConfig(settings),
      phases: {},
      totals: {
        records_read: 0,
        records_classified: 0,
        records_skipped: 0,
        errors_encountered: 0,
      },
      timing: {
        total_duration_ms: 0,
        phase_durations: {},
      },
    };

    await writeJson(path.join(runDir, "manifest.json"), manifest);
    await writeJson(path.join(runDir, "config.json"), settings);

    const logger = new RunLogger(runDir);
    await logger.init();

    return { runId: id, runDir, logger };
  }

  /**
   * Ensure a run exists, creating it if necessary.
   */
  async ensureRun(
    runId: string,
    settings?: Readonly<ClassifierSettings>
  ): Promise<{ runId: string; runDir: string; isNew: boolean }> {
    const runDir = this.getRunDir(runId);
    const manifestPath = path.join(runDir, "manifest.json");

    if (await pathExists(manifestPath)) {
      return { runId, runDir, isNew: false };
    }

    await this.createRun(runId, settings);
    return { runId, runDir, isNew: true };
  }

  /**
   * Get an existing run's context
   */
  async getRun(runId: string): Promise<{ runDir: string; manifest: RunManifest; logger: RunLogger }> {
    const runDir = this.getRunDir(runId);
    const manifestPath = path.join(runDir, "manifest.json");

    if (!await pathExists(manifestPath)) {
      throw new RunNotFoundError(runId);
    }

    const manifest = await readJson<RunManifest>(manifestPath);
    const logger = new RunLogger(runDir);

    return { runDir, manifest, logger };
  }

  /**
   * Update run manifest
   */
  async updateManifest(runId: string, updates: Partial<RunManifest>): Promise<RunManifest> {
    const runDir = this.getRunDir(runId);
    const manifest = await readJson<RunManifest>(path.join(runDir, "manifest.json"));

    const updated: RunManifest = {
      ...manifest,
      ...updates,
      totals: { ...manifest.totals, ...updates.totals },
      timing: { ...manifest.timing, ...updates.timing },
      phases: { ...manifest.phases, ...updates.phases },
    };

    await writeJson(path.join(runDir, "manifest.json"), updated);
    return updated;
  }

  /**
   * Replace the run's settings snapshot (config.json) and its manifest hash
   */
  async updateConfigSnapshot(runId: string, settings: Readonly<ClassifierSettings>): Promise<RunManifest> {
    await writeJson(path.join(this.getRunDir(runId), "config.json"), settings);
    return this.updateManifest(runId, { config_hash: hashConfig(settings) });
  }

  /**
   * Mark a phase as started
   */
  async startPhase(
    runId: string,
    phaseName: keyof RunManifest["phases"]
  ): Promise<PhaseManifest> {
    const phase: PhaseManifest = {
      started_at: now(),
      status: "running",
      inputs: { count: 0, hashes: [] },
      outputs: { count: 0, hashes: [] },
      tool_version: TOOL_VERSION,
      errors: [],
    };

    await this.updateManifest(runId, {
      phases: { [phaseName]: phase },
    });

    return phase;
  }

  /**
   * Mark a phase as completed. A phase that recorded unrecoverable errors is failed.
   */
  async completePhase(
    runId: string,
    phaseName: keyof RunManifest["phases"],
    result: Partial<PhaseManifest>
  ): Promise<void> {
    const { manifest } = await this.getRun(runId);
    const phase = manifest.phases[phaseName];
    if (!phase) {
      throw new Error(`Phase ${phaseName} was never started for run ${runId}`);
    }

    const completedAt = now();
    const errors = result.errors ?? phase.errors;
    const completed: PhaseManifest = {
      ...phase,
      ...result,
      completed_at: completedAt,
      status: errors.some(e => !e.recoverable) ? "failed" : "completed",
    };

    const duration = new Date(completedAt).getTime() - new Date(phase.started_at).getTime();

    await this.updateManifest(runId, {
      phases: { [phaseName]: completed },
      timing: {
        total_duration_ms: manifest.timing.total_duration_ms,
        phase_durations: {
          ...manifest.timing.phase_durations,
          [phaseName]: duration,
        },
      },
    });
  }

  /**
   * Complete the entire run
   */
  async completeRun(runId: string, status: RunManifest["status"]): Promise<RunManifest> {
    const { manifest } = await this.getRun(runId);

    const completedAt = now();
    const totalDuration = new Date(completedAt).getTime() - new Date(manifest.created_at).getTime();

    return this.updateManifest(runId, {
      completed_at: completedAt,
      status,
      timing: {
        ...manifest.timing,
        total_duration_ms: totalDuration,
      },
    });
  }

  // --------------------------------------------------------------------------
  // Path Helpers
  // --------------------------------------------------------------------------

  getRunsDir(): string {
    return path.resolve(this.baseDir, this.options.runs_dir);
  }

  getRunDir(runId: string): string {
    return path.join(this.getRunsDir(), runId);
  }

  getInputDir(runId: string): string {
    return path.join(this.getRunDir(runId), "input");
  }

  getClassifiedDir(runId: string): string {
    return path.join(this.getRunDir(runId), "classified");
  }

  // --------------------------------------------------------------------------
  // Run Queries
  // --------------------------------------------------------------------------

  /**
   * List all runs, newest first
   */
  async listRuns(options?: {
    status?: RunManifest["status"];
    limit?: number;
    before?: string;
    after?: string;
  }): Promise<RunManifest[]> {
    const runsDir = this.getRunsDir();

    if (!await pathExists(runsDir)) {
      return [];
    }

    const entries = await fs.readdir(runsDir, { withFileTypes: true });
    const runs: RunManifest[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;

      const manifestPath = path.join(runsDir, entry.name, "manifest.json");
      if (!await pathExists(manifestPath)) continue;

      let manifest: RunManifest;
      try {
        manifest = await readJson<RunManifest>(manifestPath);
      } catch {
        // Unreadable manifests are not runs
        continue;
      }

      if (options?.status && manifest.status !== options.status) continue;
      if (options?.before && manifest.created_at >= options.before) continue;
      if (options?.after && manifest.created_at <= options.after) continue;

      runs.push(manifest);
    }

    runs.sort((a, b) => b.created_at.localeCompare(a.created_at));

    return options?.limit ? runs.slice(0, options.limit) : runs;
  }

  /**
   * Cleanup old runs
   */
  async cleanup(options: {
    older_than_days: number;
    keep_manifests?: boolean;
    dry_run?: boolean;
  }): Promise<{ checked: number; deleted: string[]; errors: string[] }> {
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - options.older_than_days);

    const runs = await this.listRuns({ before: cutoff.toISOString() });
    const deleted: string[] = [];
    const errors: string[] = [];

    for (const run of runs) {
      const runDir = this.getRunDir(run.run_id);

      if (options.dry_run) {
        deleted.push(run.run_id);
        continue;
      }

      try {
        if (options.keep_manifests) {
          const entries = await fs.readdir(runDir, { withFileTypes: true });
          for (const entry of entries) {
            if (entry.name === "manifest.json") continue;
            await fs.rm(path.join(runDir, entry.name), { recursive: true });
          }
        } else {
          await fs.rm(runDir, { recursive: true });
        }
        deleted.push(run.run_id);
      } catch (e) {
        errors.push(`Failed to delete ${run.run_id}: ${e}`);
      }
    }

    return { checked: runs.length, deleted, errors };
  }

  getOptions(): Readonly<RunManagerOptions> {
    return this.options;
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let globalManager: RunManager | null = null;

export function initRunManager(baseDir: string, options?: Partial<RunManagerOptions>): RunManager {
  globalManager = new RunManager(baseDir, options);
  return globalManager;
}

export function getRunManager(): RunManager {
  if (!globalManager) {
    throw new Error("RunManager not initialized. Call initRunManager first.");
  }
  return globalManager;
}
