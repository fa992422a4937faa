/**
 * MathTaxonomy-MCP: Runtime Configuration
 *
 * Hot-reloadable classifier settings backed by a JSON file. Callers take an
 * immutable snapshot per classification; reload() swaps the snapshot only
 * when the file parses and validates.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { ClassifierSettingsSchema, DEFAULT_CLASSIFIER_SETTINGS } from "./schemas.js";
import type { ClassifierSettings, ToolError } from "./types.js";
import {
  createToolError,
  ensureDir,
  errorMessage,
  isPlainObject,
  pathExists,
  stableStringify,
  writeJson,
} from "./utils.js";

export interface ReloadResult {
  changes: string[];
  error?: ToolError;
}

const SETTING_KEYS: ReadonlyArray<keyof ClassifierSettings> = [
  "margin_threshold",
  "caps",
  "fallback_domain",
  "default_output_type",
  "domain_synonyms",
];

function freezeSettings(settings: ClassifierSettings): Readonly<ClassifierSettings> {
  return Object.freeze({
    ...settings,
    caps: Object.freeze({ ...settings.caps }),
    domain_synonyms: Object.freeze({ ...settings.domain_synonyms }),
  });
}

function describeValue(value: unknown): string {
  return typeof value === "string" || typeof value === "number"
    ? String(value)
    : stableStringify(value);
}

// ============================================================================
// Runtime Config Class
// ============================================================================

export class RuntimeConfig {
  readonly filePath: string;
  private current: Readonly<ClassifierSettings>;

  constructor(filePath: string, initial: ClassifierSettings = DEFAULT_CLASSIFIER_SETTINGS) {
    this.filePath = filePath;
    this.current = freezeSettings(initial);
  }

  /**
   * Open a settings file. An existing file is only read; a missing one is
   * created with the defaults.
   */
  static async open(filePath: string): Promise<{ config: RuntimeConfig; error?: ToolError }> {
    const config = new RuntimeConfig(filePath);

    if (await pathExists(filePath)) {
      const { error } = await config.reload();
      return { config, error };
    }
    await config.save();
    return { config };
  }

  snapshot(): Readonly<ClassifierSettings> {
    return this.current;
  }

  /**
   * Snapshot with per-call overrides applied
   */
  withOverrides(overrides: { margin_threshold?: number }): Readonly<ClassifierSettings> {
    if (overrides.margin_threshold === undefined) return this.current;
    return freezeSettings({ ...this.current, margin_threshold: overrides.margin_threshold });
  }

  /**
   * Re-read the file. Returns "key: old -> new" for each changed setting;
   * on failure the current snapshot is kept and the error returned.
   */
  async reload(): Promise<ReloadResult> {
    let data: unknown;
    try {
      data = JSON.parse(await fs.readFile(this.filePath, "utf-8"));
    } catch (err) {
      return {
        changes: [],
        error: createToolError("CONFIG_INVALID", `Cannot read settings: ${errorMessage(err)}`, {
          details: { path: this.filePath },
          recoverable: true,
          suggestion: "Fix the JSON syntax; the previous settings remain active",
        }),
      };
    }

    if (!isPlainObject(data)) {
      return {
        changes: [],
        error: createToolError("CONFIG_INVALID", "Settings file must contain a JSON object", {
          details: { path: this.filePath },
          recoverable: true,
        }),
      };
    }

    // Unrecognised keys are ignored; absent keys keep their current value
    const parsed = ClassifierSettingsSchema.strip().safeParse({ ...this.current, ...data });
    if (!parsed.success) {
      return {
        changes: [],
        error: createToolError("CONFIG_INVALID", "Settings failed validation", {
          details: parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`),
          recoverable: true,
          suggestion: "Correct the listed keys; the previous settings remain active",
        }),
      };
    }

    const next = parsed.data;
    const changes: string[] = [];
    for (const key of SETTING_KEYS) {
      const before = describeValue(this.current[key]);
      const after = describeValue(next[key]);
      if (before !== after) changes.push(`${key}: ${before} -> ${after}`);
    }

    this.current = freezeSettings(next);
    return { changes };
  }

  /**
   * Write the current settings to the file
   */
  async save(): Promise<void> {
    await ensureDir(path.dirname(this.filePath));
    await writeJson(this.filePath, this.current);
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let globalConfig: RuntimeConfig | null = null;

export function setRuntimeConfig(config: RuntimeConfig): RuntimeConfig {
  globalConfig = config;
  return globalConfig;
}

export function getRuntimeConfig(): RuntimeConfig {
  if (!globalConfig) {
    throw new Error("RuntimeConfig not initialized. Call setRuntimeConfig first.");
  }
  return globalConfig;
}
