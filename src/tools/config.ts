/**
 * MathTaxonomy-MCP: Configuration Tools
 *
 * Settings inspection and hot reload, plus the server/environment report.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import type { ClassifierSettings, ToolError } from "../types.js";
import { errorMessage, pathExists } from "../utils.js";
import { getRuntimeConfig } from "../runtime-config.js";
import { getRunManager, TOOL_VERSION } from "../run-manager.js";
import { MERGE_POLICIES, type MergePolicy } from "../classifier/consensus.js";
import {
  getPatternRegistry,
  PATTERNS_PATH,
  registryCounts,
} from "../classifier/registry.js";

const MIN_NODE_MAJOR = 20;

// ============================================================================
// Config Get / Reload
// ============================================================================

export interface ConfigGetResult {
  success: true;
  settings_path: string;
  settings: Readonly<ClassifierSettings>;
  merge_policies: Readonly<Record<string, MergePolicy>>;
}

export async function configGet(): Promise<ConfigGetResult> {
  const config = getRuntimeConfig();
  return {
    success: true,
    settings_path: config.filePath,
    settings: config.snapshot(),
    merge_policies: MERGE_POLICIES,
  };
}

export interface ConfigReloadResult {
  success: true;
  changes: string[];
  settings: Readonly<ClassifierSettings>;
}

export async function configReload(): Promise<ConfigReloadResult | ToolError> {
  const config = getRuntimeConfig();
  const result = await config.reload();
  if (result.error) return result.error;
  return { success: true, changes: result.changes, settings: config.snapshot() };
}

// ============================================================================
// Server Info / Environment Check
// ============================================================================

export interface EnvironmentCheck {
  name: string;
  ok: boolean;
  detail: string;
}

export interface ServerInfoResult {
  success: boolean;
  version: string;
  server_base_dir: string;
  runs_dir: string;
  settings_path: string;
  patterns_path: string;
  registry?: Record<string, number>;
  checks: EnvironmentCheck[];
}

/**
 * Node major version from a version string such as "v20.11.1"
 */
export function nodeMajor(version: string): number {
  const match = /^v?(\d+)\./.exec(version);
  return match ? Number(match[1]) : 0;
}

export async function getServerInfo(serverBaseDir: string): Promise<ServerInfoResult> {
  const checks: EnvironmentCheck[] = [];

  const major = nodeMajor(process.version);
  checks.push({
    name: "node_version",
    ok: major >= MIN_NODE_MAJOR,
    detail: `${process.version} (requires >= ${MIN_NODE_MAJOR})`,
  });

  const patternsPresent = await pathExists(PATTERNS_PATH);
  checks.push({
    name: "patterns_file",
    ok: patternsPresent,
    detail: patternsPresent ? PATTERNS_PATH : `missing: ${PATTERNS_PATH}`,
  });

  let registry: Record<string, number> | undefined;
  if (patternsPresent) {
    try {
      registry = registryCounts(getPatternRegistry());
      checks.push({ name: "patterns_valid", ok: true, detail: `${registry.scoring_rules} scoring rules compiled` });
    } catch (err) {
      checks.push({ name: "patterns_valid", ok: false, detail: errorMessage(err) });
    }
  }

  const config = getRuntimeConfig();
  const settingsPresent = await pathExists(config.filePath);
  checks.push({
    name: "settings_file",
    ok: settingsPresent,
    detail: settingsPresent ? config.filePath : `missing: ${config.filePath}`,
  });

  return {
    success: checks.every(c => c.ok),
    version: TOOL_VERSION,
    server_base_dir: serverBaseDir,
    runs_dir: getRunManager().getRunsDir(),
    settings_path: config.filePath,
    patterns_path: path.resolve(PATTERNS_PATH),
    registry,
    checks,
  };
}
