#!/usr/bin/env node
/**
 * MathTaxonomy-MCP: Main Server Entry Point
 *
 * Heuristic classifier for math problem records over MCP.
 * Two-phase batch pipeline: Classify → Report
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 *
 * This source code is the property of vario.automation and is protected
 * by trade secret and copyright law. Unauthorized copying, modification,
 * distribution, or use of this software is strictly prohibited.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

// Tool implementations
import {
  classifyRecord,
  explainDomain,
  extractAttributes,
} from "./tools/classify.js";

import {
  classifyBatch,
  batchStats,
} from "./tools/batch.js";

import {
  runStatus,
  runList,
  runDiff,
  runCleanup,
} from "./tools/utilities.js";

import {
  configGet,
  configReload,
  getServerInfo,
} from "./tools/config.js";

// Schemas
import {
  ClassifyRecordSchema,
  ExplainDomainSchema,
  ExtractAttributesSchema,
  ClassifyBatchSchema,
  BatchStatsBaseSchema,
  BatchStatsSchema,
  RunStatusSchema,
  RunListSchema,
  RunDiffSchema,
  RunCleanupSchema,
  ConfigGetInputSchema,
  ConfigReloadInputSchema,
  ServerInfoInputSchema,
} from "./schemas.js";

import { initRunManager, TOOL_VERSION } from "./run-manager.js";
import { RuntimeConfig, setRuntimeConfig } from "./runtime-config.js";
import { createToolError, formatErrorResponse, isToolError } from "./utils.js";
import { fileURLToPath } from "url";
import * as path from "path";

// Get the directory where the MCP server is installed
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const SERVER_BASE_DIR = path.resolve(__dirname, "..");
const SETTINGS_PATH = path.join(SERVER_BASE_DIR, "config", "settings.json");

// Initialize the MCP server
const server = new McpServer({
  name: "mathtaxonomy-mcp",
  version: TOOL_VERSION,
});

function respond(result: unknown) {
  if (isToolError(result)) {
    return formatErrorResponse(result);
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}

// ============================================================================
// RECORD TOOLS
// ============================================================================

server.tool(
  "mathtax_classify_record",
  "Classify one math problem record: domain (algebra, number_theory, combinatorics, geometry), text and solution attributes merged with any external annotation, and the per-field consensus audit.",
  ClassifyRecordSchema.shape,
  async (args) => respond(await classifyRecord(args))
);

server.tool(
  "mathtax_explain_domain",
  "Explain a record's domain decision: per-rule score contributions, penalties, hard override, external label normalization and margin arbitration.",
  ExplainDomainSchema.shape,
  async (args) => respond(await explainDomain(args))
);

server.tool(
  "mathtax_extract_attributes",
  "Run the heuristic attribute extractors on raw problem text and solution code without any external annotation.",
  ExtractAttributesSchema.shape,
  async (args) => respond(await extractAttributes(args))
);

// ============================================================================
// BATCH TOOLS
// ============================================================================

server.tool(
  "mathtax_classify_batch",
  "Classify every line of one or more JSONL files (path or glob) into a run directory. Malformed lines are skipped and logged; statistics are written to classified/stats.json.",
  ClassifyBatchSchema.shape,
  async (args) => respond(await classifyBatch(args))
);

server.tool(
  "mathtax_batch_stats",
  "Recompute aggregate statistics (disagreement rates, provenance, domain and decision-reason counts) from a run's classified output or any classified JSONL file.",
  BatchStatsBaseSchema.shape,
  async (args) => {
    const parsed = BatchStatsSchema.safeParse(args);
    if (!parsed.success) {
      return respond(createToolError("INVALID_INPUT", "Provide exactly one of run_id or path", {
        recoverable: false,
      }));
    }
    return respond(await batchStats(parsed.data));
  }
);

// ============================================================================
// UTILITY TOOLS
// ============================================================================

server.tool(
  "mathtax_run_status",
  "Get detailed status of a run including phase completion, timing, errors, and record counts.",
  RunStatusSchema.shape,
  async (args) => respond(await runStatus(args))
);

server.tool(
  "mathtax_run_list",
  "List runs newest first with optional filtering by status and creation date range.",
  RunListSchema.shape,
  async (args) => respond(await runList(args))
);

server.tool(
  "mathtax_run_diff",
  "Compare two runs: settings differences, input source changes, and per-record domain and attribute changes.",
  RunDiffSchema.shape,
  async (args) => respond(await runDiff(args))
);

server.tool(
  "mathtax_run_cleanup",
  "Delete runs older than a given age, optionally keeping their manifests. Dry run by default.",
  RunCleanupSchema.shape,
  async (args) => respond(await runCleanup(args))
);

// ============================================================================
// CONFIGURATION TOOLS
// ============================================================================

server.tool(
  "mathtax_config_get",
  "Show the active classifier settings, the settings file path, and the merge policy of every attribute.",
  ConfigGetInputSchema.shape,
  async () => respond(await configGet())
);

server.tool(
  "mathtax_config_reload",
  "Re-read the settings file. Lists changed settings; an invalid file leaves the previous settings active.",
  ConfigReloadInputSchema.shape,
  async () => respond(await configReload())
);

server.tool(
  "mathtax_get_server_info",
  `Get server installation paths, pattern registry counts and an environment check.

Use this when:
- Batch runs cannot be found where you expect them
- Classification fails with CONFIG_INVALID
- You want to verify the installation`,
  ServerInfoInputSchema.shape,
  async () => respond(await getServerInfo(SERVER_BASE_DIR))
);

// ============================================================================
// SERVER STARTUP
// ============================================================================

async function main() {
  initRunManager(SERVER_BASE_DIR, { runs_dir: "runs" });

  const { config, error } = await RuntimeConfig.open(SETTINGS_PATH);
  setRuntimeConfig(config);
  if (error) {
    console.error(`Settings not loaded, using defaults: ${error.message}`);
  }

  // Connect via stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error("MathTaxonomy-MCP server started");
  console.error(`  Runs directory: ${SERVER_BASE_DIR}/runs`);
  console.error(`  Settings file: ${SETTINGS_PATH}`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
