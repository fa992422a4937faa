/**
 * MathTaxonomy-MCP: Zod Schemas for Tool Input Validation
 *
 * Every tool has a strict schema that enforces type safety and provides
 * clear error messages for invalid inputs. Record and settings schemas
 * describe the data files the classifier reads.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { DOMAINS, OUTPUT_TYPES, type ClassifierSettings } from "./types.js";

// ============================================================================
// Common Schemas
// ============================================================================

export const RunIdSchema = z.string().uuid().describe("Run directory identifier");
export const MarginThresholdSchema = z.number().int().min(0).max(100)
  .describe("Minimum heuristic margin that overrules an external domain label");

// ============================================================================
// Record Schema (lenient: malformed members degrade to absent)
// ============================================================================

const lenientString = z.string().nullish().catch(null);

export const MathRecordSchema = z.object({
  problem: z.object({ text: lenientString }).passthrough().nullish().catch(null),
  code: lenientString,
  plan: lenientString,
  attempts: z.array(
    z.object({ code: lenientString }).passthrough().nullish().catch(null)
  ).nullish().catch(null),
  outcome: z.object({
    pass_at_k: z.number().nullish().catch(null),
  }).passthrough().nullish().catch(null),
  math_structure: z.object({
    from_text: z.record(z.unknown()).nullish().catch(null),
    from_solution: z.record(z.unknown()).nullish().catch(null),
  }).passthrough().nullish().catch(null),
}).passthrough();

// ============================================================================
// Settings Schema
// ============================================================================

export const DEFAULT_DOMAIN_SYNONYMS: Record<string, string | null> = {
  arithmetic: "algebra",
  probability: "combinatorics",
  inequalities: "algebra",
  functional_equations: "algebra",
  mixed: null,
};

export const ClassifierSettingsSchema = z.object({
  margin_threshold: MarginThresholdSchema.default(6),
  caps: z.object({
    objects: z.number().int().min(1).max(17).default(3),
    constraints: z.number().int().min(1).max(11).default(4),
    mechanisms: z.number().int().min(1).max(10).default(3),
  }).strict().default({}),
  fallback_domain: z.enum(DOMAINS).default("algebra"),
  default_output_type: z.enum(OUTPUT_TYPES).default("exact_value"),
  domain_synonyms: z.record(z.string().nullable()).default(DEFAULT_DOMAIN_SYNONYMS)
    .describe("Lower-cased external domain label -> canonical domain (null = no opinion)"),
}).strict();

export const DEFAULT_CLASSIFIER_SETTINGS: Readonly<ClassifierSettings> =
  Object.freeze(ClassifierSettingsSchema.parse({}));

// ============================================================================
// Classification Schemas
// ============================================================================

export const ClassifyRecordInputSchema = z.object({
  record: z.record(z.unknown())
    .describe("Problem record: problem.text, code or attempts[] + outcome.pass_at_k, plan, math_structure"),
  margin_threshold: MarginThresholdSchema.optional()
    .describe("Override the configured margin threshold for this call"),
}).strict();

export const ExplainDomainInputSchema = z.object({
  record: z.record(z.unknown()).describe("Problem record to explain"),
  margin_threshold: MarginThresholdSchema.optional(),
}).strict();

export const ExtractAttributesInputSchema = z.object({
  text: z.string().default("").describe("Problem statement"),
  code: z.string().default("").describe("Solution program"),
}).strict();

// ============================================================================
// Batch Schemas
// ============================================================================

export const ClassifyBatchInputSchema = z.object({
  input: z.string().min(1)
    .describe("JSONL file path or glob pattern (e.g., 'data/**/*.jsonl')"),
  output_file: z.string().regex(/^[\w.-]+\.jsonl$/).default("records.jsonl")
    .describe("Output file name inside the run's classified/ directory"),
  run_id: RunIdSchema.optional()
    .describe("Existing or new run id (generated when omitted)"),
  flush_every: z.number().int().min(1).max(10000).default(100)
    .describe("Records buffered before each append to the output file"),
  reload_every: z.number().int().min(0).default(0)
    .describe("Reload settings every N records (0 = never)"),
  margin_threshold: MarginThresholdSchema.optional(),
}).strict();

export const BatchStatsBaseSchema = z.object({
  run_id: RunIdSchema.optional().describe("Run whose classified output to fold"),
  path: z.string().optional().describe("Any classified JSONL file"),
  output_file: z.string().default("records.jsonl"),
}).strict();

export const BatchStatsInputSchema = BatchStatsBaseSchema.refine(
  v => Boolean(v.run_id) !== Boolean(v.path),
  { message: "Provide exactly one of run_id or path" }
);

// ============================================================================
// Configuration Schemas
// ============================================================================

export const ConfigGetInputSchema = z.object({}).strict();
export const ConfigReloadInputSchema = z.object({}).strict();
export const ServerInfoInputSchema = z.object({}).strict();

// ============================================================================
// Utility Schemas
// ============================================================================

export const RunStatusInputSchema = z.object({
  run_id: RunIdSchema
}).strict();

export const RunListInputSchema = z.object({
  status: z.enum(["all", "completed", "running", "failed", "partial"]).default("all"),
  limit: z.number().int().min(1).max(100).default(20),
  before: z.string().datetime().optional(),
  after: z.string().datetime().optional()
}).strict();

export const RunDiffInputSchema = z.object({
  run_id_a: RunIdSchema,
  run_id_b: RunIdSchema,
  output_file: z.string().default("records.jsonl"),
  include_records: z.boolean().default(false)
    .describe("Include per-line domain changes (verbose)")
}).strict();

export const RunCleanupInputSchema = z.object({
  older_than_days: z.number().int().min(1).default(30),
  keep_manifests: z.boolean().default(true)
    .describe("Keep manifest.json even when removing artifacts"),
  dry_run: z.boolean().default(true)
}).strict();

// ============================================================================
// Export type inference helpers
// ============================================================================

export type ClassifyRecordInput = z.infer<typeof ClassifyRecordInputSchema>;
export type ExplainDomainInput = z.infer<typeof ExplainDomainInputSchema>;
export type ExtractAttributesInput = z.infer<typeof ExtractAttributesInputSchema>;
export type ClassifyBatchInput = z.infer<typeof ClassifyBatchInputSchema>;
export type BatchStatsInput = z.infer<typeof BatchStatsInputSchema>;
export type RunStatusInput = z.infer<typeof RunStatusInputSchema>;
export type RunListInput = z.infer<typeof RunListInputSchema>;
export type RunDiffInput = z.infer<typeof RunDiffInputSchema>;
export type RunCleanupInput = z.infer<typeof RunCleanupInputSchema>;

// ============================================================================
// Schema Aliases (for MCP tool registration)
// ============================================================================

export const ClassifyRecordSchema = ClassifyRecordInputSchema;
export const ExplainDomainSchema = ExplainDomainInputSchema;
export const ExtractAttributesSchema = ExtractAttributesInputSchema;
export const ClassifyBatchSchema = ClassifyBatchInputSchema;
export const BatchStatsSchema = BatchStatsInputSchema;
export const RunStatusSchema = RunStatusInputSchema;
export const RunListSchema = RunListInputSchema;
export const RunDiffSchema = RunDiffInputSchema;
export const RunCleanupSchema = RunCleanupInputSchema;
