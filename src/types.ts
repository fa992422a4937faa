/**
 * MathTaxonomy-MCP: Canonical Data Types
 *
 * These types define the core data structures used throughout the classifier.
 * All types are designed for determinism, auditability, and composability.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

// ============================================================================
// Vocabularies
// ============================================================================

export const DOMAINS = ["algebra", "number_theory", "combinatorics", "geometry"] as const;
export type Domain = typeof DOMAINS[number];

export const OBJECT_LABELS = [
  "integer", "positive_integer", "real", "rational", "complex", "sequence",
  "set", "function", "polynomial", "point", "line", "circle", "triangle",
  "polygon", "graph", "matrix", "vector",
] as const;
export type ObjectLabel = typeof OBJECT_LABELS[number];

export const CONSTRAINT_LABELS = [
  "equality", "inequality", "divisibility", "parity", "forall", "exists",
  "bounded", "distinct", "monotonic", "symmetry", "invariant",
] as const;
export type ConstraintLabel = typeof CONSTRAINT_LABELS[number];

/** Constraint labels an external annotation may add on its own */
export const QUANTIFIER_LABELS = ["forall", "exists"] as const;
export type QuantifierLabel = typeof QUANTIFIER_LABELS[number];

export const MECHANISM_LABELS = [
  "induction", "pigeonhole", "extremal", "case_analysis", "invariant",
  "monovariant", "algebraic_manipulation", "geometric_congruence",
  "geometric_similarity", "counting",
] as const;
export type MechanismLabel = typeof MECHANISM_LABELS[number];

export const OUTPUT_TYPES = [
  "proof", "existence", "non_existence", "classification", "maximum",
  "minimum", "exact_value",
] as const;
export type OutputType = typeof OUTPUT_TYPES[number];

export const REASONING_SHAPES = ["linear", "branching"] as const;
export type ReasoningShape = typeof REASONING_SHAPES[number];

export const CASE_SPLITS = ["none", "binary", "multi"] as const;
export type CaseSplit = typeof CASE_SPLITS[number];

export const AUXILIARY_CONSTRUCTIONS = ["none", "symbolic", "structural"] as const;
export type AuxiliaryConstruction = typeof AUXILIARY_CONSTRUCTIONS[number];

export const REASONING_DEPTHS = ["shallow", "medium", "deep"] as const;
export type ReasoningDepth = typeof REASONING_DEPTHS[number];

export const INTERMEDIATE_REUSES = ["none", "single", "multiple"] as const;
export type IntermediateReuse = typeof INTERMEDIATE_REUSES[number];

// ============================================================================
// MathRecord - Typed view over one input line
// ============================================================================

/** A JSON object as read from an input line; carried through to the output */
export type RawRecord = Record<string, unknown>;

export interface MathRecord {
  problem?: { text?: string | null } | null;
  code?: string | null;
  plan?: string | null;
  attempts?: Array<{ code?: string | null } | null | undefined> | null;
  outcome?: { pass_at_k?: number | null } | null;
  math_structure?: {
    from_text?: Record<string, unknown> | null;
    from_solution?: Record<string, unknown> | null;
  } | null;
}

// ============================================================================
// FieldView - Canonical text projections of a record
// ============================================================================

export interface FieldView {
  text: string;                // Problem statement
  code: string;                // Resolved solution program
  plan: string;                // Auxiliary planning text
  context: string;             // text + plan
  everything: string;          // text + plan + code
}

export type ViewName = keyof FieldView;

// ============================================================================
// Domain Decision
// ============================================================================

export type ScoreBoard = Record<Domain, number>;

export interface DomainRanking {
  best: Domain;
  second: Domain;
  margin: number;
}

export type OverrideVerdict =
  | { kind: "none" }
  | { kind: "forced"; domain: Domain; rule: string; priority: number };

export type DecisionReason =
  | "hard_override"
  | "external_missing_fallback"
  | "agree"
  | `heuristic_override:margin=${number}`
  | "external_default"
  | "fallback_to_allowed";

export interface DomainMeta {
  external_domain: string | null;
  heur_scores: ScoreBoard;
  heur_best: Domain;
  heur_second: Domain;
  heur_margin: number;
  forced_domain: Domain | null;
  decision_reason: DecisionReason;
}

export interface DomainDecision {
  domain: Domain;
  meta: DomainMeta;
}

// ============================================================================
// Attributes
// ============================================================================

export interface TextAttributes {
  objects: ObjectLabel[];
  constraints: ConstraintLabel[];
  output_type: OutputType;
  mechanisms: MechanismLabel[];
}

export interface SolutionAttributes {
  reasoning_shape: ReasoningShape;
  case_split: CaseSplit;
  auxiliary_construction: AuxiliaryConstruction;
  reasoning_depth: ReasoningDepth;
  intermediate_reuse: IntermediateReuse;
}

export interface AttributeSet {
  from_text: TextAttributes;
  from_solution: SolutionAttributes;
}

export type AttributeField = keyof TextAttributes | keyof SolutionAttributes;

export const ATTRIBUTE_FIELDS: readonly AttributeField[] = [
  "reasoning_shape",
  "case_split",
  "auxiliary_construction",
  "reasoning_depth",
  "intermediate_reuse",
  "objects",
  "constraints",
  "mechanisms",
  "output_type",
];

// ============================================================================
// Consensus
// ============================================================================

export type Provenance = "heuristic" | "external" | "merged";
export type Confidence = "high" | "medium" | "low";

export interface ConsensusOutcome<T> {
  value: T;
  provenance: Provenance;
  confidence: Confidence;
  disagreement: boolean;
}

/** Per-field audit entry written to math_structure.consensus_meta */
export interface ConsensusMetaEntry {
  source: Provenance;
  confidence: Confidence;
  disagreement: boolean;
}

export type ConsensusMeta = Record<AttributeField, ConsensusMetaEntry>;

export interface ExternalAnnotation {
  domain: string | null;
  objects: string[] | null;
  constraints: string[] | null;
  mechanisms: string[] | null;
  output_type: string | null;
  reasoning_shape: string | null;
  case_split: string | null;
  auxiliary_construction: string | null;
  reasoning_depth: string | null;
  intermediate_reuse: string | null;
}

// ============================================================================
// Settings - Immutable snapshot threaded into every classification
// ============================================================================

export interface ClassifierSettings {
  margin_threshold: number;
  caps: {
    objects: number;
    constraints: number;
    mechanisms: number;
  };
  fallback_domain: Domain;
  default_output_type: OutputType;
  domain_synonyms: Record<string, string | null>;
}

// ============================================================================
// Classification output
// ============================================================================

export interface ClassificationAudit {
  domain: Domain;
  domain_meta: DomainMeta;
  consensus_meta: ConsensusMeta;
}

export interface ClassifiedRecord {
  record: RawRecord;
  audit: ClassificationAudit;
}

export interface BatchStatistics {
  total_records: number;
  disagreement_counts: Record<AttributeField, number>;
  disagreement_rates: Record<AttributeField, number>;
  source_counts: Record<AttributeField, Record<Provenance, number>>;
  domain_counts: Record<Domain, number>;
  decision_reason_counts: Record<string, number>;
}

// ============================================================================
// RunManifest - Audit record for batch runs
// ============================================================================

export interface RunManifest {
  run_id: string;              // UUID v7 (time-ordered)
  created_at: string;          // ISO8601
  completed_at?: string;
  status: "running" | "completed" | "failed" | "partial";

  config_hash: string;         // SHA256 of config.json

  phases: {
    classify?: PhaseManifest;
    report?: PhaseManifest;
  };

  totals: {
    records_read: number;
    records_classified: number;
    records_skipped: number;
    errors_encountered: number;
  };

  timing: {
    total_duration_ms: number;
    phase_durations: Record<string, number>;
  };
}

export interface PhaseManifest {
  started_at: string;
  completed_at?: string;
  status: "pending" | "running" | "completed" | "failed";

  inputs: {
    count: number;
    hashes: string[];          // SHA256 of each input file
  };

  outputs: {
    count: number;
    hashes: string[];
  };

  tool_version: string;
  errors: ErrorRecord[];
}

export interface ErrorRecord {
  timestamp: string;
  code: string;
  message: string;
  details?: unknown;
  recoverable: boolean;
}

// ============================================================================
// Error Types
// ============================================================================

export type ErrorCode =
  | "INVALID_INPUT"
  | "PARSE_ERROR"
  | "READ_FAILED"
  | "WRITE_FAILED"
  | "RUN_NOT_FOUND"
  | "CONFIG_INVALID"
  | "NOT_FOUND"
  | "EMPTY_CONTENT";

export interface ToolError {
  success: false;
  isError: true;
  code: ErrorCode;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestion?: string;
}

// ============================================================================
// Event Types (for logging)
// ============================================================================

export interface EventLogEntry {
  timestamp: string;
  level: "info" | "warn" | "error";
  phase: string;
  tool: string;
  message: string;
  data?: unknown;
}
