/**
 * MathTaxonomy-MCP: Consensus Merger
 *
 * Combines each heuristic attribute with the external annotation under a
 * fixed per-field policy and records provenance, confidence and
 * disagreement for every field.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import {
  AUXILIARY_CONSTRUCTIONS,
  MECHANISM_LABELS,
  OBJECT_LABELS,
  OUTPUT_TYPES,
  QUANTIFIER_LABELS,
  type AttributeField,
  type AttributeSet,
  type AuxiliaryConstruction,
  type ClassifierSettings,
  type Confidence,
  type ConsensusMeta,
  type ConsensusMetaEntry,
  type ConsensusOutcome,
  type ConstraintLabel,
  type ExternalAnnotation,
  type MathRecord,
  type OutputType,
  type SolutionAttributes,
  type TextAttributes,
} from "../types.js";
import { getPatternRegistry, matchesPatterns, type PatternRegistry } from "./registry.js";

// ============================================================================
// Policy Table
// ============================================================================

export type MergePolicy =
  | "heuristic_authoritative"
  | "guarded_fallback"
  | "union_with_cap"
  | "additive_quantifiers";

export const MERGE_POLICIES: Readonly<Record<AttributeField, MergePolicy>> = Object.freeze({
  reasoning_shape: "heuristic_authoritative",
  case_split: "heuristic_authoritative",
  reasoning_depth: "heuristic_authoritative",
  intermediate_reuse: "heuristic_authoritative",
  auxiliary_construction: "guarded_fallback",
  output_type: "guarded_fallback",
  objects: "union_with_cap",
  mechanisms: "union_with_cap",
  constraints: "additive_quantifiers",
});

const SOLUTION_DEFAULTS: Readonly<SolutionAttributes> = Object.freeze({
  reasoning_shape: "linear",
  case_split: "none",
  auxiliary_construction: "none",
  reasoning_depth: "shallow",
  intermediate_reuse: "none",
});

// ============================================================================
// External Annotation
// ============================================================================

function normalizeLabel(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const label = value.trim().toLowerCase();
  return label || null;
}

function normalizeLabelList(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  const labels = value
    .map(normalizeLabel)
    .filter((l): l is string => l !== null);
  return labels.length ? labels : null;
}

/**
 * Read the external annotation from math_structure. Anything malformed is "no opinion".
 */
export function readExternalAnnotation(record: MathRecord): ExternalAnnotation {
  const text: Record<string, unknown> = record.math_structure?.from_text ?? {};
  const solution: Record<string, unknown> = record.math_structure?.from_solution ?? {};
  return {
    domain: normalizeLabel(text.domain),
    objects: normalizeLabelList(text.objects),
    constraints: normalizeLabelList(text.constraints),
    mechanisms: normalizeLabelList(text.mechanisms),
    output_type: normalizeLabel(text.output_type),
    reasoning_shape: normalizeLabel(solution.reasoning_shape),
    case_split: normalizeLabel(solution.case_split),
    auxiliary_construction: normalizeLabel(solution.auxiliary_construction),
    reasoning_depth: normalizeLabel(solution.reasoning_depth),
    intermediate_reuse: normalizeLabel(solution.intermediate_reuse),
  };
}

// ============================================================================
// Policies
// ============================================================================

function inVocabulary<T extends string>(vocabulary: readonly T[], value: string): value is T {
  return vocabulary.some(v => v === value);
}

function sameSet(a: readonly string[], b: readonly string[]): boolean {
  const setA = new Set(a);
  const setB = new Set(b);
  return setA.size === setB.size && [...setA].every(v => setB.has(v));
}

export function mergeHeuristicAuthoritative<T extends string>(
  heuristic: T,
  external: string | null,
  defaultValue: T
): ConsensusOutcome<T> {
  return {
    value: heuristic,
    provenance: "heuristic",
    confidence: heuristic !== defaultValue ? "high" : "medium",
    disagreement: external !== null && external !== heuristic,
  };
}

export interface GuardedFallbackOptions<T extends string> {
  defaultValue: T;
  vocabulary: readonly T[];
  triggers: (value: T) => readonly RegExp[];
  rawText: string;
  heuristicConfidence: (value: T) => Confidence;
  fallbackConfidence: Confidence;
}

/**
 * Heuristic wins unless it is the default; then an external non-default value
 * is taken only when its trigger pattern appears in the problem text.
 */
export function mergeGuardedFallback<T extends string>(
  heuristic: T,
  external: string | null,
  options: GuardedFallbackOptions<T>
): ConsensusOutcome<T> {
  const disagreement = external !== null && external !== heuristic;

  if (heuristic !== options.defaultValue) {
    return {
      value: heuristic,
      provenance: "heuristic",
      confidence: options.heuristicConfidence(heuristic),
      disagreement,
    };
  }

  if (
    external !== null &&
    external !== options.defaultValue &&
    inVocabulary(options.vocabulary, external) &&
    matchesPatterns(options.rawText, options.triggers(external))
  ) {
    return {
      value: external,
      provenance: "external",
      confidence: options.fallbackConfidence,
      disagreement: true,
    };
  }

  return { value: heuristic, provenance: "heuristic", confidence: "medium", disagreement };
}

/**
 * Keep the heuristic list and append new in-vocabulary external labels up to the cap
 */
export function mergeUnionWithCap<T extends string>(
  heuristic: readonly T[],
  external: readonly string[] | null,
  vocabulary: readonly T[],
  cap: number
): ConsensusOutcome<T[]> {
  if (external === null) {
    return {
      value: [...heuristic],
      provenance: "heuristic",
      confidence: heuristic.length ? "high" : "low",
      disagreement: false,
    };
  }

  const merged = [...heuristic];
  for (const label of external) {
    if (merged.length >= cap) break;
    if (inVocabulary(vocabulary, label) && !merged.includes(label)) {
      merged.push(label);
    }
  }

  const extended = merged.length > heuristic.length;
  const disagreement = !sameSet(heuristic, external);

  // With no heuristic labels the external list is the only opinion, even when none of it survives
  if (heuristic.length === 0) {
    return { value: merged, provenance: "external", confidence: "low", disagreement };
  }
  if (extended) {
    return { value: merged, provenance: "merged", confidence: "medium", disagreement };
  }
  return {
    value: merged,
    provenance: "heuristic",
    confidence: heuristic.length ? "high" : "low",
    disagreement,
  };
}

/**
 * External constraints may only add a quantifier whose own trigger is in the text
 */
export function mergeAdditiveQuantifiers(
  heuristic: readonly ConstraintLabel[],
  external: readonly string[] | null,
  rawText: string,
  cap: number,
  registry: PatternRegistry = getPatternRegistry()
): ConsensusOutcome<ConstraintLabel[]> {
  const confidence: Confidence = heuristic.length ? "high" : "low";

  if (external === null) {
    return { value: [...heuristic], provenance: "heuristic", confidence, disagreement: false };
  }

  const merged: ConstraintLabel[] = [...heuristic];
  for (const label of external) {
    if (merged.length >= cap) break;
    if (
      inVocabulary(QUANTIFIER_LABELS, label) &&
      !merged.includes(label) &&
      matchesPatterns(rawText, registry.triggers.constraints[label])
    ) {
      merged.push(label);
    }
  }

  return {
    value: merged,
    provenance: merged.length > heuristic.length ? "merged" : "heuristic",
    confidence,
    disagreement: !sameSet(heuristic, external),
  };
}

// ============================================================================
// Record-level Merge
// ============================================================================

export interface MergedAttributes {
  from_text: TextAttributes;
  from_solution: SolutionAttributes;
  consensus_meta: ConsensusMeta;
}

function metaOf<T>(outcome: ConsensusOutcome<T>): ConsensusMetaEntry {
  return {
    source: outcome.provenance,
    confidence: outcome.confidence,
    disagreement: outcome.disagreement,
  };
}

/**
 * Merge the heuristic attribute bundle with the external annotation, field by field
 */
export function mergeAttributes(
  heuristic: AttributeSet,
  external: ExternalAnnotation,
  rawText: string,
  settings: Pick<ClassifierSettings, "caps" | "default_output_type">,
  registry: PatternRegistry = getPatternRegistry()
): MergedAttributes {
  const h = heuristic.from_solution;
  const t = heuristic.from_text;

  const reasoning_shape = mergeHeuristicAuthoritative(
    h.reasoning_shape, external.reasoning_shape, SOLUTION_DEFAULTS.reasoning_shape);
  const case_split = mergeHeuristicAuthoritative(
    h.case_split, external.case_split, SOLUTION_DEFAULTS.case_split);
  const reasoning_depth = mergeHeuristicAuthoritative(
    h.reasoning_depth, external.reasoning_depth, SOLUTION_DEFAULTS.reasoning_depth);
  const intermediate_reuse = mergeHeuristicAuthoritative(
    h.intermediate_reuse, external.intermediate_reuse, SOLUTION_DEFAULTS.intermediate_reuse);

  const auxiliary_construction = mergeGuardedFallback<AuxiliaryConstruction>(
    h.auxiliary_construction,
    external.auxiliary_construction,
    {
      defaultValue: SOLUTION_DEFAULTS.auxiliary_construction,
      vocabulary: AUXILIARY_CONSTRUCTIONS,
      triggers: value => value === "none" ? [] : registry.triggers.auxiliary_construction[value],
      rawText,
      heuristicConfidence: value => value === "structural" ? "high" : "medium",
      fallbackConfidence: "low",
    }
  );

  const output_type = mergeGuardedFallback<OutputType>(
    t.output_type,
    external.output_type,
    {
      defaultValue: settings.default_output_type,
      vocabulary: OUTPUT_TYPES,
      triggers: value => value === "exact_value" ? [] : registry.triggers.output_type[value],
      rawText,
      heuristicConfidence: () => "high",
      fallbackConfidence: "medium",
    }
  );

  const objects = mergeUnionWithCap(t.objects, external.objects, OBJECT_LABELS, settings.caps.objects);
  const mechanisms = mergeUnionWithCap(
    t.mechanisms, external.mechanisms, MECHANISM_LABELS, settings.caps.mechanisms);
  const constraints = mergeAdditiveQuantifiers(
    t.constraints, external.constraints, rawText, settings.caps.constraints, registry);

  return {
    from_text: {
      objects: objects.value,
      constraints: constraints.value,
      output_type: output_type.value,
      mechanisms: mechanisms.value,
    },
    from_solution: {
      reasoning_shape: reasoning_shape.value,
      case_split: case_split.value,
      auxiliary_construction: auxiliary_construction.value,
      reasoning_depth: reasoning_depth.value,
      intermediate_reuse: intermediate_reuse.value,
    },
    consensus_meta: {
      reasoning_shape: metaOf(reasoning_shape),
      case_split: metaOf(case_split),
      auxiliary_construction: metaOf(auxiliary_construction),
      reasoning_depth: metaOf(reasoning_depth),
      intermediate_reuse: metaOf(intermediate_reuse),
      objects: metaOf(objects),
      constraints: metaOf(constraints),
      mechanisms: metaOf(mechanisms),
      output_type: metaOf(output_type),
    },
  };
}
