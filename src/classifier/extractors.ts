/**
 * MathTaxonomy-MCP: Attribute Extractors
 *
 * Stateless rule-based detectors. Text detectors read the problem
 * statement; solution detectors read the program's line structure.
 * Empty input yields each detector's default.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type {
  AttributeSet,
  AuxiliaryConstruction,
  CaseSplit,
  ClassifierSettings,
  ConstraintLabel,
  FieldView,
  IntermediateReuse,
  MechanismLabel,
  ObjectLabel,
  OutputType,
  ReasoningDepth,
  ReasoningShape,
  SolutionAttributes,
  TextAttributes,
} from "../types.js";
import { splitLines } from "../utils.js";
import {
  getPatternRegistry,
  matchesPatterns,
  type LabeledPatternGroup,
  type PatternRegistry,
} from "./registry.js";

// ============================================================================
// Code Shape Patterns (case-sensitive, applied per line)
// ============================================================================

const IF_LINE = /^\s*if\s+/;
const ELIF_LINE = /^\s*elif\s+/;
const ELSE_LINE = /^\s*else\s*:/;
const DEF_LINE = /^(\s*)def\s+([A-Za-z_]\w*)\s*\(/;
const ASSIGNMENT_LINE = /^\s*([a-zA-Z_]\w*)\s*=(?!=)/;

const STEP_PATTERNS: readonly RegExp[] = [
  /^\s*[a-zA-Z_]\w*\s*[+\-*/]?=/,
  IF_LINE,
  ELIF_LINE,
  /^\s*for\s+/,
  /^\s*while\s+/,
  /^\s*return\b/,
];

const INDENT_WIDTH = 4;

// ============================================================================
// Code Structure Helpers
// ============================================================================

export interface BranchSignals {
  if_count: number;
  elif_count: number;
  else_count: number;
  case_labels: number;
}

function countLines(lines: readonly string[], pattern: RegExp): number {
  return lines.filter(line => pattern.test(line)).length;
}

/**
 * Distinct numbers appearing in "Case <n>" / "case <n>" labels
 */
export function distinctCaseLabels(code: string): number {
  const labels = new Set<string>();
  for (const match of code.matchAll(/\b[Cc]ase\s+(\d+)/g)) {
    labels.add(match[1]);
  }
  return labels.size;
}

export function countBranchSignals(code: string): BranchSignals {
  const lines = splitLines(code);
  return {
    if_count: countLines(lines, IF_LINE),
    elif_count: countLines(lines, ELIF_LINE),
    else_count: countLines(lines, ELSE_LINE),
    case_labels: distinctCaseLabels(code),
  };
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * True when a defined function calls itself inside its own body
 * (on the header line or in the indented block below it).
 */
export function hasSelfRecursion(code: string): boolean {
  const lines = splitLines(code);

  for (let i = 0; i < lines.length; i++) {
    const header = DEF_LINE.exec(lines[i]);
    if (!header) continue;

    const defIndent = header[1].length;
    const selfCall = new RegExp(`\\b${header[2]}\\s*\\(`);

    if (selfCall.test(lines[i].slice(header[0].length))) return true;

    for (let j = i + 1; j < lines.length; j++) {
      const line = lines[j];
      if (!line.trim()) continue;
      if (indentOf(line) <= defIndent) break;
      if (selfCall.test(line)) return true;
    }
  }
  return false;
}

/** Case analysis in code: two or more elif branches, or three or more case labels */
export function hasCodeCaseAnalysis(code: string): boolean {
  const signals = countBranchSignals(code);
  return signals.elif_count >= 2 || signals.case_labels >= 3;
}

/** Names bound by simple assignment, one entry per binding line */
function assignmentBindings(lines: readonly string[]): Array<{ name: string; line: number }> {
  const bindings: Array<{ name: string; line: number }> = [];
  lines.forEach((line, idx) => {
    const m = ASSIGNMENT_LINE.exec(line);
    if (m) bindings.push({ name: m[1], line: idx });
  });
  return bindings;
}

function pickLabels<L extends string>(text: string, groups: readonly LabeledPatternGroup<L>[]): L[] {
  if (!text) return [];
  return groups.filter(g => matchesPatterns(text, g.patterns)).map(g => g.label);
}

// ============================================================================
// Text Detectors
// ============================================================================

export function extractObjects(
  text: string,
  cap = 3,
  registry: PatternRegistry = getPatternRegistry()
): ObjectLabel[] {
  const labels = pickLabels(text, registry.objects);
  const subsumed = labels.includes("positive_integer")
    ? labels.filter(l => l !== "integer")
    : labels;
  return subsumed.slice(0, cap);
}

export function extractConstraints(
  text: string,
  cap = 4,
  registry: PatternRegistry = getPatternRegistry()
): ConstraintLabel[] {
  return pickLabels(text, registry.constraints).slice(0, cap);
}

/**
 * First output category whose patterns match; the default when none does
 */
export function extractOutputType(
  text: string,
  fallback: OutputType = "exact_value",
  registry: PatternRegistry = getPatternRegistry()
): OutputType {
  if (!text) return fallback;
  const hit = registry.output_types.find(g => matchesPatterns(text, g.patterns));
  return hit ? hit.label : fallback;
}

export function extractMechanisms(
  text: string,
  code: string,
  cap = 3,
  registry: PatternRegistry = getPatternRegistry()
): MechanismLabel[] {
  const detected: MechanismLabel[] = [
    ...pickLabels(text, registry.mechanisms.text),
    ...pickLabels(code, registry.mechanisms.code),
  ];
  if (hasSelfRecursion(code)) detected.push("induction");
  if (hasCodeCaseAnalysis(code)) detected.push("case_analysis");

  return [...new Set(detected)].slice(0, cap);
}

// ============================================================================
// Solution Detectors
// ============================================================================

export function extractReasoningShape(code: string): ReasoningShape {
  if (!code) return "linear";
  const s = countBranchSignals(code);
  // A single if/else is ordinary control flow, not branching reasoning
  if (s.elif_count + s.case_labels >= 1 || (s.if_count >= 2 && s.else_count >= 2)) {
    return "branching";
  }
  return "linear";
}

export function extractCaseSplit(code: string): CaseSplit {
  if (!code) return "none";
  const s = countBranchSignals(code);
  if (s.case_labels >= 3 || s.elif_count >= 2) return "multi";
  if (s.case_labels === 2 || s.elif_count === 1) return "binary";
  if (s.if_count >= 1 && s.else_count >= 1 && s.elif_count === 0) return "binary";
  return "none";
}

export function extractAuxiliaryConstruction(
  code: string,
  registry: PatternRegistry = getPatternRegistry()
): AuxiliaryConstruction {
  if (!code) return "none";
  if (matchesPatterns(code, registry.code.structural)) return "structural";

  const meaningful = assignmentBindings(splitLines(code))
    .filter(b => !registry.code.trivial_names.has(b.name));
  return meaningful.length >= 3 ? "symbolic" : "none";
}

export function extractReasoningDepth(code: string): ReasoningDepth {
  if (!code) return "shallow";
  const lines = splitLines(code);

  const steps = STEP_PATTERNS.reduce((sum, p) => sum + countLines(lines, p), 0);
  const nesting = lines
    .filter(line => line.trim().length > 0)
    .reduce((max, line) => Math.max(max, Math.floor(indentOf(line) / INDENT_WIDTH)), 0);

  if (steps <= 8 && nesting <= 2) return "shallow";
  if (steps >= 25 || nesting >= 5) return "deep";
  return "medium";
}

/**
 * Count non-trivial bindings that a later line reads before the name is bound again
 */
export function countReusedBindings(
  code: string,
  registry: PatternRegistry = getPatternRegistry()
): number {
  const lines = splitLines(code);
  let reused = 0;

  for (const binding of assignmentBindings(lines)) {
    if (registry.code.trivial_names.has(binding.name)) continue;
    const reference = new RegExp(`\\b${binding.name}\\b`);
    const rebind = new RegExp(`^\\s*${binding.name}\\s*=(?!=)`);

    for (let j = binding.line + 1; j < lines.length; j++) {
      if (rebind.test(lines[j])) break;
      if (reference.test(lines[j])) {
        reused++;
        break;
      }
    }
  }
  return reused;
}

export function extractIntermediateReuse(
  code: string,
  registry: PatternRegistry = getPatternRegistry()
): IntermediateReuse {
  if (!code) return "none";
  const reused = countReusedBindings(code, registry);
  if (reused >= 3) return "multiple";
  if (reused >= 1) return "single";
  return "none";
}

// ============================================================================
// Bundles
// ============================================================================

export type ExtractionSettings = Pick<ClassifierSettings, "caps" | "default_output_type">;

export function extractTextAttributes(
  view: Pick<FieldView, "text" | "code">,
  settings: ExtractionSettings,
  registry: PatternRegistry = getPatternRegistry()
): TextAttributes {
  return {
    objects: extractObjects(view.text, settings.caps.objects, registry),
    constraints: extractConstraints(view.text, settings.caps.constraints, registry),
    output_type: extractOutputType(view.text, settings.default_output_type, registry),
    mechanisms: extractMechanisms(view.text, view.code, settings.caps.mechanisms, registry),
  };
}

export function extractSolutionAttributes(
  code: string,
  registry: PatternRegistry = getPatternRegistry()
): SolutionAttributes {
  return {
    reasoning_shape: extractReasoningShape(code),
    case_split: extractCaseSplit(code),
    auxiliary_construction: extractAuxiliaryConstruction(code, registry),
    reasoning_depth: extractReasoningDepth(code),
    intermediate_reuse: extractIntermediateReuse(code, registry),
  };
}

export function extractAttributes(
  view: Pick<FieldView, "text" | "code">,
  settings: ExtractionSettings,
  registry: PatternRegistry = getPatternRegistry()
): AttributeSet {
  return {
    from_text: extractTextAttributes(view, settings, registry),
    from_solution: extractSolutionAttributes(view.code, registry),
  };
}
