/**
 * MathTaxonomy-MCP: Pattern Registry
 *
 * Loads data/patterns.json, validates it, and compiles every pattern group
 * once into frozen RegExp tables shared by all detectors.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import {
  DOMAINS,
  OBJECT_LABELS,
  CONSTRAINT_LABELS,
  MECHANISM_LABELS,
  OUTPUT_TYPES,
  type Domain,
  type ObjectLabel,
  type ConstraintLabel,
  type MechanismLabel,
  type OutputType,
  type QuantifierLabel,
  type AuxiliaryConstruction,
  type ViewName,
} from "../types.js";

// ============================================================================
// Registry File Schema
// ============================================================================

const PatternListSchema = z.array(
  z.string().min(1).refine(isCompilable, { message: "Invalid regular expression" })
);

const VIEW_NAMES = ["text", "code", "plan", "context", "everything"] as const satisfies readonly ViewName[];

export const PENALTY_CONDITIONS = ["strong_nt", "strong_alg", "combinatorial_enumeration"] as const;
export type PenaltyCondition = typeof PENALTY_CONDITIONS[number];

const DomainPatternSetSchema = z.object({
  hard_override: z.object({
    patterns: PatternListSchema,
    min_matches: z.number().int().min(1),
  }),
  scoring_rules: z.array(z.object({
    name: z.string(),
    weight: z.number().int().positive(),
    view: z.enum(VIEW_NAMES),
    patterns: PatternListSchema,
  })),
  penalties: z.array(z.object({
    condition: z.enum(PENALTY_CONDITIONS),
    weight: z.number().int().negative(),
  })),
});

export const PatternFileSchema = z.object({
  version: z.string(),
  domains: z.object({
    number_theory: DomainPatternSetSchema,
    algebra: DomainPatternSetSchema,
    geometry: DomainPatternSetSchema,
    combinatorics: DomainPatternSetSchema,
  }),
  signals: z.object({
    combinatorics_hard_code: PatternListSchema,
    combinatorics_hard_text: PatternListSchema,
    combinatorial_enumeration_code: PatternListSchema,
  }),
  objects: z.array(z.object({ label: z.enum(OBJECT_LABELS), patterns: PatternListSchema })),
  constraints: z.array(z.object({ label: z.enum(CONSTRAINT_LABELS), patterns: PatternListSchema })),
  output_types: z.array(z.object({ label: z.enum(OUTPUT_TYPES), patterns: PatternListSchema })),
  mechanisms: z.object({
    text: z.array(z.object({ label: z.enum(MECHANISM_LABELS), patterns: PatternListSchema })),
    code: z.array(z.object({ label: z.enum(MECHANISM_LABELS), patterns: PatternListSchema })),
  }),
  triggers: z.object({
    constraints: z.object({ forall: PatternListSchema, exists: PatternListSchema }),
    output_type: z.object({
      proof: PatternListSchema,
      existence: PatternListSchema,
      non_existence: PatternListSchema,
      classification: PatternListSchema,
      maximum: PatternListSchema,
      minimum: PatternListSchema,
    }),
    auxiliary_construction: z.object({
      symbolic: PatternListSchema,
      structural: PatternListSchema,
    }),
  }),
  code: z.object({
    structural: PatternListSchema,
    trivial_names: z.array(z.string()),
  }),
});

export type PatternFile = z.infer<typeof PatternFileSchema>;

// ============================================================================
// Compiled Registry
// ============================================================================

export interface ScoringRule {
  readonly name: string;
  readonly weight: number;
  readonly view: ViewName;
  readonly patterns: readonly RegExp[];
}

export interface DomainPatternSet {
  readonly hard_override: {
    readonly patterns: readonly RegExp[];
    readonly min_matches: number;
  };
  readonly scoring_rules: readonly ScoringRule[];
  readonly penalties: readonly { readonly condition: PenaltyCondition; readonly weight: number }[];
}

export interface LabeledPatternGroup<L extends string> {
  readonly label: L;
  readonly patterns: readonly RegExp[];
}

export interface PatternRegistry {
  readonly version: string;
  readonly domains: Readonly<Record<Domain, DomainPatternSet>>;
  readonly signals: {
    readonly combinatorics_hard_code: readonly RegExp[];
    readonly combinatorics_hard_text: readonly RegExp[];
    readonly combinatorial_enumeration_code: readonly RegExp[];
  };
  readonly objects: readonly LabeledPatternGroup<ObjectLabel>[];
  readonly constraints: readonly LabeledPatternGroup<ConstraintLabel>[];
  readonly output_types: readonly LabeledPatternGroup<OutputType>[];
  readonly mechanisms: {
    readonly text: readonly LabeledPatternGroup<MechanismLabel>[];
    readonly code: readonly LabeledPatternGroup<MechanismLabel>[];
  };
  readonly triggers: {
    readonly constraints: Readonly<Record<QuantifierLabel, readonly RegExp[]>>;
    readonly output_type: Readonly<Record<Exclude<OutputType, "exact_value">, readonly RegExp[]>>;
    readonly auxiliary_construction: Readonly<Record<Exclude<AuxiliaryConstruction, "none">, readonly RegExp[]>>;
  };
  readonly code: {
    readonly structural: readonly RegExp[];
    readonly trivial_names: ReadonlySet<string>;
  };
}

function isCompilable(source: string): boolean {
  try {
    new RegExp(source, "i");
    return true;
  } catch {
    return false;
  }
}

/** Patterns are stateless: never compiled with the g or y flag */
function compile(patterns: readonly string[], flags = "i"): readonly RegExp[] {
  return Object.freeze(patterns.map(p => new RegExp(p, flags)));
}

function compileGroups<L extends string>(
  groups: ReadonlyArray<{ label: L; patterns: string[] }>
): readonly LabeledPatternGroup<L>[] {
  return Object.freeze(groups.map(g => Object.freeze({ label: g.label, patterns: compile(g.patterns) })));
}

function compileDomain(set: PatternFile["domains"][Domain]): DomainPatternSet {
  return Object.freeze({
    hard_override: Object.freeze({
      patterns: compile(set.hard_override.patterns),
      min_matches: set.hard_override.min_matches,
    }),
    scoring_rules: Object.freeze(set.scoring_rules.map(rule => Object.freeze({
      name: rule.name,
      weight: rule.weight,
      view: rule.view,
      patterns: compile(rule.patterns),
    }))),
    penalties: Object.freeze(set.penalties.map(p => Object.freeze({ ...p }))),
  });
}

/**
 * Compile a validated pattern file into the frozen registry
 */
export function compileRegistry(file: PatternFile): PatternRegistry {
  const domains: Record<Domain, DomainPatternSet> = {
    algebra: compileDomain(file.domains.algebra),
    number_theory: compileDomain(file.domains.number_theory),
    combinatorics: compileDomain(file.domains.combinatorics),
    geometry: compileDomain(file.domains.geometry),
  };

  const ot = file.triggers.output_type;
  const aux = file.triggers.auxiliary_construction;

  return Object.freeze({
    version: file.version,
    domains: Object.freeze(domains),
    signals: Object.freeze({
      combinatorics_hard_code: compile(file.signals.combinatorics_hard_code),
      combinatorics_hard_text: compile(file.signals.combinatorics_hard_text),
      combinatorial_enumeration_code: compile(file.signals.combinatorial_enumeration_code),
    }),
    objects: compileGroups(file.objects),
    constraints: compileGroups(file.constraints),
    output_types: compileGroups(file.output_types),
    mechanisms: Object.freeze({
      text: compileGroups(file.mechanisms.text),
      code: compileGroups(file.mechanisms.code),
    }),
    triggers: Object.freeze({
      constraints: Object.freeze({
        forall: compile(file.triggers.constraints.forall),
        exists: compile(file.triggers.constraints.exists),
      }),
      output_type: Object.freeze({
        proof: compile(ot.proof),
        existence: compile(ot.existence),
        non_existence: compile(ot.non_existence),
        classification: compile(ot.classification),
        maximum: compile(ot.maximum),
        minimum: compile(ot.minimum),
      }),
      auxiliary_construction: Object.freeze({
        symbolic: compile(aux.symbolic),
        structural: compile(aux.structural),
      }),
    }),
    code: Object.freeze({
      // Case-sensitive: `class`/`Counter` are identifiers, not prose
      structural: compile(file.code.structural, "m"),
      trivial_names: new Set(file.code.trivial_names),
    }),
  });
}

// ============================================================================
// Loading
// ============================================================================

export const PATTERNS_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../data/patterns.json"
);

/**
 * Read and validate a pattern file. Throws on unreadable or invalid data.
 */
export function loadPatternFile(filePath: string = PATTERNS_PATH): PatternFile {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  const parsed = PatternFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid pattern registry ${filePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

let cachedRegistry: PatternRegistry | null = null;

/**
 * Process-wide registry, compiled on first use
 */
export function getPatternRegistry(): PatternRegistry {
  if (!cachedRegistry) {
    cachedRegistry = compileRegistry(loadPatternFile());
  }
  return cachedRegistry;
}

export function registryCounts(registry: PatternRegistry): Record<string, number> {
  return {
    domains: DOMAINS.length,
    scoring_rules: DOMAINS.reduce((n, d) => n + registry.domains[d].scoring_rules.length, 0),
    object_groups: registry.objects.length,
    constraint_groups: registry.constraints.length,
    output_type_groups: registry.output_types.length,
    mechanism_groups: registry.mechanisms.text.length + registry.mechanisms.code.length,
  };
}

// ============================================================================
// Matching Helpers
// ============================================================================

/**
 * Check if text matches any pattern in a pattern array.
 */
export function matchesPatterns(text: string, patterns: readonly RegExp[]): boolean {
  return text.length > 0 && patterns.some(pattern => pattern.test(text));
}

/**
 * Count how many patterns match the given text.
 */
export function countPatternMatches(text: string, patterns: readonly RegExp[]): number {
  if (!text) return 0;
  return patterns.filter(pattern => pattern.test(text)).length;
}
