/**
 * MathTaxonomy-MCP: Override Resolver
 *
 * Priority-ordered hard overrides. Rules are evaluated in order and the
 * first one that fires forces the domain.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { Domain, FieldView, OverrideVerdict } from "../types.js";
import {
  countPatternMatches,
  getPatternRegistry,
  matchesPatterns,
  type PatternRegistry,
} from "./registry.js";
import { hasStrongAlgebraSignal, hasStrongNumberTheorySignal } from "./scorer.js";

export interface OverrideRule {
  readonly name: string;
  readonly domain: Domain;
  readonly priority: number;
  readonly fires: (view: FieldView, registry: PatternRegistry) => boolean;
}

/**
 * Number of distinct geometry hard-override patterns found in the problem text
 */
export function geometryMatchCount(view: FieldView, registry: PatternRegistry): number {
  return countPatternMatches(view.text, registry.domains.geometry.hard_override.patterns);
}

function geometryDominates(view: FieldView, registry: PatternRegistry): boolean {
  return geometryMatchCount(view, registry) >= registry.domains.geometry.hard_override.min_matches;
}

export const OVERRIDE_RULES: readonly OverrideRule[] = Object.freeze([
  {
    name: "geometry_text_tokens",
    domain: "geometry",
    priority: 1,
    fires: geometryDominates,
  },
  {
    name: "number_theory_tokens",
    domain: "number_theory",
    priority: 2,
    fires: (view, registry) =>
      hasStrongNumberTheorySignal(view, registry) && !geometryDominates(view, registry),
  },
  {
    name: "algebra_tokens",
    domain: "algebra",
    priority: 3,
    fires: (view, registry) =>
      hasStrongAlgebraSignal(view, registry) && !hasStrongNumberTheorySignal(view, registry),
  },
  {
    name: "combinatorics_code_and_text",
    domain: "combinatorics",
    priority: 4,
    fires: (view, registry) =>
      matchesPatterns(view.code, registry.signals.combinatorics_hard_code) &&
      matchesPatterns(view.text, registry.signals.combinatorics_hard_text) &&
      !hasStrongNumberTheorySignal(view, registry) &&
      !hasStrongAlgebraSignal(view, registry),
  },
] satisfies OverrideRule[]);

/**
 * First override rule that fires, or "none"
 */
export function resolveOverride(
  view: FieldView,
  registry: PatternRegistry = getPatternRegistry(),
  rules: readonly OverrideRule[] = OVERRIDE_RULES
): OverrideVerdict {
  for (const rule of rules) {
    if (rule.fires(view, registry)) {
      return { kind: "forced", domain: rule.domain, rule: rule.name, priority: rule.priority };
    }
  }
  return { kind: "none" };
}
