/**
 * MathTaxonomy-MCP: Domain Scorer
 *
 * Weighted pattern-rule scoring of a record against each domain hypothesis.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { DOMAINS, type Domain, type DomainRanking, type FieldView, type ScoreBoard } from "../types.js";
import {
  getPatternRegistry,
  matchesPatterns,
  type PatternRegistry,
  type PenaltyCondition,
} from "./registry.js";

// ============================================================================
// Types
// ============================================================================

export interface RuleTrace {
  name: string;
  view: string;
  weight: number;
  matched: boolean;
}

export interface PenaltyTrace {
  condition: PenaltyCondition;
  weight: number;
  applied: boolean;
}

export interface DomainScoreTrace {
  domain: Domain;
  raw_score: number;
  score: number;
  rules: RuleTrace[];
  penalties: PenaltyTrace[];
}

// ============================================================================
// Penalty Conditions
// ============================================================================

export function hasStrongNumberTheorySignal(view: FieldView, registry: PatternRegistry): boolean {
  return matchesPatterns(view.everything, registry.domains.number_theory.hard_override.patterns);
}

export function hasStrongAlgebraSignal(view: FieldView, registry: PatternRegistry): boolean {
  return matchesPatterns(view.everything, registry.domains.algebra.hard_override.patterns);
}

/**
 * Enumeration-style code (itertools, subsets, bitmasks) without number-theory tokens
 */
export function hasCombinatorialEnumeration(view: FieldView, registry: PatternRegistry): boolean {
  return matchesPatterns(view.code, registry.signals.combinatorial_enumeration_code)
    && !hasStrongNumberTheorySignal(view, registry);
}

const PENALTY_DETECTORS: Record<PenaltyCondition, (view: FieldView, registry: PatternRegistry) => boolean> = {
  strong_nt: hasStrongNumberTheorySignal,
  strong_alg: hasStrongAlgebraSignal,
  combinatorial_enumeration: hasCombinatorialEnumeration,
};

// ============================================================================
// Scoring
// ============================================================================

/**
 * Score one domain with its full rule-by-rule trace.
 * Each rule adds its weight once when any pattern matches its view.
 */
export function traceDomainScore(
  domain: Domain,
  view: FieldView,
  registry: PatternRegistry = getPatternRegistry()
): DomainScoreTrace {
  const set = registry.domains[domain];

  const rules = set.scoring_rules.map(rule => ({
    name: rule.name,
    view: rule.view,
    weight: rule.weight,
    matched: matchesPatterns(view[rule.view], rule.patterns),
  }));

  const penalties = set.penalties.map(p => ({
    condition: p.condition,
    weight: p.weight,
    applied: PENALTY_DETECTORS[p.condition](view, registry),
  }));

  const raw_score =
    rules.reduce((sum, r) => sum + (r.matched ? r.weight : 0), 0) +
    penalties.reduce((sum, p) => sum + (p.applied ? p.weight : 0), 0);

  return {
    domain,
    raw_score,
    score: Math.max(0, raw_score),
    rules,
    penalties,
  };
}

export function scoreDomain(
  domain: Domain,
  view: FieldView,
  registry: PatternRegistry = getPatternRegistry()
): number {
  return traceDomainScore(domain, view, registry).score;
}

export function scoreAllDomains(
  view: FieldView,
  registry: PatternRegistry = getPatternRegistry()
): ScoreBoard {
  return {
    algebra: scoreDomain("algebra", view, registry),
    number_theory: scoreDomain("number_theory", view, registry),
    combinatorics: scoreDomain("combinatorics", view, registry),
    geometry: scoreDomain("geometry", view, registry),
  };
}

/**
 * Order domains by (score desc, name asc) and report the best, runner-up and margin
 */
export function rankDomains(scores: ScoreBoard): DomainRanking {
  const [best, second] = [...DOMAINS].sort(
    (a, b) => scores[b] - scores[a] || a.localeCompare(b)
  );
  return {
    best,
    second,
    margin: scores[best] - scores[second],
  };
}
