/**
 * MathTaxonomy-MCP: Domain Decision Engine
 *
 * Arbitrates between the heuristic ranking, hard overrides and an external
 * domain label, and records the full decision audit.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import {
  DOMAINS,
  type ClassifierSettings,
  type DecisionReason,
  type Domain,
  type DomainDecision,
  type DomainRanking,
  type OverrideVerdict,
  type ScoreBoard,
} from "../types.js";

export function isDomain(value: unknown): value is Domain {
  return typeof value === "string" && DOMAINS.some(d => d === value);
}

/**
 * Normalize an external domain label: trimmed, lower-cased, then either a
 * canonical domain, a synonym target, or null for "no opinion".
 */
export function normalizeExternalDomain(
  raw: unknown,
  synonyms: ClassifierSettings["domain_synonyms"]
): string | null {
  if (typeof raw !== "string") return null;
  const label = raw.trim().toLowerCase();
  if (!label) return null;
  if (isDomain(label)) return label;
  return Object.prototype.hasOwnProperty.call(synonyms, label) ? synonyms[label] ?? null : null;
}

export interface DecisionInput {
  scores: ScoreBoard;
  ranking: DomainRanking;
  verdict: OverrideVerdict;
  external: string | null;
  settings: Pick<ClassifierSettings, "margin_threshold" | "fallback_domain">;
}

function choose(input: DecisionInput): { domain: string; reason: DecisionReason } {
  const { scores, ranking, verdict, external, settings } = input;

  if (verdict.kind === "forced") {
    return { domain: verdict.domain, reason: "hard_override" };
  }
  if (external === null) {
    const domain = scores[ranking.best] > 0 ? ranking.best : settings.fallback_domain;
    return { domain, reason: "external_missing_fallback" };
  }
  if (external === ranking.best) {
    return { domain: external, reason: "agree" };
  }
  if (ranking.margin >= settings.margin_threshold) {
    return { domain: ranking.best, reason: `heuristic_override:margin=${ranking.margin}` };
  }
  return { domain: external, reason: "external_default" };
}

/**
 * Resolve the record's domain. The result always lies in the domain vocabulary.
 */
export function decideDomain(input: DecisionInput): DomainDecision {
  const chosen = choose(input);

  let domain: Domain;
  let reason = chosen.reason;
  if (isDomain(chosen.domain)) {
    domain = chosen.domain;
  } else {
    domain = isDomain(input.external) ? input.external : input.settings.fallback_domain;
    reason = "fallback_to_allowed";
  }

  return {
    domain,
    meta: {
      external_domain: input.external,
      heur_scores: { ...input.scores },
      heur_best: input.ranking.best,
      heur_second: input.ranking.second,
      heur_margin: input.ranking.margin,
      forced_domain: input.verdict.kind === "forced" ? input.verdict.domain : null,
      decision_reason: reason,
    },
  };
}

/**
 * Strip the margin suffix from a decision reason for aggregation
 */
export function reasonBase(reason: string): string {
  const idx = reason.indexOf(":");
  return idx === -1 ? reason : reason.slice(0, idx);
}
