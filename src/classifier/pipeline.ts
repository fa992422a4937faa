/**
 * MathTaxonomy-MCP: Record Pipeline
 *
 * Field projection -> scoring + overrides -> domain decision ->
 * attribute extraction -> consensus merge -> output record.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { DEFAULT_CLASSIFIER_SETTINGS } from "../schemas.js";
import {
  DOMAINS,
  type ClassifiedRecord,
  type ClassifierSettings,
  type DomainDecision,
  type DomainRanking,
  type FieldView,
  type OverrideVerdict,
  type RawRecord,
  type ScoreBoard,
} from "../types.js";
import { isPlainObject } from "../utils.js";
import { mergeAttributes, readExternalAnnotation } from "./consensus.js";
import { decideDomain, normalizeExternalDomain } from "./decision.js";
import { extractAttributes } from "./extractors.js";
import { parseRecord, projectFields } from "./fields.js";
import { resolveOverride } from "./overrides.js";
import { getPatternRegistry, type PatternRegistry } from "./registry.js";
import { rankDomains, scoreAllDomains, traceDomainScore, type DomainScoreTrace } from "./scorer.js";

function asObject(value: unknown): Record<string, unknown> {
  return isPlainObject(value) ? value : {};
}

export interface DomainExplanation {
  view: FieldView;
  traces: DomainScoreTrace[];
  scores: ScoreBoard;
  ranking: DomainRanking;
  verdict: OverrideVerdict;
  external_raw: string | null;
  external_normalized: string | null;
  decision: DomainDecision;
}

/**
 * Full domain decision trace for one record
 */
export function explainDomain(
  raw: unknown,
  settings: ClassifierSettings = DEFAULT_CLASSIFIER_SETTINGS,
  registry: PatternRegistry = getPatternRegistry()
): DomainExplanation {
  const record = parseRecord(raw);
  const view = projectFields(record);
  const external = readExternalAnnotation(record);

  const traces = DOMAINS.map(domain => traceDomainScore(domain, view, registry));
  const scores = scoreAllDomains(view, registry);
  const ranking = rankDomains(scores);
  const verdict = resolveOverride(view, registry);
  const normalized = normalizeExternalDomain(external.domain, settings.domain_synonyms);

  return {
    view,
    traces,
    scores,
    ranking,
    verdict,
    external_raw: external.domain,
    external_normalized: normalized,
    decision: decideDomain({ scores, ranking, verdict, external: normalized, settings }),
  };
}

/**
 * Classify one record. The input is left untouched; the returned record is a
 * copy whose math_structure carries the domain, merged attributes and audit.
 */
export function classifyRecord(
  raw: unknown,
  settings: ClassifierSettings = DEFAULT_CLASSIFIER_SETTINGS,
  registry: PatternRegistry = getPatternRegistry()
): ClassifiedRecord {
  const source: RawRecord = isPlainObject(raw) ? raw : {};
  const record = parseRecord(source);
  const view = projectFields(record);
  const external = readExternalAnnotation(record);

  const scores = scoreAllDomains(view, registry);
  const ranking = rankDomains(scores);
  const verdict = resolveOverride(view, registry);
  const decision = decideDomain({
    scores,
    ranking,
    verdict,
    external: normalizeExternalDomain(external.domain, settings.domain_synonyms),
    settings,
  });

  const heuristic = extractAttributes(view, settings, registry);
  const merged = mergeAttributes(heuristic, external, view.text, settings, registry);

  const rawStructure = asObject(source.math_structure);
  const rawFromText = asObject(rawStructure.from_text);
  const rawFromSolution = asObject(rawStructure.from_solution);

  return {
    record: {
      ...source,
      math_structure: {
        ...rawStructure,
        domain: decision.domain,
        domain_meta: decision.meta,
        from_text: { ...rawFromText, ...merged.from_text },
        from_solution: { ...rawFromSolution, ...merged.from_solution },
        consensus_meta: merged.consensus_meta,
      },
    },
    audit: {
      domain: decision.domain,
      domain_meta: decision.meta,
      consensus_meta: merged.consensus_meta,
    },
  };
}
