/**
 * MathTaxonomy-MCP: Record Classification Tools
 *
 * Single-record entry points over the heuristic classifier: full
 * classification with consensus merge, a domain decision trace, and the
 * heuristic-only attribute bundle.
 *
 * @module tools/classify
 * @see tests/classify-tools.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type {
  AttributeSet,
  ClassificationAudit,
  DomainMeta,
  Domain,
  DomainRanking,
  OverrideVerdict,
  RawRecord,
  ScoreBoard,
  ToolError,
} from '../types.js';
import type {
  ClassifyRecordInput,
  ExplainDomainInput,
  ExtractAttributesInput,
} from '../schemas.js';
import { createToolError, errorMessage } from '../utils.js';
import { getRuntimeConfig } from '../runtime-config.js';
import {
  classifyRecord as classifyWithSettings,
  explainDomain as explainWithSettings,
  type DomainExplanation,
} from '../classifier/pipeline.js';
import {
  countBranchSignals,
  countReusedBindings,
  extractAttributes as extractWithSettings,
  hasSelfRecursion,
} from '../classifier/extractors.js';
import type { DomainScoreTrace } from '../classifier/scorer.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface ClassifyRecordResult {
  success: true;
  /** The input record with math_structure filled in */
  record: RawRecord;
  audit: ClassificationAudit;
}

export interface ExplainDomainResult {
  success: true;
  domain: Domain;
  decision_reason: DomainMeta['decision_reason'];
  external: { raw: string | null; normalized: string | null };
  scores: ScoreBoard;
  ranking: DomainRanking;
  override: OverrideVerdict;
  margin_threshold: number;
  traces: DomainScoreTrace[];
  /** One line per decision step, in evaluation order */
  reasoning: string[];
}

export interface ExtractAttributesResult extends AttributeSet {
  success: true;
  signals: {
    if_count: number;
    elif_count: number;
    else_count: number;
    case_labels: number;
    self_recursion: boolean;
    reused_bindings: number;
  };
}

// ============================================================================
// Helpers
// ============================================================================

function describeDecision(
  explanation: DomainExplanation,
  threshold: number
): string[] {
  const { verdict, ranking, scores, decision } = explanation;
  const lines: string[] = [
    `Scores: ${Object.entries(scores).map(([d, s]) => `${d}=${s}`).join(', ')}`,
    `Heuristic best ${ranking.best} (${scores[ranking.best]}), second ${ranking.second} (${scores[ranking.second]}), margin ${ranking.margin}`,
  ];

  if (verdict.kind === 'forced') {
    lines.push(`Override ${verdict.rule} (priority ${verdict.priority}) forces ${verdict.domain}`);
  } else {
    lines.push('No hard override fired');
  }

  const external = explanation.external_normalized;
  lines.push(external === null
    ? `External label ${explanation.external_raw === null ? 'absent' : `"${explanation.external_raw}" has no canonical domain`}`
    : `External label normalized to ${external}`);

  lines.push(`Margin threshold ${threshold}; decision ${decision.domain} (${decision.meta.decision_reason})`);
  return lines;
}

// ============================================================================
// Tool Implementations
// ============================================================================

/**
 * Classify one record with the current settings snapshot
 *
 * @example
 * ```typescript
 * const result = await classifyRecord({
 *   record: { problem: { text: "Prove that for every positive integer n ..." } }
 * });
 * // result.audit.domain_meta.decision_reason === "external_missing_fallback"
 * ```
 */
export async function classifyRecord(input: ClassifyRecordInput): Promise<ClassifyRecordResult | ToolError> {
  try {
    const settings = getRuntimeConfig().withOverrides({ margin_threshold: input.margin_threshold });
    const { record, audit } = classifyWithSettings(input.record, settings);
    return { success: true, record, audit };
  } catch (err) {
    return createToolError('CONFIG_INVALID', `Classifier unavailable: ${errorMessage(err)}`, {
      recoverable: false,
      suggestion: 'Check data/patterns.json with mathtax_get_server_info',
    });
  }
}

/**
 * Explain how a record's domain was decided: per-rule scores, override and arbitration
 */
export async function explainDomain(input: ExplainDomainInput): Promise<ExplainDomainResult | ToolError> {
  try {
    const settings = getRuntimeConfig().withOverrides({ margin_threshold: input.margin_threshold });
    const explanation = explainWithSettings(input.record, settings);

    return {
      success: true,
      domain: explanation.decision.domain,
      decision_reason: explanation.decision.meta.decision_reason,
      external: { raw: explanation.external_raw, normalized: explanation.external_normalized },
      scores: explanation.scores,
      ranking: explanation.ranking,
      override: explanation.verdict,
      margin_threshold: settings.margin_threshold,
      traces: explanation.traces,
      reasoning: describeDecision(explanation, settings.margin_threshold),
    };
  } catch (err) {
    return createToolError('CONFIG_INVALID', `Classifier unavailable: ${errorMessage(err)}`, {
      recoverable: false,
    });
  }
}

/**
 * Heuristic attribute bundle for raw text and code, without consensus
 */
export async function extractAttributes(input: ExtractAttributesInput): Promise<ExtractAttributesResult | ToolError> {
  if (!input.text.trim() && !input.code.trim()) {
    return createToolError('EMPTY_CONTENT', 'Both text and code are empty', {
      recoverable: false,
      suggestion: 'Provide the problem statement, the solution program, or both',
    });
  }

  try {
    const settings = getRuntimeConfig().snapshot();
    const attributes = extractWithSettings({ text: input.text, code: input.code }, settings);
    const branch = countBranchSignals(input.code);

    return {
      success: true,
      ...attributes,
      signals: {
        ...branch,
        self_recursion: hasSelfRecursion(input.code),
        reused_bindings: countReusedBindings(input.code),
      },
    };
  } catch (err) {
    return createToolError('CONFIG_INVALID', `Classifier unavailable: ${errorMessage(err)}`, {
      recoverable: false,
    });
  }
}
