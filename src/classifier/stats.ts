/**
 * MathTaxonomy-MCP: Batch Statistics
 *
 * Folds classified output records into disagreement, provenance, domain and
 * decision-reason counts. Works from the output records alone.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import {
  ATTRIBUTE_FIELDS,
  type AttributeField,
  type BatchStatistics,
  type Domain,
  type Provenance,
} from "../types.js";
import { isPlainObject, round } from "../utils.js";
import { isDomain, reasonBase } from "./decision.js";

function isProvenance(value: unknown): value is Provenance {
  return value === "heuristic" || value === "external" || value === "merged";
}

/** One value per attribute field */
export function perField<T>(init: () => T): Record<AttributeField, T> {
  return {
    reasoning_shape: init(),
    case_split: init(),
    auxiliary_construction: init(),
    reasoning_depth: init(),
    intermediate_reuse: init(),
    objects: init(),
    constraints: init(),
    mechanisms: init(),
    output_type: init(),
  };
}

/**
 * Incremental statistics fold for streaming batches
 */
export class StatisticsAccumulator {
  private total = 0;
  private disagreements = perField(() => 0);
  private sources = perField<Record<Provenance, number>>(() => ({ heuristic: 0, external: 0, merged: 0 }));
  private domains: Record<Domain, number> = { algebra: 0, number_theory: 0, combinatorics: 0, geometry: 0 };
  private reasons: Record<string, number> = {};

  /** Non-object values are not records and are left out of every count */
  add(record: unknown): void {
    if (!isPlainObject(record)) return;
    this.total++;
    const structure = record.math_structure;
    if (!isPlainObject(structure)) return;

    const domain = structure.domain;
    if (isDomain(domain)) {
      this.domains[domain]++;
    }

    const domainMeta = structure.domain_meta;
    const reason = isPlainObject(domainMeta) ? domainMeta.decision_reason : undefined;
    if (typeof reason === "string") {
      const base = reasonBase(reason);
      this.reasons[base] = (this.reasons[base] ?? 0) + 1;
    }

    const meta = structure.consensus_meta;
    if (!isPlainObject(meta)) return;
    for (const field of ATTRIBUTE_FIELDS) {
      const entry = meta[field];
      if (!isPlainObject(entry)) continue;
      const source = entry.source;
      if (entry.disagreement === true) this.disagreements[field]++;
      if (isProvenance(source)) this.sources[field][source]++;
    }
  }

  result(): BatchStatistics {
    const total = this.total;
    const rates = perField(() => 0);
    for (const field of ATTRIBUTE_FIELDS) {
      rates[field] = total ? round(this.disagreements[field] / total, 4) : 0;
    }

    const reasons: Record<string, number> = {};
    for (const key of Object.keys(this.reasons).sort()) {
      reasons[key] = this.reasons[key];
    }

    return {
      total_records: total,
      disagreement_counts: { ...this.disagreements },
      disagreement_rates: rates,
      source_counts: this.copySources(),
      domain_counts: { ...this.domains },
      decision_reason_counts: reasons,
    };
  }

  private copySources(): Record<AttributeField, Record<Provenance, number>> {
    const copy = perField<Record<Provenance, number>>(() => ({ heuristic: 0, external: 0, merged: 0 }));
    for (const field of ATTRIBUTE_FIELDS) {
      copy[field] = { ...this.sources[field] };
    }
    return copy;
  }
}

/**
 * Fold a batch of classified output records into aggregate statistics
 */
export function foldStatistics(records: Iterable<unknown>): BatchStatistics {
  const acc = new StatisticsAccumulator();
  for (const record of records) acc.add(record);
  return acc.result();
}
