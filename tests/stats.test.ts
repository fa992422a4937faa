/**
 * Batch Statistics Tests
 *
 * Contract for folding classified output records into aggregate counts.
 * Statistics are computed from the output records alone. Values that are not
 * JSON objects are ignored; objects without audit data count toward the total.
 */

import { describe, it, expect } from 'vitest';
import { foldStatistics, StatisticsAccumulator } from '../src/classifier/stats.js';

const RECORDS: unknown[] = [
  {
    math_structure: {
      domain: 'geometry',
      domain_meta: { decision_reason: 'hard_override' },
      consensus_meta: {
        objects: { source: 'merged', confidence: 'medium', disagreement: true },
        output_type: { source: 'heuristic', confidence: 'high', disagreement: false },
      },
    },
  },
  {
    math_structure: {
      domain: 'algebra',
      domain_meta: { decision_reason: 'heuristic_override:margin=7' },
      consensus_meta: {
        objects: { source: 'external', confidence: 'low', disagreement: true },
      },
    },
  },
  'not a record',
  { math_structure: { domain: 'topology' } },
];

describe('foldStatistics', () => {
  it('returns zeroed statistics for no records', () => {
    const stats = foldStatistics([]);
    expect(stats.total_records).toBe(0);
    expect(stats.disagreement_rates.objects).toBe(0);
    expect(stats.domain_counts).toEqual({ algebra: 0, number_theory: 0, combinatorics: 0, geometry: 0 });
    expect(stats.decision_reason_counts).toEqual({});
  });

  it('counts disagreements, provenance, domains and reasons', () => {
    const stats = foldStatistics(RECORDS);

    expect(stats.total_records).toBe(3);
    expect(stats.disagreement_counts.objects).toBe(2);
    expect(stats.disagreement_rates.objects).toBe(0.6667);
    expect(stats.disagreement_counts.output_type).toBe(0);
    expect(stats.source_counts.objects).toEqual({ heuristic: 0, external: 1, merged: 1 });
    expect(stats.source_counts.output_type).toEqual({ heuristic: 1, external: 0, merged: 0 });
    expect(stats.domain_counts).toEqual({ algebra: 1, number_theory: 0, combinatorics: 0, geometry: 1 });
  });

  it('aggregates decision reasons without the margin suffix, sorted by key', () => {
    const stats = foldStatistics(RECORDS);
    expect(Object.entries(stats.decision_reason_counts)).toEqual([
      ['hard_override', 1],
      ['heuristic_override', 1],
    ]);
  });

  it('leaves non-object values out of the total and the rates', () => {
    const stats = foldStatistics(RECORDS.slice(0, 3));
    expect(stats.total_records).toBe(2);
    expect(stats.disagreement_rates.objects).toBe(1);
    expect(stats.disagreement_rates.output_type).toBe(0);
  });
});

describe('StatisticsAccumulator', () => {
  it('matches a one-shot fold', () => {
    const acc = new StatisticsAccumulator();
    for (const record of RECORDS) acc.add(record);
    expect(acc.result()).toEqual(foldStatistics(RECORDS));
  });

  it('returns copies that later additions do not change', () => {
    const acc = new StatisticsAccumulator();
    acc.add(RECORDS[0]);
    const first = acc.result();
    acc.add(RECORDS[1]);
    expect(first.source_counts.objects).toEqual({ heuristic: 0, external: 0, merged: 1 });
    expect(first.total_records).toBe(1);
  });
});
