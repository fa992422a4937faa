/**
 * Consensus Merger Tests
 *
 * Contract for combining heuristic attributes with an external annotation:
 * - heuristic_authoritative: solution shape fields keep the heuristic value
 * - guarded_fallback: an external value replaces a default heuristic only
 *   when its trigger appears in the problem text
 * - union_with_cap: lists gain in-vocabulary external labels up to the cap
 * - additive_quantifiers: constraints gain only text-supported quantifiers
 */

import { describe, it, expect } from 'vitest';
import {
  MERGE_POLICIES,
  mergeAdditiveQuantifiers,
  mergeAttributes,
  mergeHeuristicAuthoritative,
  mergeUnionWithCap,
  readExternalAnnotation,
} from '../src/classifier/consensus.js';
import { parseRecord } from '../src/classifier/fields.js';
import { DEFAULT_CLASSIFIER_SETTINGS } from '../src/schemas.js';
import { ATTRIBUTE_FIELDS, OBJECT_LABELS } from '../src/types.js';
import type { AttributeSet, ExternalAnnotation } from '../src/types.js';

// ============================================================================
// Test Helpers
// ============================================================================

function annotation(overrides: Partial<ExternalAnnotation> = {}): ExternalAnnotation {
  return {
    domain: null,
    objects: null,
    constraints: null,
    mechanisms: null,
    output_type: null,
    reasoning_shape: null,
    case_split: null,
    auxiliary_construction: null,
    reasoning_depth: null,
    intermediate_reuse: null,
    ...overrides,
  };
}

function defaultHeuristic(): AttributeSet {
  return {
    from_text: { objects: [], constraints: [], output_type: 'exact_value', mechanisms: [] },
    from_solution: {
      reasoning_shape: 'linear',
      case_split: 'none',
      auxiliary_construction: 'none',
      reasoning_depth: 'shallow',
      intermediate_reuse: 'none',
    },
  };
}

// ============================================================================
// External Annotation
// ============================================================================

describe('readExternalAnnotation', () => {
  it('normalizes labels and drops malformed values', () => {
    const record = parseRecord({
      math_structure: {
        from_text: { domain: ' Algebra ', objects: ['Integer', 3, ''], output_type: '' },
        from_solution: { case_split: 'BINARY', reasoning_depth: 7 },
      },
    });
    expect(readExternalAnnotation(record)).toEqual(annotation({
      domain: 'algebra',
      objects: ['integer'],
      case_split: 'binary',
    }));
  });

  it('reads no opinion from a record without math_structure', () => {
    expect(readExternalAnnotation(parseRecord({}))).toEqual(annotation());
  });
});

// ============================================================================
// Policies
// ============================================================================

describe('mergeHeuristicAuthoritative', () => {
  it('keeps the heuristic value and flags disagreement', () => {
    expect(mergeHeuristicAuthoritative('branching', null, 'linear')).toEqual({
      value: 'branching',
      provenance: 'heuristic',
      confidence: 'high',
      disagreement: false,
    });
    expect(mergeHeuristicAuthoritative('linear', 'branching', 'linear')).toEqual({
      value: 'linear',
      provenance: 'heuristic',
      confidence: 'medium',
      disagreement: true,
    });
  });
});

describe('mergeUnionWithCap', () => {
  it('reports heuristic provenance without an external list', () => {
    expect(mergeUnionWithCap(['integer'], null, OBJECT_LABELS, 3)).toEqual({
      value: ['integer'],
      provenance: 'heuristic',
      confidence: 'high',
      disagreement: false,
    });
    expect(mergeUnionWithCap([], null, OBJECT_LABELS, 3).confidence).toBe('low');
  });

  it('appends new in-vocabulary labels', () => {
    expect(mergeUnionWithCap(['integer'], ['real', 'bogus', 'integer'], OBJECT_LABELS, 3)).toEqual({
      value: ['integer', 'real'],
      provenance: 'merged',
      confidence: 'medium',
      disagreement: true,
    });
  });

  it('takes external labels when the heuristic found none', () => {
    expect(mergeUnionWithCap([], ['real'], OBJECT_LABELS, 3)).toEqual({
      value: ['real'],
      provenance: 'external',
      confidence: 'low',
      disagreement: true,
    });
  });

  it('attributes an empty result to the external list when it offered only unknown labels', () => {
    expect(mergeUnionWithCap([], ['bogus'], OBJECT_LABELS, 3)).toEqual({
      value: [],
      provenance: 'external',
      confidence: 'low',
      disagreement: true,
    });
  });

  it('fills up to the cap partway through the external list', () => {
    expect(mergeUnionWithCap(['integer'], ['sequence', 'function', 'polynomial'], OBJECT_LABELS, 3)).toEqual({
      value: ['integer', 'sequence', 'function'],
      provenance: 'merged',
      confidence: 'medium',
      disagreement: true,
    });
  });

  it('keeps heuristic order and appends only the first new label before the cap', () => {
    expect(mergeUnionWithCap(['integer', 'sequence'], ['integer', 'function', 'circle'], OBJECT_LABELS, 3)).toEqual({
      value: ['integer', 'sequence', 'function'],
      provenance: 'merged',
      confidence: 'medium',
      disagreement: true,
    });
  });

  it('stops at the cap', () => {
    const merged = mergeUnionWithCap(['integer', 'real', 'sequence'], ['set'], OBJECT_LABELS, 3);
    expect(merged.value).toEqual(['integer', 'real', 'sequence']);
    expect(merged.provenance).toBe('heuristic');
    expect(merged.disagreement).toBe(true);
  });

  it('does not flag identical sets', () => {
    expect(mergeUnionWithCap(['integer'], ['integer'], OBJECT_LABELS, 3).disagreement).toBe(false);
  });
});

describe('mergeAdditiveQuantifiers', () => {
  it('adds a quantifier whose trigger is in the text', () => {
    expect(mergeAdditiveQuantifiers(
      ['parity'],
      ['forall', 'divisibility'],
      'Show that for all n, n(n+1) is even.',
      4
    )).toEqual({
      value: ['parity', 'forall'],
      provenance: 'merged',
      confidence: 'high',
      disagreement: true,
    });
  });

  it('refuses a quantifier the text does not support', () => {
    expect(mergeAdditiveQuantifiers(['parity'], ['exists'], 'n is even', 4)).toEqual({
      value: ['parity'],
      provenance: 'heuristic',
      confidence: 'high',
      disagreement: true,
    });
  });

  it('reports low confidence for an empty heuristic list', () => {
    expect(mergeAdditiveQuantifiers([], null, '', 4)).toEqual({
      value: [],
      provenance: 'heuristic',
      confidence: 'low',
      disagreement: false,
    });
  });
});

// ============================================================================
// Record-level Merge
// ============================================================================

describe('mergeAttributes', () => {
  it('assigns a policy to every attribute field', () => {
    expect(Object.keys(MERGE_POLICIES).sort()).toEqual([...ATTRIBUTE_FIELDS].sort());
  });

  it('accepts guarded external values when the text carries their trigger', () => {
    const merged = mergeAttributes(
      defaultHeuristic(),
      annotation({ output_type: 'proof', auxiliary_construction: 'symbolic' }),
      'Show that we can substitute y = x + 1.',
      DEFAULT_CLASSIFIER_SETTINGS
    );
    expect(merged.from_text.output_type).toBe('proof');
    expect(merged.consensus_meta.output_type).toEqual({ source: 'external', confidence: 'medium', disagreement: true });
    expect(merged.from_solution.auxiliary_construction).toBe('symbolic');
    expect(merged.consensus_meta.auxiliary_construction).toEqual({ source: 'external', confidence: 'low', disagreement: true });
  });

  it('keeps the default when the trigger is absent', () => {
    const merged = mergeAttributes(
      defaultHeuristic(),
      annotation({ output_type: 'proof', auxiliary_construction: 'symbolic' }),
      'Compute the sum.',
      DEFAULT_CLASSIFIER_SETTINGS
    );
    expect(merged.from_text.output_type).toBe('exact_value');
    expect(merged.consensus_meta.output_type).toEqual({ source: 'heuristic', confidence: 'medium', disagreement: true });
    expect(merged.from_solution.auxiliary_construction).toBe('none');
    expect(merged.consensus_meta.auxiliary_construction).toEqual({ source: 'heuristic', confidence: 'medium', disagreement: true });
  });

  it('keeps a non-default heuristic over any external value', () => {
    const heuristic = defaultHeuristic();
    heuristic.from_solution.auxiliary_construction = 'structural';
    heuristic.from_text.output_type = 'maximum';

    const merged = mergeAttributes(
      heuristic,
      annotation({ output_type: 'proof', auxiliary_construction: 'symbolic' }),
      'Prove that we substitute.',
      DEFAULT_CLASSIFIER_SETTINGS
    );
    expect(merged.from_text.output_type).toBe('maximum');
    expect(merged.consensus_meta.output_type).toEqual({ source: 'heuristic', confidence: 'high', disagreement: true });
    expect(merged.from_solution.auxiliary_construction).toBe('structural');
    expect(merged.consensus_meta.auxiliary_construction).toEqual({ source: 'heuristic', confidence: 'high', disagreement: true });
  });

  it('leaves solution shape fields to the heuristic', () => {
    const merged = mergeAttributes(
      defaultHeuristic(),
      annotation({ reasoning_shape: 'branching', reasoning_depth: 'deep' }),
      '',
      DEFAULT_CLASSIFIER_SETTINGS
    );
    expect(merged.from_solution.reasoning_shape).toBe('linear');
    expect(merged.consensus_meta.reasoning_shape).toEqual({ source: 'heuristic', confidence: 'medium', disagreement: true });
    expect(merged.consensus_meta.case_split).toEqual({ source: 'heuristic', confidence: 'medium', disagreement: false });
  });
});
