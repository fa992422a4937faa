/**
 * Attribute Extractor Tests
 *
 * Contract for the nine rule-based detectors:
 * - Text: objects, constraints, output type, mechanisms (capped, vocabulary-ordered)
 * - Solution: reasoning shape, case split, auxiliary construction,
 *   reasoning depth, intermediate reuse (line structure of the program)
 */

import { describe, it, expect } from 'vitest';
import {
  countBranchSignals,
  countReusedBindings,
  distinctCaseLabels,
  extractAttributes,
  extractAuxiliaryConstruction,
  extractCaseSplit,
  extractConstraints,
  extractIntermediateReuse,
  extractMechanisms,
  extractObjects,
  extractOutputType,
  extractReasoningDepth,
  extractReasoningShape,
  hasSelfRecursion,
} from '../src/classifier/extractors.js';
import { DEFAULT_CLASSIFIER_SETTINGS } from '../src/schemas.js';

// ============================================================================
// Fixtures
// ============================================================================

const THREE_WAY = [
  'if n % 3 == 0:',
  '    r = 0',
  'elif n % 3 == 1:',
  '    r = 1',
  'elif n % 3 == 2:',
  '    r = 2',
  'else:',
  '    r = -1',
].join('\n');

const FACTORIAL = [
  'def f(n):',
  '    if n == 0:',
  '        return 1',
  '    return n * f(n - 1)',
].join('\n');

// ============================================================================
// Text Detectors
// ============================================================================

describe('extractObjects', () => {
  const text = 'Let n be a positive integer and consider the sequence a_n of real numbers.';

  it('lists detected objects in vocabulary order, dropping integer under positive_integer', () => {
    expect(extractObjects(text)).toEqual(['positive_integer', 'real', 'sequence']);
  });

  it('applies the cap after subsumption', () => {
    expect(extractObjects(text, 2)).toEqual(['positive_integer', 'real']);
  });

  it('returns nothing for empty text', () => {
    expect(extractObjects('')).toEqual([]);
  });
});

describe('extractConstraints', () => {
  it('detects parity and a universal quantifier', () => {
    expect(extractConstraints('Prove that for every positive integer n, n^2 + n is even.'))
      .toEqual(['parity', 'forall']);
  });

  it('detects equality and inequality symbols', () => {
    expect(extractConstraints('Suppose x + y = 10 and x > y.')).toEqual(['equality', 'inequality']);
  });
});

describe('extractOutputType', () => {
  it('takes the first matching category in priority order', () => {
    expect(extractOutputType('Prove that the sum is odd.')).toBe('proof');
    expect(extractOutputType('Find all functions f such that f(x) = f(2x).')).toBe('classification');
    expect(extractOutputType('Find the largest prime below 50.')).toBe('maximum');
    expect(extractOutputType('Compute 2 + 2.')).toBe('exact_value');
  });

  it('uses the fallback for empty or unmatched text', () => {
    expect(extractOutputType('')).toBe('exact_value');
    expect(extractOutputType('Nothing here.', 'minimum')).toBe('minimum');
  });
});

describe('extractMechanisms', () => {
  it('reads mechanisms from the text', () => {
    expect(extractMechanisms('Prove by induction, then apply the pigeonhole principle.', ''))
      .toEqual(['induction', 'pigeonhole']);
  });

  it('merges text and code signals without duplicates', () => {
    expect(extractMechanisms(
      'How many ways are there?',
      'import itertools\nprint(len(list(itertools.permutations(range(4)))))'
    )).toEqual(['counting']);
  });

  it('adds induction for a self-recursive function', () => {
    expect(extractMechanisms('', FACTORIAL)).toEqual(['induction']);
  });

  it('adds case analysis for multi-way branching', () => {
    expect(extractMechanisms('', THREE_WAY)).toEqual(['case_analysis']);
  });

  it('caps the list', () => {
    expect(extractMechanisms('induction pigeonhole extremal invariant', '')).toEqual([
      'induction',
      'pigeonhole',
      'extremal',
    ]);
  });
});

// ============================================================================
// Code Structure Helpers
// ============================================================================

describe('Code structure helpers', () => {
  it('counts branch keywords at line starts', () => {
    expect(countBranchSignals(THREE_WAY)).toEqual({
      if_count: 1,
      elif_count: 2,
      else_count: 1,
      case_labels: 0,
    });
  });

  it('counts distinct case labels', () => {
    expect(distinctCaseLabels('# Case 1\nx = 1\n# Case 2\ny = 2\n# case 2\n')).toBe(2);
  });

  it('detects recursion inside the function body only', () => {
    expect(hasSelfRecursion(FACTORIAL)).toBe(true);
    expect(hasSelfRecursion('def g(n):\n    return n + 1\n\nprint(g(3))')).toBe(false);
    expect(hasSelfRecursion('def h(n): return h(n - 1) if n else 0')).toBe(true);
  });
});

// ============================================================================
// Solution Detectors
// ============================================================================

describe('Solution detectors', () => {
  it('defaults every solution attribute for empty code', () => {
    expect(extractReasoningShape('')).toBe('linear');
    expect(extractCaseSplit('')).toBe('none');
    expect(extractAuxiliaryConstruction('')).toBe('none');
    expect(extractReasoningDepth('')).toBe('shallow');
    expect(extractIntermediateReuse('')).toBe('none');
  });

  it('classifies multi-way branching', () => {
    expect(extractReasoningShape(THREE_WAY)).toBe('branching');
    expect(extractCaseSplit(THREE_WAY)).toBe('multi');
  });

  it('treats a single if/else as a linear binary split', () => {
    const code = 'if x > 0:\n    y = 1\nelse:\n    y = 2';
    expect(extractReasoningShape(code)).toBe('linear');
    expect(extractCaseSplit(code)).toBe('binary');
  });

  it('treats two case labels as a binary split', () => {
    const code = '# Case 1\nx = 1\n# Case 2\ny = 2\n# case 2\n';
    expect(extractCaseSplit(code)).toBe('binary');
    expect(extractReasoningShape(code)).toBe('branching');
  });

  it('detects structural and symbolic auxiliary construction', () => {
    expect(extractAuxiliaryConstruction('from collections import Counter\nc = Counter(s)')).toBe('structural');
    expect(extractAuxiliaryConstruction('def solve():\n    return 1')).toBe('structural');
    expect(extractAuxiliaryConstruction('a = 1\nb = 2\nc = a + b')).toBe('symbolic');
    expect(extractAuxiliaryConstruction('x = 1\ny = 2\nans = x + y')).toBe('none');
  });

  it('grades reasoning depth by steps and nesting', () => {
    expect(extractReasoningDepth('x = 1\nprint(x)')).toBe('shallow');

    const flat = Array.from({ length: 10 }, (_, i) => `v${i} = ${i}`).join('\n');
    expect(extractReasoningDepth(flat)).toBe('medium');

    const nested = [
      'for a in range(2):',
      '    for b in range(2):',
      '        for c in range(2):',
      '            for d in range(2):',
      '                for e in range(2):',
      '                    total = a',
    ].join('\n');
    expect(extractReasoningDepth(nested)).toBe('deep');
  });

  it('counts reused intermediate bindings', () => {
    const code = 'total = 5\nhalf = total // 2\nrest = total - half\nprint(half, rest)';
    expect(countReusedBindings(code)).toBe(3);
    expect(extractIntermediateReuse(code)).toBe('multiple');
  });

  it('stops looking for reuse at a re-binding of the same name', () => {
    const code = 'value = 1\nvalue = 2\nprint(value)';
    expect(countReusedBindings(code)).toBe(1);
    expect(extractIntermediateReuse(code)).toBe('single');
  });

  it('ignores trivial names', () => {
    expect(extractIntermediateReuse('ans = 1\nprint(ans)')).toBe('none');
  });
});

describe('extractAttributes', () => {
  it('bundles text and solution attributes', () => {
    expect(extractAttributes({ text: 'Prove by induction.', code: FACTORIAL }, DEFAULT_CLASSIFIER_SETTINGS)).toEqual({
      from_text: {
        objects: [],
        constraints: [],
        output_type: 'proof',
        mechanisms: ['induction'],
      },
      from_solution: {
        reasoning_shape: 'linear',
        case_split: 'none',
        auxiliary_construction: 'structural',
        reasoning_depth: 'shallow',
        intermediate_reuse: 'none',
      },
    });
  });
});
