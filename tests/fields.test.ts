/**
 * Field Projection Tests
 *
 * Contract for turning an arbitrary JSON line into the text views the
 * detectors read: problem text, resolved code, plan, and the joined
 * context/everything views.
 */

import { describe, it, expect } from 'vitest';
import { parseRecord, projectFields, resolveCode } from '../src/classifier/fields.js';

describe('parseRecord', () => {
  it('treats non-objects as an empty record', () => {
    expect(parseRecord('not a record')).toEqual({});
    expect(parseRecord(null)).toEqual({});
    expect(parseRecord([1, 2, 3])).toEqual({});
  });

  it('degrades malformed members to absent', () => {
    const record = parseRecord({ problem: { text: 42 }, code: ['x'], plan: 'Plan it.' });
    expect(projectFields(record)).toEqual({
      text: '',
      code: '',
      plan: 'Plan it.',
      context: 'Plan it.',
      everything: 'Plan it.',
    });
  });
});

describe('resolveCode', () => {
  const attempts = [{ code: 'first()' }, { code: 'second()' }];

  it('prefers the direct code field', () => {
    expect(resolveCode(parseRecord({ code: 'direct()', attempts, outcome: { pass_at_k: 2 } }))).toBe('direct()');
  });

  it('selects the attempt named by a 1-based pass_at_k', () => {
    expect(resolveCode(parseRecord({ attempts, outcome: { pass_at_k: 2 } }))).toBe('second()');
    expect(resolveCode(parseRecord({ code: '', attempts, outcome: { pass_at_k: 1 } }))).toBe('first()');
  });

  it('returns empty code for out-of-range or non-integer pass_at_k', () => {
    expect(resolveCode(parseRecord({ attempts, outcome: { pass_at_k: 0 } }))).toBe('');
    expect(resolveCode(parseRecord({ attempts, outcome: { pass_at_k: 3 } }))).toBe('');
    expect(resolveCode(parseRecord({ attempts, outcome: { pass_at_k: 1.5 } }))).toBe('');
    expect(resolveCode(parseRecord({ attempts }))).toBe('');
  });

  it('returns empty code when the selected attempt has none', () => {
    expect(resolveCode(parseRecord({ attempts: [null, { code: 'x()' }], outcome: { pass_at_k: 1 } }))).toBe('');
  });
});

describe('projectFields', () => {
  it('joins non-empty parts with a single space', () => {
    const view = projectFields(parseRecord({
      problem: { text: 'Find x.' },
      plan: 'Solve for x.',
      code: 'x = 1',
    }));
    expect(view.context).toBe('Find x. Solve for x.');
    expect(view.everything).toBe('Find x. Solve for x. x = 1');
  });

  it('skips an empty plan when joining', () => {
    const view = projectFields(parseRecord({ problem: { text: 'Find x.' }, code: 'print(1)' }));
    expect(view.context).toBe('Find x.');
    expect(view.everything).toBe('Find x. print(1)');
  });

  it('yields empty views for an empty record', () => {
    expect(projectFields({})).toEqual({ text: '', code: '', plan: '', context: '', everything: '' });
  });
});
