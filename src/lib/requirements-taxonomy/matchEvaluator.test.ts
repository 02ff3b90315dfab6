import { describe, it, expect } from 'vitest';
import { evaluateMatch } from './matchEvaluator';
import { ABSENT } from './semanticValue';

describe('evaluateMatch', () => {
  describe('exists', () => {
    it('is true for any present value, including null and false', () => {
      expect(evaluateMatch('Login', 'exists', true)).toBe(true);
      expect(evaluateMatch(null, 'exists', true)).toBe(true);
      expect(evaluateMatch(false, 'exists', true)).toBe(true);
    });

    it('is false for ABSENT', () => {
      expect(evaluateMatch(ABSENT, 'exists', true)).toBe(false);
    });

    it('supports exists: false', () => {
      expect(evaluateMatch(ABSENT, 'exists', false)).toBe(true);
      expect(evaluateMatch('Login', 'exists', false)).toBe(false);
    });

    it('checks presence when the expected value is not boolean', () => {
      expect(evaluateMatch('Login', 'exists', ABSENT)).toBe(true);
      expect(evaluateMatch(ABSENT, 'exists', 'yes')).toBe(false);
    });
  });

  describe('eq', () => {
    it('compares scalars', () => {
      expect(evaluateMatch('Business', 'eq', 'Business')).toBe(true);
      expect(evaluateMatch('Business', 'eq', 'business')).toBe(false);
      expect(evaluateMatch(3, 'eq', 3)).toBe(true);
    });

    it('compares nested values structurally', () => {
      expect(evaluateMatch({ a: [1, { b: true }] }, 'eq', { a: [1, { b: true }] })).toBe(true);
      expect(evaluateMatch({ a: 1, b: 2 }, 'eq', { b: 2, a: 1 })).toBe(true);
      expect(evaluateMatch([1, 2], 'eq', [2, 1])).toBe(false);
      expect(evaluateMatch({ a: 1 }, 'eq', { a: 1, b: 2 })).toBe(false);
    });

    it('never matches an absent value', () => {
      expect(evaluateMatch(ABSENT, 'eq', null)).toBe(false);
      expect(evaluateMatch(ABSENT, 'eq', ABSENT)).toBe(false);
    });
  });

  describe('in', () => {
    it('is true when the value is a member of the expected list', () => {
      expect(evaluateMatch('Functional', 'in', ['Business', 'Functional'])).toBe(true);
      expect(evaluateMatch('Other', 'in', ['Business', 'Functional'])).toBe(false);
    });

    it('is false when expected is not a list', () => {
      expect(evaluateMatch('Functional', 'in', 'Functional')).toBe(false);
    });
  });

  describe('contains', () => {
    it('tests list membership', () => {
      expect(evaluateMatch(['security', 'auth'], 'contains', 'auth')).toBe(true);
      expect(evaluateMatch(['security'], 'contains', 'sec')).toBe(false);
    });

    it('tests substrings case-sensitively', () => {
      expect(evaluateMatch('reset passwords', 'contains', 'pass')).toBe(true);
      expect(evaluateMatch('reset passwords', 'contains', 'PASS')).toBe(false);
    });

    it('is false for other shapes', () => {
      expect(evaluateMatch(42, 'contains', 4)).toBe(false);
      expect(evaluateMatch('42', 'contains', 4)).toBe(false);
      expect(evaluateMatch(ABSENT, 'contains', 'x')).toBe(false);
    });
  });

  describe('containsText', () => {
    it('matches strings case-insensitively', () => {
      expect(evaluateMatch('Users must reset passwords', 'containsText', 'RESET')).toBe(true);
      expect(evaluateMatch('Users must reset passwords', 'containsText', 'logout')).toBe(false);
    });

    it('matches any string member of a list', () => {
      expect(evaluateMatch([1, 'Audit Log'], 'containsText', 'audit')).toBe(true);
      expect(evaluateMatch([1, 2], 'containsText', '1')).toBe(false);
    });

    it('requires a string needle', () => {
      expect(evaluateMatch('123', 'containsText', 123)).toBe(false);
    });
  });

  it('fails closed for unknown operators', () => {
    expect(evaluateMatch('x', 'startsWith', 'x')).toBe(false);
    expect(evaluateMatch('x', '', 'x')).toBe(false);
  });
});
