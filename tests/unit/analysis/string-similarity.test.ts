import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  computeSimilarity,
  computeSimilarityIgnoreCase,
  findAllMatches,
  findClosestMatch,
  levenshteinDistance,
} from '../../../src/analysis/string-similarity.js';
import { similarity } from '../../../src/analysis/similarity.js';
import { KNOWN_KEYWORDS } from '../../../src/analysis/keywords.js';

describe('levenshteinDistance', () => {
  it('counts edits', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('same', 'same')).toBe(0);
  });

  it('is symmetric', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 12 }), fc.string({ maxLength: 12 }), (a, b) => {
        expect(levenshteinDistance(a, b)).toBe(levenshteinDistance(b, a));
      })
    );
  });
});

describe('computeSimilarity', () => {
  it('is 1 for identical and 0 against empty', () => {
    expect(computeSimilarity('bold', 'bold')).toBe(1);
    expect(computeSimilarity('', 'bold')).toBe(0);
  });

  it('is the Levenshtein ratio', () => {
    expect(computeSimilarity('boxx', 'box')).toBe(0.75);
  });

  it('ignores case on request', () => {
    expect(computeSimilarityIgnoreCase('README', 'readme')).toBe(1);
  });

  it('stays within [0, 1]', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), (a, b) => {
        const s = computeSimilarity(a, b);
        expect(s).toBeGreaterThanOrEqual(0);
        expect(s).toBeLessThanOrEqual(1);
      })
    );
  });
});

describe('similarity', () => {
  it('clamps into range', () => {
    expect(similarity(1.5)).toBe(1);
    expect(similarity(-0.2)).toBe(0);
  });
});

describe('findAllMatches', () => {
  it('orders best first and keeps input order on ties', () => {
    const matches = findAllMatches('ab', ['ax', 'ay', 'ab'], similarity(0.5), 3);
    expect(matches.map((m) => m.match)).toEqual(['ab', 'ax', 'ay']);
  });

  it('keeps a candidate scoring exactly the threshold', () => {
    const matches = findAllMatches('ab', ['ax'], similarity(0.5), 3);
    expect(matches).toEqual([{ match: 'ax', score: 0.5 }]);
  });

  it('respects the limit', () => {
    expect(findAllMatches('heading', KNOWN_KEYWORDS, similarity(0.6), 2).map((m) => m.match))
      .toEqual(['heading1', 'heading2']);
    expect(findAllMatches('heading', KNOWN_KEYWORDS, similarity(0.6), 0)).toEqual([]);
  });
});

describe('findClosestMatch', () => {
  it('finds the closest keyword', () => {
    expect(findClosestMatch('boxx', KNOWN_KEYWORDS, similarity(0.6))).toEqual({ match: 'box', score: 0.75 });
  });

  it('returns null below the threshold', () => {
    expect(findClosestMatch('zzzzzz', KNOWN_KEYWORDS, similarity(0.6))).toBeNull();
  });
});
