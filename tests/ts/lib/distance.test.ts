import { describe, it, expect } from 'vitest';
import { closestMatch, damerauLevenshteinDistance, similarityRatio } from '../../../src/lib/distance.js';

describe('damerauLevenshteinDistance', () => {
  it('should be zero for identical strings', () => {
    expect(damerauLevenshteinDistance('', '')).toBe(0);
    expect(damerauLevenshteinDistance('author', 'author')).toBe(0);
  });

  it('should count insertions and deletions against an empty string', () => {
    expect(damerauLevenshteinDistance('abc', '')).toBe(3);
    expect(damerauLevenshteinDistance('', 'abcd')).toBe(4);
  });

  it('should count substitutions', () => {
    expect(damerauLevenshteinDistance('kitten', 'sitting')).toBe(3);
  });

  it('should count an adjacent transposition as one edit', () => {
    expect(damerauLevenshteinDistance('ca', 'ac')).toBe(1);
    expect(damerauLevenshteinDistance('FoobraAttr', 'FoobarAttr')).toBe(1);
  });

  it('should allow edits between transposed characters', () => {
    // The restricted variant reports 3 here
    expect(damerauLevenshteinDistance('ca', 'abc')).toBe(2);
  });

  it('should be symmetric', () => {
    expect(damerauLevenshteinDistance('FoobrbAttr', 'FoobarAttr')).toBe(2);
    expect(damerauLevenshteinDistance('FoobarAttr', 'FoobrbAttr')).toBe(2);
  });
});

describe('similarityRatio', () => {
  it('should be 1 for identical strings, including two empty ones', () => {
    expect(similarityRatio('', '')).toBe(1);
    expect(similarityRatio('name', 'name')).toBe(1);
  });

  it('should be 0 without shared characters', () => {
    expect(similarityRatio('abc', 'xyz')).toBe(0);
  });

  it('should rate a transposed pair of letters', () => {
    expect(similarityRatio('nmae', 'name')).toBe(0.75);
  });

  it('should count all matching blocks', () => {
    expect(similarityRatio('datasetFeild', 'datasetField')).toBeCloseTo(22 / 24);
  });
});

describe('closestMatch', () => {
  it('should return the best rated candidate', () => {
    expect(closestMatch('nmae', ['title', 'name'])).toEqual({ candidate: 'name', ratio: 0.75 });
  });

  it('should prefer the first candidate on ties', () => {
    expect(closestMatch('ab', ['ax', 'ay'])).toEqual({ candidate: 'ax', ratio: 0.5 });
  });

  it('should return null without candidates', () => {
    expect(closestMatch('name', [])).toBeNull();
  });
});
