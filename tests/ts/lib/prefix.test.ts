import { describe, it, expect } from 'vitest';
import { commonPrefix, splitByCommonPrefixes } from '../../../src/lib/prefix/clusters.js';
import {
  divergentGroupHeuristic,
  estimateTypos,
  singletonHeuristic,
} from '../../../src/lib/prefix/typos.js';

describe('commonPrefix', () => {
  it('should return the shared leading characters', () => {
    expect(commonPrefix('authorName', 'authorAffiliation')).toBe('author');
    expect(commonPrefix('abc', 'xyz')).toBe('');
    expect(commonPrefix('foo', 'foobar')).toBe('foo');
  });
});

describe('splitByCommonPrefixes', () => {
  it('should group keywords under their shared prefix in discovery order', () => {
    const groups = splitByCommonPrefixes(['fooBarBaz', 'fooBarTest', 'fooBar'], 3);

    expect([...groups.entries()]).toEqual([['fooBar', ['fooBarBaz', 'fooBarTest', 'fooBar']]]);
  });

  it('should keep keywords without a long enough prefix as singletons', () => {
    const groups = splitByCommonPrefixes(['1FooBar', '2FooBar', '3FooBar'], 3);

    expect([...groups.entries()]).toEqual([
      ['1FooBar', ['1FooBar']],
      ['2FooBar', ['2FooBar']],
      ['3FooBar', ['3FooBar']],
    ]);
  });

  it('should respect the minimum prefix length', () => {
    expect([...splitByCommonPrefixes(['Foo1', 'Foo2', 'Foo3'], 4).keys()]).toEqual(['Foo1', 'Foo2', 'Foo3']);
    expect([...splitByCommonPrefixes(['Foo1', 'Foo2', 'Foo3'], 3).entries()]).toEqual([
      ['Foo', ['Foo1', 'Foo2', 'Foo3']],
    ]);
  });

  it('should bind greedily to the longest prefix', () => {
    const groups = splitByCommonPrefixes(['FooBarLong', 'FooBarShort', 'FooBarLonger'], 3);

    expect([...groups.entries()]).toEqual([
      ['FooBarLong', ['FooBarLong', 'FooBarLonger']],
      ['FooBarShort', ['FooBarShort']],
    ]);
  });

  it('should return no groups for no keywords', () => {
    expect(splitByCommonPrefixes([]).size).toBe(0);
  });
});

describe('singletonHeuristic', () => {
  const family = ['FoobarAttrEins', 'FoobarAttrZwei', 'FoobarAttrDrei'];

  it('should pair a singleton with a group one edit away', () => {
    const groups = new Map([
      ['FoobarAttr', family],
      ['FoobraAttrNrVier', ['FoobraAttrNrVier']],
    ]);

    expect(singletonHeuristic(groups, 1)).toEqual([
      {
        suspect: { prefix: 'FoobraAttrNrVier', keywords: ['FoobraAttrNrVier'] },
        likelyIntended: { prefix: 'FoobarAttr', keywords: family },
      },
    ]);
  });

  it('should only report a two-edit variant with a threshold of two', () => {
    const groups = new Map([
      ['FoobarAttr', family],
      ['FoobrbAttrNrVier', ['FoobrbAttrNrVier']],
    ]);

    expect(singletonHeuristic(groups, 1)).toEqual([]);
    expect(singletonHeuristic(groups, 2)).toHaveLength(1);
  });

  it('should not compare a singleton with longer prefixes', () => {
    const groups = new Map([
      ['FoobarAttribute', ['FoobarAttributeA', 'FoobarAttributeB']],
      ['Foobra', ['Foobra']],
    ]);

    expect(singletonHeuristic(groups, 1)).toEqual([]);
  });
});

describe('divergentGroupHeuristic', () => {
  it('should report nothing', () => {
    const groups = new Map([
      ['authorName', ['authorNameA', 'authorNameB']],
      ['auhtorName', ['auhtorNameA', 'auhtorNameB']],
    ]);

    expect(divergentGroupHeuristic(groups, 1)).toEqual([]);
  });
});

describe('estimateTypos', () => {
  it('should find a mistyped field name among its family', () => {
    const candidates = estimateTypos(['authorName', 'authorAffiliation', 'authorIdentifier', 'auhtorEmail']);

    expect(candidates).toEqual([
      {
        suspect: { prefix: 'auhtorEmail', keywords: ['auhtorEmail'] },
        likelyIntended: { prefix: 'author', keywords: ['authorName', 'authorAffiliation', 'authorIdentifier'] },
      },
    ]);
  });

  it('should report nothing for well-formed names', () => {
    expect(estimateTypos(['authorName', 'authorAffiliation', 'title', 'subject'])).toEqual([]);
  });
});
