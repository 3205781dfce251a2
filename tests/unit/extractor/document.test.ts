/**
 * Unit tests for document node helpers
 *
 * @see src/extractor/document.ts
 */

import { describe, it, expect } from 'vitest';
import { classifyNode, formatPath } from '../../../src/extractor';

describe('classifyNode', () => {
  it('should classify leaves', () => {
    expect(classifyNode(null).kind).toBe('leaf');
    expect(classifyNode('a').kind).toBe('leaf');
    expect(classifyNode(1.5).kind).toBe('leaf');
    expect(classifyNode(false).kind).toBe('leaf');
  });

  it('should classify arrays as sequences', () => {
    expect(classifyNode([]).kind).toBe('sequence');
  });

  it('should classify plain objects as mappings', () => {
    expect(classifyNode({}).kind).toBe('mapping');
    expect(classifyNode(Object.create(null)).kind).toBe('mapping');
  });

  it('should mark values a JSON parse cannot produce as invalid', () => {
    expect(classifyNode(undefined).kind).toBe('invalid');
    expect(classifyNode(new Date(0)).kind).toBe('invalid');
    expect(classifyNode(Symbol('s')).kind).toBe('invalid');
  });
});

describe('formatPath', () => {
  it('should render the root as $', () => {
    expect(formatPath([])).toBe('$');
  });

  it('should join identifiers with dots and indices with brackets', () => {
    expect(formatPath(['sources', 2, 'filters', 0, 'settings'])).toBe('sources[2].filters[0].settings');
  });

  it('should start with an index when the root is a sequence', () => {
    expect(formatPath([0, 'a'])).toBe('[0].a');
  });

  it('should quote keys that are not identifiers', () => {
    expect(formatPath(['my key', 1])).toBe('["my key"][1]');
    expect(formatPath(['sources', 'Mic/Aux'])).toBe('sources["Mic/Aux"]');
  });
});
