import { describe, it, expect } from 'vitest';
import { detectCollection, UNKNOWN_COLLECTION } from '../src/collection.js';

describe('detectCollection', () => {
  it('uses the third segment under outputs/', () => {
    expect(detectCollection('outputs/summaries/foo/items/x.json')).toBe('foo');
    expect(detectCollection('outputs/chunks/demoset_v1/items/x.json')).toBe('demoset_v1');
  });

  it('uses the second segment under prompts/', () => {
    expect(detectCollection('prompts/bar/prompt.json')).toBe('bar');
  });

  it('falls back to the parent directory name', () => {
    expect(detectCollection('misc/a/b.json')).toBe('a');
    expect(detectCollection('outputs/x.json')).toBe('outputs');
  });

  it('returns unknown for a bare file name', () => {
    expect(detectCollection('x.json')).toBe(UNKNOWN_COLLECTION);
  });
});
