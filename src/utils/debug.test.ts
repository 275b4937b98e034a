import { describe, it, expect, beforeEach } from 'vitest';
import {
  appendDebug,
  clearDebug,
  debug,
  disableDebugTag,
  enableDebugTag,
  getDebug,
  getDebugLines,
  getDebugTags,
  hasDebug,
  isDebugTagActive,
  setDebugTags,
} from './debug';

describe('debug', () => {
  beforeEach(() => {
    clearDebug();
    setDebugTags([]);
  });

  it('drops messages for inactive tags', () => {
    debug('preview', 'rebuilt');

    expect(hasDebug()).toBe(false);
  });

  it('records messages for active tags', () => {
    enableDebugTag('commit');

    debug('commit', 'welded 4');
    debug('preview', 'rebuilt');

    const lines = getDebugLines();
    expect(lines).toHaveLength(1);
    expect(lines[0].tag).toBe('commit');
    expect(lines[0].content).toBe('welded 4');
    expect(lines[0].timestamp).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3}$/);
  });

  it('filters recorded lines by tag', () => {
    setDebugTags(['capture', 'commit']);

    debug('capture', 'a');
    debug('commit', 'b');
    debug('capture', 'c');

    expect(getDebugLines('capture').map(line => line.content)).toEqual(['a', 'c']);
  });

  it('replaces and removes active tags', () => {
    enableDebugTag('host');
    setDebugTags(['preview']);
    expect(getDebugTags()).toEqual(['preview']);

    disableDebugTag('preview');
    expect(isDebugTagActive('preview')).toBe(false);
  });

  it('formats tagged and untagged lines', () => {
    enableDebugTag('host');
    debug('host', 'undo add-mesh');
    appendDebug('--- end ---');

    const [tagged, untagged] = getDebug().split('\n');
    expect(tagged).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[host\] undo add-mesh$/);
    expect(untagged).toBe('--- end ---');
  });
});
