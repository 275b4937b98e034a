/**
 * Tagged debug log
 *
 * Usage:
 *   debug('preview', `Rebuilt patch ${meshId} (Sx=${sx}, Sy=${sy})`);
 *   debug('commit', 'Seam weld removed 6 vertices');
 *
 * Control active tags:
 *   enableDebugTag('preview');
 *   disableDebugTag('preview');
 *   setDebugTags(['capture', 'commit']);
 *
 * Messages for inactive tags are dropped. Recorded lines can be read back
 * as one string (getDebug) or filtered by tag (getDebugLines).
 */

export type DebugTag = 'capture' | 'preview' | 'commit' | 'host';

export interface DebugLine {
  timestamp: string;
  tag: DebugTag | null;
  content: string;
}

const lines: DebugLine[] = [];
const activeTags = new Set<DebugTag>();

const formatLine = (line: DebugLine): string =>
  line.tag ? `[${line.timestamp}] [${line.tag}] ${line.content}` : line.content;

/**
 * Log a debug message with a tag. Only recorded if the tag is active.
 */
export const debug = (tag: DebugTag, content: string): void => {
  if (!activeTags.has(tag)) return;

  const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  lines.push({ timestamp, tag, content });
};

export const enableDebugTag = (tag: DebugTag): void => {
  activeTags.add(tag);
};

export const disableDebugTag = (tag: DebugTag): void => {
  activeTags.delete(tag);
};

/**
 * Set all active debug tags (replaces existing)
 */
export const setDebugTags = (tags: DebugTag[]): void => {
  activeTags.clear();
  tags.forEach(tag => activeTags.add(tag));
};

export const getDebugTags = (): DebugTag[] => Array.from(activeTags);

export const isDebugTagActive = (tag: DebugTag): boolean => activeTags.has(tag);

/**
 * Append untagged content (always recorded)
 */
export const appendDebug = (content: string): void => {
  lines.push({ timestamp: '', tag: null, content });
};

export const getDebugLines = (tag?: DebugTag): DebugLine[] =>
  tag ? lines.filter(line => line.tag === tag) : [...lines];

export const getDebug = (): string => lines.map(formatLine).join('\n');

export const hasDebug = (): boolean => lines.length > 0;

export const clearDebug = (): void => {
  lines.length = 0;
};
