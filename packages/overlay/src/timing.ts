import type { WordTiming } from '@wordclip/types';

/**
 * Joins words spoken back to back: an entry whose `start` equals the previous
 * entry's `end` (exact match) is appended to it. Input entries are not modified.
 */
export function mergeWordTimings(entries: readonly WordTiming[]): WordTiming[] {
  const merged: WordTiming[] = [];
  let current: WordTiming | null = null;

  for (const entry of entries) {
    if (current !== null && current.end === entry.start) {
      current = { word: `${current.word} ${entry.word}`, start: current.start, end: entry.end };
      continue;
    }
    if (current !== null) {
      merged.push(current);
    }
    current = { word: entry.word, start: entry.start, end: entry.end };
  }

  if (current !== null) {
    merged.push(current);
  }
  return merged;
}
