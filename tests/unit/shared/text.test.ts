import { describe, expect, it } from 'vitest';

import { clipLines, formatDate, formatDateTime, truncateText } from '@/shared/utils/text';

describe('text utils', () => {
  it('truncates with an ellipsis inside the limit', () => {
    expect(truncateText('abcdef', 4)).toBe('abc…');
    expect(truncateText('abc', 4)).toBe('abc');
    expect(truncateText('abcdef', 1)).toBe('a');
  });

  it('clips long lists with a remainder line', () => {
    expect(clipLines(['a', 'b', 'c', 'd'], 2)).toEqual(['a', 'b', '… и ещё 2']);
    expect(clipLines(['a'], 2)).toEqual(['a']);
  });

  it('formats dates in UTC', () => {
    const value = new Date('2024-05-10T07:05:09.000Z');

    expect(formatDate(value)).toBe('2024-05-10');
    expect(formatDateTime(value)).toBe('2024-05-10 07:05 UTC');
  });
});
