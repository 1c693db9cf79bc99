/**
 * Tests for message formatting
 */

import { describe, it, expect } from 'vitest';
import { escapeHtml, formatMessage, toHashtag, truncateAtWord } from '../../src/publishing/format';

describe('escapeHtml', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml('<a href="x">R&D</a>')).toBe('&lt;a href=&quot;x&quot;&gt;R&amp;D&lt;/a&gt;');
  });
});

describe('toHashtag', () => {
  it('should join words into one tag', () => {
    expect(toHashtag('Machine Learning')).toBe('#MachineLearning');
    expect(toHashtag('C++ & Rust')).toBe('#CRust');
  });

  it('should keep letters from any script', () => {
    expect(toHashtag('Наука')).toBe('#Наука');
  });

  it('should return null when nothing usable is left', () => {
    expect(toHashtag('!!!')).toBeNull();
    expect(toHashtag(null)).toBeNull();
    expect(toHashtag('')).toBeNull();
  });
});

describe('truncateAtWord', () => {
  it('should leave short text alone', () => {
    expect(truncateAtWord('Short text', 20)).toBe('Short text');
  });

  it('should cut at the last word boundary', () => {
    expect(truncateAtWord('The quick brown fox jumps', 12)).toBe('The quick…');
  });

  it('should cut mid-word when no boundary is close enough', () => {
    expect(truncateAtWord('abcdefghij', 5)).toBe('abcd…');
  });
});

describe('formatMessage', () => {
  it('should build title, body, hashtags and source link', () => {
    const message = formatMessage({
      title: 'A & B',
      content: 'Body',
      sourceUrl: 'https://example.org/a?x=1&y=2',
      language: 'de',
      hashtags: ['#Tech', '#Example'],
    });

    expect(message).toBe(
      '<b>A &amp; B</b>\n\nBody\n\n#Tech #Example\n<a href="https://example.org/a?x=1&amp;y=2">Quelle</a>'
    );
  });

  it('should fall back to the English label', () => {
    const message = formatMessage({
      title: 'Title',
      content: '',
      sourceUrl: 'https://example.org/a',
      language: 'pt',
    });

    expect(message).toBe('<b>Title</b>\n\n<a href="https://example.org/a">Source</a>');
  });

  it('should trim the body to fit the limit', () => {
    const message = formatMessage(
      {
        title: 'Title',
        content: 'word & '.repeat(100),
        sourceUrl: 'https://example.org/a',
        language: 'en',
      },
      200
    );

    expect(message.length).toBeLessThanOrEqual(200);
    expect(message.split('\n\n')[1]?.endsWith('…')).toBe(true);
  });
});
