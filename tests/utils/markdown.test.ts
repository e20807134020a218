import { describe, it, expect } from '@jest/globals';
import { bold, escapeMarkdown, link, truncate } from '../../src/utils/markdown.js';

describe('escapeMarkdown', () => {
  it('escapes legacy Markdown entity markers', () => {
    expect(escapeMarkdown('a_b*c`d[e]')).toBe('a\\_b\\*c\\`d\\[e]');
  });

  it('leaves plain text alone', () => {
    expect(escapeMarkdown('Amélie (2001): 8.0!')).toBe('Amélie (2001): 8.0!');
  });
});

describe('bold', () => {
  it('wraps plain text in asterisks without escaping other markers', () => {
    expect(bold('Heist_2 [Extended]')).toBe('*Heist_2 [Extended]*');
  });

  it('reopens the entity after each literal asterisk', () => {
    expect(bold('M*A*S*H')).toBe('*M*\\**A*\\**S*\\**H*');
  });

  it('emits no empty entities around leading or trailing asterisks', () => {
    expect(bold('*batteries not included*')).toBe('\\**batteries not included*\\*');
  });
});

describe('link', () => {
  it('keeps the label unescaped', () => {
    expect(link('Snake*Eyes_2', 'https://example.com/1')).toBe('[Snake*Eyes_2](https://example.com/1)');
  });

  it('replaces square brackets in the label', () => {
    expect(link('[REC]', 'https://example.com/2')).toBe('[(REC)](https://example.com/2)');
  });
});

describe('truncate', () => {
  it('appends an ellipsis only when text is cut', () => {
    expect(truncate('abcdef', 3)).toBe('abc...');
    expect(truncate('abc', 3)).toBe('abc');
    expect(truncate('', 3)).toBe('');
  });
});
