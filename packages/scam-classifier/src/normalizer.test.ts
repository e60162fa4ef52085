import { describe, expect, it } from 'vitest';
import { TEXT_FILTERS, normalizeText, tokenizeText } from './normalizer';

describe('normalizeText', () => {
  it('lowercases and strips punctuation', () => {
    expect(normalizeText('URGENT: verify your OTP now!')).toBe('urgent verify your otp now');
  });

  it('keeps the exact filter set', () => {
    expect(TEXT_FILTERS).toBe('!"#$%&()*+,-./:;<=>?@[\\]^_`{|}~\t\n');
    expect(TEXT_FILTERS).toHaveLength(33);
  });

  it('replaces every filter character with a separator', () => {
    expect(normalizeText(`a${TEXT_FILTERS}b`)).toBe('a b');
  });

  it('leaves apostrophes and digits inside tokens', () => {
    expect(normalizeText("Don't send 500USD")).toBe("don't send 500usd");
  });

  it('splits on tabs and newlines', () => {
    expect(normalizeText('Click\tthe\nlink')).toBe('click the link');
  });

  it('collapses carriage returns and repeated spaces', () => {
    expect(normalizeText('  your   account\r\nis  locked  ')).toBe('your account is locked');
  });

  it('returns an empty string for filter-only input', () => {
    expect(normalizeText('!!!...###')).toBe('');
  });

  it('does not treat non-breaking spaces as separators', () => {
    expect(normalizeText('Gift\u00a0Card')).toBe('gift\u00a0card');
  });
});

describe('tokenizeText', () => {
  it('splits the normalized text on single spaces', () => {
    expect(tokenizeText('Win a FREE iPhone -- claim now!!')).toEqual(['win', 'a', 'free', 'iphone', 'claim', 'now']);
  });

  it('returns no tokens for empty input', () => {
    expect(tokenizeText('')).toEqual([]);
    expect(tokenizeText(' ~~ ')).toEqual([]);
  });
});
