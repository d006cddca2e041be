import { estimateTokens, formatConversationTitle, normalizeText, sanitizeMessage } from './textNormalizer';

describe('textNormalizer', () => {
  it('sanitizeMessage strips control characters and collapses whitespace', () => {
    expect(sanitizeMessage('  What is\u0007 the   leave\n\npolicy?  ')).toBe('What is the leave policy?');
  });

  it('normalizeText folds CRLF and runs of blank lines', () => {
    expect(normalizeText('a\r\nb\n\n\n\nc')).toBe('a\nb\n\nc');
  });

  it('formatConversationTitle capitalises and truncates long messages', () => {
    expect(formatConversationTitle('what was our q4 revenue?')).toBe('What was our q4 revenue?');
    const long = 'x'.repeat(60);
    const title = formatConversationTitle(long);
    expect(title).toHaveLength(50);
    expect(title.endsWith('...')).toBe(true);
    expect(title.startsWith('X')).toBe(true);
  });

  it('estimateTokens rounds up at four characters per token', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});
