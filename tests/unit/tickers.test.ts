import { describe, expect, it } from 'vitest';
import { fileURLToPath } from 'url';
import { loadTickerFile, normalizeSymbol, parseTickerList } from '@/core/tickers';

describe('ticker list', () => {
  it('skips blanks and comments, upper-cases and de-duplicates in order', () => {
    const text = ['# watchlist', 'aapl', '', '  msft  ', 'AAPL', '# tech', 'nvda', 'Msft'].join('\n');

    expect(parseTickerList(text)).toEqual(['AAPL', 'MSFT', 'NVDA']);
  });

  it('handles CRLF line endings', () => {
    expect(parseTickerList('spy\r\nqqq\r\n')).toEqual(['SPY', 'QQQ']);
  });

  it('normalizes a single symbol', () => {
    expect(normalizeSymbol(' brk.b ')).toBe('BRK.B');
  });

  it('loads the bundled list', () => {
    const symbols = loadTickerFile(fileURLToPath(new URL('../../config/tickers.txt', import.meta.url)));

    expect(symbols[0]).toBe('AAPL');
    expect(symbols.every((s) => s === s.toUpperCase() && !s.startsWith('#'))).toBe(true);
  });
});
