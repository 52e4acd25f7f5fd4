/**
 * Ticker list handling - one symbol per line, '#' starts a comment line
 */

import { readFileSync } from 'fs';

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function parseTickerList(text: string): string[] {
  const seen = new Set<string>();
  const symbols: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const symbol = normalizeSymbol(trimmed);
    if (seen.has(symbol)) continue;
    seen.add(symbol);
    symbols.push(symbol);
  }

  return symbols;
}

export function loadTickerFile(path: string): string[] {
  return parseTickerList(readFileSync(path, 'utf-8'));
}
