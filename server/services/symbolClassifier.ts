import { ALWAYS_OPEN_SUFFIX } from '../../shared/constants.js';
import type { SymbolKind } from '../../shared/api-types.js';

/** Crypto pairs (`BTC-USD`) trade around the clock; everything else is an equity. */
export function classifySymbol(symbol: string): SymbolKind {
  return String(symbol || '')
    .trim()
    .toUpperCase()
    .endsWith(ALWAYS_OPEN_SUFFIX)
    ? 'always-open'
    : 'equity';
}

export function isEquity(symbol: string): boolean {
  return classifySymbol(symbol) === 'equity';
}

export function partitionSymbols<T extends { symbol: string }>(entries: readonly T[]): { equities: T[]; alwaysOpen: T[] } {
  const equities: T[] = [];
  const alwaysOpen: T[] = [];
  for (const entry of entries) {
    if (classifySymbol(entry.symbol) === 'always-open') {
      alwaysOpen.push(entry);
    } else {
      equities.push(entry);
    }
  }
  return { equities, alwaysOpen };
}
