// Pure domain types with no framework dependency and no I/O.

export type SymbolKind = "stock" | "crypto";

export interface TickerSymbol {
  readonly symbol: string;
  readonly kind: SymbolKind;
}

export interface Quote {
  readonly symbol: string;
  readonly price: number;
  readonly change: number;
  readonly changePercent: number;
  readonly volume?: number;
  readonly marketCap?: number;
  readonly fetchedAt: number; // epoch ms
}

export const TickerSymbol = (
  symbol: string,
  kind: SymbolKind = "stock",
): TickerSymbol => ({ symbol, kind });

/** Lookup key used by the cache: trimmed and upper-cased. */
export function normalizeSymbol(raw: string): string {
  return raw.trim().toUpperCase();
}

/** Crypto is configured either bare (`BTC`) or as a dollar pair (`BTC-USD`). */
export const CRYPTO_QUOTE_SUFFIX = "-USD";

export function stripQuoteSuffix(symbol: string): string {
  return symbol.endsWith(CRYPTO_QUOTE_SUFFIX)
    ? symbol.slice(0, -CRYPTO_QUOTE_SUFFIX.length)
    : symbol;
}
