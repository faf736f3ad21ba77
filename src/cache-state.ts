// Quote cache: pure entry store.
//
// Lookups:
//   Fresh   → cached quote no older than the staleness threshold
//   Stale   → cached quote older than the threshold (still shown)
//   Unknown → never fetched
//
// This module contains only types and pure functions over immutable maps
// and sets. The Effect shell (quote-cache.ts) swaps them in and out of Refs.

import type { Quote, TickerSymbol } from "./domain.ts";
import {
  describeFailure,
  type QuoteSourceError,
  type SymbolFailure,
  SymbolNotFound,
} from "./quote-source.ts";

// --- Lookup ---

export type Fresh = { readonly _tag: "Fresh"; readonly quote: Quote; readonly ageMs: number };
export type Stale = { readonly _tag: "Stale"; readonly quote: Quote; readonly ageMs: number };
export type Unknown = { readonly _tag: "Unknown"; readonly symbol: string };

export type Lookup = Fresh | Stale | Unknown;

export const Fresh = (quote: Quote, ageMs: number): Fresh => ({
  _tag: "Fresh",
  quote,
  ageMs,
});

export const Stale = (quote: Quote, ageMs: number): Stale => ({
  _tag: "Stale",
  quote,
  ageMs,
});

export const Unknown = (symbol: string): Unknown => ({
  _tag: "Unknown",
  symbol,
});

/** Classify a cache entry against the staleness threshold. The boundary is
 *  inclusive: an entry exactly `thresholdMs` old is still fresh. */
export function classify(
  symbol: string,
  entry: Quote | undefined,
  now: number,
  thresholdMs: number,
): Lookup {
  if (entry === undefined) return Unknown(symbol);
  const ageMs = Math.max(0, now - entry.fetchedAt);
  return ageMs <= thresholdMs ? Fresh(entry, ageMs) : Stale(entry, ageMs);
}

// --- Entries ---

export type Entries = ReadonlyMap<string, Quote>;

export const emptyEntries: Entries = new Map();

/** Replace entries with newer quotes. A quote older than the one already
 *  cached for its symbol is dropped, so fetchedAt never moves backwards. */
export function commit(entries: Entries, quotes: Iterable<Quote>): Entries {
  const next = new Map(entries);
  for (const quote of quotes) {
    const current = next.get(quote.symbol);
    if (current !== undefined && current.fetchedAt > quote.fetchedAt) continue;
    next.set(quote.symbol, quote);
  }
  return next;
}

// --- In-flight claims ---

export interface Claim {
  readonly claimed: ReadonlyArray<string>;
  readonly skipped: ReadonlyArray<string>;
}

/** Claim every symbol not already in flight. */
export function claim(
  inFlight: ReadonlySet<string>,
  symbols: ReadonlyArray<string>,
): [Claim, ReadonlySet<string>] {
  const next = new Set(inFlight);
  const claimed: string[] = [];
  const skipped: string[] = [];
  for (const symbol of symbols) {
    if (next.has(symbol)) {
      skipped.push(symbol);
    } else {
      next.add(symbol);
      claimed.push(symbol);
    }
  }
  return [{ claimed, skipped }, next];
}

export function release(
  inFlight: ReadonlySet<string>,
  symbols: Iterable<string>,
): ReadonlySet<string> {
  const next = new Set(inFlight);
  for (const symbol of symbols) next.delete(symbol);
  return next;
}

export function chunk<A>(items: ReadonlyArray<A>, size: number): A[][] {
  const chunks: A[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// --- Settling a fetch against what was requested ---

export interface Settled {
  readonly succeeded: ReadonlyMap<string, Quote>;
  readonly failed: ReadonlyMap<string, SymbolFailure>;
}

/** Keep only requested symbols, re-key each quote to the requested symbol,
 *  and count a requested symbol that came back with neither a quote nor a
 *  reason as not found. */
export function settle(
  requested: ReadonlyArray<TickerSymbol>,
  quotes: ReadonlyMap<string, Quote>,
  reasons: ReadonlyMap<string, SymbolFailure> = new Map(),
): Settled {
  const succeeded = new Map<string, Quote>();
  const failed = new Map<string, SymbolFailure>();
  for (const { symbol } of requested) {
    const quote = quotes.get(symbol);
    if (quote !== undefined) {
      succeeded.set(symbol, { ...quote, symbol });
    } else {
      failed.set(symbol, reasons.get(symbol) ?? new SymbolNotFound({ symbol }));
    }
  }
  return { succeeded, failed };
}

// --- Failure records ---

export interface FailureRecord {
  readonly symbol: string;
  readonly reason: string;
  readonly message: string;
  readonly attempts: number;
  readonly failedAt: number;
}

export type Failures = ReadonlyMap<string, FailureRecord>;

/** One record per symbol left pending once retries are exhausted. */
export function failureRecords(
  pending: ReadonlyArray<string>,
  error: QuoteSourceError,
  attempts: number,
  failedAt: number,
): FailureRecord[] {
  return pending.map((symbol) => {
    const cause = error._tag === "PartialFailure"
      ? error.failed.get(symbol) ?? new SymbolNotFound({ symbol })
      : error;
    return {
      symbol,
      reason: cause._tag,
      message: describeFailure(cause),
      attempts,
      failedAt,
    };
  });
}

export function recordFailures(
  failures: Failures,
  records: Iterable<FailureRecord>,
): Failures {
  const next = new Map(failures);
  for (const record of records) next.set(record.symbol, record);
  return next;
}

export function clearFailures(
  failures: Failures,
  symbols: Iterable<string>,
): Failures {
  const next = new Map(failures);
  for (const symbol of symbols) next.delete(symbol);
  return next;
}
