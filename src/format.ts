// Pure formatting functions, no I/O.

import type { Quote, SymbolKind } from "./domain.ts";
import type { FailureRecord, Lookup } from "./cache-state.ts";
import type { ConfigurationInvalid } from "./refresh-plan.ts";

// --- Options ---

/** How one kind of quote is rendered. */
export interface QuoteStyle {
  readonly showChange: boolean;
  readonly showPercentage: boolean;
  readonly showVolume: boolean;
  readonly showMarketCap: boolean;
  /** Replaces the `show*` layout when set, e.g. `{symbol}: ${price} ({change}%)`. */
  readonly template?: string;
}

export const defaultQuoteStyle: QuoteStyle = {
  showChange: true,
  showPercentage: true,
  showVolume: false,
  showMarketCap: false,
};

export interface TickerFormatOptions {
  readonly stock: QuoteStyle;
  readonly crypto: QuoteStyle;
  /** Appended to quotes older than the staleness threshold. */
  readonly staleMarker: string;
  readonly separator: string;
}

export const defaultFormatOptions: TickerFormatOptions = {
  stock: defaultQuoteStyle,
  crypto: defaultQuoteStyle,
  staleMarker: "*",
  separator: "   ",
};

export const NO_DATA = "No Data Available";

// --- Numbers ---

/** Fixed-point with an explicit sign; rounding to zero drops the minus. */
export function signed(value: number, digits: number): string {
  const fixed = value.toFixed(digits);
  if (Number(fixed) === 0) return `+${fixed.replace("-", "")}`;
  return value > 0 ? `+${fixed}` : fixed;
}

const COMPACT_UNITS: ReadonlyArray<readonly [number, string]> = [
  [1e12, "T"],
  [1e9, "B"],
  [1e6, "M"],
  [1e3, "K"],
];

export function formatCompact(value: number): string {
  for (const [size, unit] of COMPACT_UNITS) {
    if (Math.abs(value) >= size) return `${(value / size).toFixed(1)}${unit}`;
  }
  return String(Math.round(value));
}

// --- Quote formatting ---

export type ChangeDirection = "up" | "down" | "flat";

/** Which way the renderer should color the change. */
export function changeDirection(quote: Quote): ChangeDirection {
  if (Number(quote.change.toFixed(2)) === 0) return "flat";
  return quote.change > 0 ? "up" : "down";
}

/** `AAPL: $150.25 +2.50 (+1.7%)` */
export function formatQuote(
  quote: Quote,
  style: QuoteStyle = defaultQuoteStyle,
): string {
  if (style.template !== undefined) return renderTemplate(style.template, quote);

  const parts = [`${quote.symbol}: $${quote.price.toFixed(2)}`];
  if (style.showChange) parts.push(signed(quote.change, 2));
  if (style.showPercentage) parts.push(`(${signed(quote.changePercent, 1)}%)`);
  if (style.showVolume && quote.volume !== undefined) {
    parts.push(`Vol ${formatCompact(quote.volume)}`);
  }
  if (style.showMarketCap && quote.marketCap !== undefined) {
    parts.push(`MCap ${formatCompact(quote.marketCap)}`);
  }
  return parts.join(" ");
}

// --- Templates ---

const PLACEHOLDER = /\{(\w+)\}/g;

/** Placeholder values for a display template. `{change}` is the percent
 *  change, matching the `({change}%)` templates configs carry. */
function templateFields(quote: Quote): Record<string, string> {
  return {
    symbol: quote.symbol,
    price: quote.price.toFixed(2),
    change: signed(quote.changePercent, 1),
    change_amount: signed(quote.change, 2),
    volume: quote.volume === undefined ? "" : formatCompact(quote.volume),
    market_cap: quote.marketCap === undefined ? "" : formatCompact(quote.marketCap),
  };
}

/** Unknown placeholders are left as written. */
export function renderTemplate(template: string, quote: Quote): string {
  const fields = templateFields(quote);
  return template.replace(PLACEHOLDER, (match, name: string) => fields[name] ?? match);
}

// --- Lookups ---

export function formatLookup(
  lookup: Lookup,
  options: TickerFormatOptions = defaultFormatOptions,
  kind: SymbolKind = "stock",
): string {
  const style = options[kind];
  switch (lookup._tag) {
    case "Fresh":
      return formatQuote(lookup.quote, style);
    case "Stale":
      return `${formatQuote(lookup.quote, style)} ${options.staleMarker}`;
    case "Unknown":
      return `${lookup.symbol}: --`;
  }
}

/** One scrolling line for the whole plan. Symbols missing from `kinds`
 *  render as stocks. */
export function formatTickerTape(
  lookups: ReadonlyArray<Lookup>,
  options: TickerFormatOptions = defaultFormatOptions,
  kinds: ReadonlyMap<string, SymbolKind> = new Map(),
): string {
  if (lookups.every((l) => l._tag === "Unknown")) return NO_DATA;
  return lookups
    .map((l) => formatLookup(l, options, kinds.get(lookupSymbol(l)) ?? "stock"))
    .join(options.separator);
}

function lookupSymbol(lookup: Lookup): string {
  return lookup._tag === "Unknown" ? lookup.symbol : lookup.quote.symbol;
}

// --- Error formatting ---

export function formatFailure(record: FailureRecord): string {
  const tries = record.attempts === 1 ? "1 attempt" : `${record.attempts} attempts`;
  return `${record.symbol}: ${record.reason} after ${tries} (${record.message})`;
}

export function formatConfigError(error: ConfigurationInvalid): string {
  return `Invalid configuration: ${error.message}`;
}
