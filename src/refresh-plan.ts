// Refresh plan: validation and normalization of what the cache fetches.
//
// Pure: data in, Either out. Bounds are enforced here, at configuration
// time, so the refresh loop never has to re-check them.

import { Data, Duration, Either } from "effect";
import {
  normalizeSymbol,
  stripQuoteSuffix,
  type SymbolKind,
  TickerSymbol,
} from "./domain.ts";

// --- Error ---

export class ConfigurationInvalid extends Data.TaggedError("ConfigurationInvalid")<{
  readonly message: string;
}> {}

// --- Bounds ---

export const MIN_INTERVAL = Duration.seconds(1);
export const MAX_INTERVAL = Duration.hours(24);
export const MAX_TIMEOUT = Duration.minutes(5);
export const MAX_RETRIES = 10;

// --- Plan ---

export interface RefreshPlan {
  readonly symbols: ReadonlyArray<TickerSymbol>;
  readonly interval: Duration.Duration;
  /** Tick spacing for crypto symbols; equal to `interval` unless set. */
  readonly cryptoInterval: Duration.Duration;
  readonly timeout: Duration.Duration;
  readonly maxRetries: number;
  /** Passed through for a scheduler shared between consumers; the cache
   *  itself does not order work by it. */
  readonly priority: number;
}

export interface RefreshPlanInput {
  /** Bare strings are stock symbols. */
  readonly symbols: Iterable<TickerSymbol | string>;
  readonly interval: Duration.DurationInput;
  readonly cryptoInterval?: Duration.DurationInput;
  readonly timeout: Duration.DurationInput;
  readonly maxRetries: number;
  readonly priority?: number;
}

/** Plan of a cache that has not been configured yet. */
export const idlePlan: RefreshPlan = {
  symbols: [],
  interval: Duration.minutes(1),
  cryptoInterval: Duration.minutes(1),
  timeout: Duration.seconds(10),
  maxRetries: 0,
  priority: 0,
};

const SYMBOL_PATTERN = /^[A-Z0-9^][A-Z0-9.=^-]{0,14}$/;

const invalid = (message: string) =>
  Either.left(new ConfigurationInvalid({ message }));

export function parseTickerSymbol(
  raw: string,
  kind: SymbolKind,
): Either.Either<TickerSymbol, ConfigurationInvalid> {
  const normalized = normalizeSymbol(raw);
  const symbol = kind === "crypto" ? stripQuoteSuffix(normalized) : normalized;
  return SYMBOL_PATTERN.test(symbol)
    ? Either.right(TickerSymbol(symbol, kind))
    : invalid(`Invalid ${kind} symbol: "${raw}"`);
}

export function makeRefreshPlan(
  input: RefreshPlanInput,
): Either.Either<RefreshPlan, ConfigurationInvalid> {
  const symbols: TickerSymbol[] = [];
  const seen = new Set<string>();

  for (const entry of input.symbols) {
    const parsed = typeof entry === "string"
      ? parseTickerSymbol(entry, "stock")
      : parseTickerSymbol(entry.symbol, entry.kind);
    if (Either.isLeft(parsed)) return Either.left(parsed.left);
    if (seen.has(parsed.right.symbol)) continue;
    seen.add(parsed.right.symbol);
    symbols.push(parsed.right);
  }

  const timeoutMs = Duration.toMillis(Duration.decode(input.timeout));
  if (!(timeoutMs > 0)) {
    return invalid("timeout must be positive");
  }
  if (timeoutMs > Duration.toMillis(MAX_TIMEOUT)) {
    return invalid(`timeout must not exceed ${Duration.toMillis(MAX_TIMEOUT) / 1000}s`);
  }

  const { maxRetries } = input;
  if (!Number.isInteger(maxRetries) || maxRetries < 0 || maxRetries > MAX_RETRIES) {
    return invalid(`max_retries must be an integer between 0 and ${MAX_RETRIES}`);
  }

  const priority = input.priority ?? 0;
  if (!Number.isInteger(priority)) {
    return invalid("priority must be an integer");
  }

  const interval = clampInterval(input.interval);

  return Either.right({
    symbols,
    interval,
    cryptoInterval: input.cryptoInterval === undefined
      ? interval
      : clampInterval(input.cryptoInterval),
    timeout: Duration.millis(timeoutMs),
    maxRetries,
    priority,
  });
}

/** Out-of-range intervals are clamped rather than rejected. */
function clampInterval(input: Duration.DurationInput): Duration.Duration {
  return Duration.clamp(Duration.decode(input), { minimum: MIN_INTERVAL, maximum: MAX_INTERVAL });
}
