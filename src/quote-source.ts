// Quote source: service definition and fetch errors.

import { Context, Data, Effect, Either, type Schedule } from "effect";
import type { Quote, TickerSymbol } from "./domain.ts";

// --- Per-symbol failure reasons ---

export class FetchTransportError extends Data.TaggedError("FetchTransportError")<{
  readonly message: string;
  readonly status?: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export type SymbolFailure = FetchTransportError | ParseError | SymbolNotFound;

// --- Batch errors ---

export class FetchTimeout extends Data.TaggedError("FetchTimeout")<{
  readonly message: string;
}> {}

/** Some symbols of a batch were priced, others were not. */
export class PartialFailure extends Data.TaggedError("PartialFailure")<{
  readonly succeeded: ReadonlyMap<string, Quote>;
  readonly failed: ReadonlyMap<string, SymbolFailure>;
}> {}

export type QuoteSourceError = FetchTimeout | FetchTransportError | PartialFailure;

/** One-line reason for logs and failure records. */
export function describeFailure(error: SymbolFailure | FetchTimeout): string {
  switch (error._tag) {
    case "FetchTransportError":
    case "ParseError":
    case "FetchTimeout":
      return error.message;
    case "SymbolNotFound":
      return `no quote for ${error.symbol}`;
  }
}

// --- Service ---

export interface QuoteSourceShape {
  readonly fetch: (
    symbols: ReadonlyArray<TickerSymbol>,
  ) => Effect.Effect<ReadonlyMap<string, Quote>, QuoteSourceError>;

  /** Delay between retries of a failed fetch. The cache caps the number of
   *  recurrences with the plan's retry budget. */
  readonly backoff: Schedule.Schedule<unknown, unknown>;
}

export class QuoteSource extends Context.Tag("QuoteSource")<
  QuoteSource,
  QuoteSourceShape
>() {}

// --- Settling per-symbol results into a batch result ---

/** Turn per-symbol outcomes into the batch contract: every symbol priced →
 *  success; nothing priced and only transport failures → that transport
 *  error; anything else → PartialFailure. */
export function settleBatch(
  results: ReadonlyArray<readonly [string, Either.Either<Quote, SymbolFailure>]>,
): Effect.Effect<ReadonlyMap<string, Quote>, FetchTransportError | PartialFailure> {
  const succeeded = new Map<string, Quote>();
  const failed = new Map<string, SymbolFailure>();

  for (const [symbol, result] of results) {
    if (Either.isRight(result)) succeeded.set(symbol, result.right);
    else failed.set(symbol, result.left);
  }

  if (failed.size === 0) return Effect.succeed(succeeded);

  if (succeeded.size === 0) {
    const transport = [...failed.values()].filter(
      (e): e is FetchTransportError => e._tag === "FetchTransportError",
    );
    if (transport.length === failed.size) return Effect.fail(transport[0]);
  }

  return Effect.fail(new PartialFailure({ succeeded, failed }));
}
