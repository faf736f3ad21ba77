// QuoteSourceTest: in-memory QuoteSource for development and tests.

import { Clock, Effect, Either, Layer, Schedule } from "effect";
import type { Quote } from "../domain.ts";
import { QuoteSource, settleBatch, SymbolNotFound } from "../quote-source.ts";

// --- Sample data ---

type SampleQuote = Omit<Quote, "fetchedAt">;

const samples: Record<string, SampleQuote> = {
  AAPL: {
    symbol: "AAPL",
    price: 150.25,
    change: 2.5,
    changePercent: 1.69,
    volume: 52_300_000,
    marketCap: 2_310_000_000_000,
  },
  GOOGL: {
    symbol: "GOOGL",
    price: 190.5,
    change: -2.1,
    changePercent: -1.09,
    volume: 21_800_000,
  },
  TSLA: {
    symbol: "TSLA",
    price: 385.2,
    change: 12.6,
    changePercent: 3.38,
    volume: 98_100_000,
  },
  BTC: {
    symbol: "BTC",
    price: 67250.0,
    change: -830.4,
    changePercent: -1.22,
  },
  ETH: {
    symbol: "ETH",
    price: 3120.75,
    change: 41.2,
    changePercent: 1.34,
  },
};

// --- Mock layer ---

export const QuoteSourceTestLive = Layer.succeed(
  QuoteSource,
  QuoteSource.of({
    fetch: (symbols) =>
      Effect.gen(function* () {
        const fetchedAt = yield* Clock.currentTimeMillis;
        return yield* settleBatch(
          symbols.map(({ symbol }) => {
            const sample = samples[symbol];
            return [
              symbol,
              sample !== undefined
                ? Either.right({ ...sample, fetchedAt })
                : Either.left(new SymbolNotFound({ symbol })),
            ] as const;
          }),
        );
      }),
    backoff: Schedule.spaced("1 second"),
  }),
);
