// Yahoo Finance: implementation of QuoteSource.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Clock, Config, Effect, Layer, Schedule, Schema } from "effect";
import type { Quote, TickerSymbol } from "../domain.ts";
import {
  FetchTransportError,
  ParseError,
  QuoteSource,
  settleBatch,
  type SymbolFailure,
  SymbolNotFound,
} from "../quote-source.ts";

// --- Yahoo response schema ---

const YahooMeta = Schema.Struct({
  regularMarketPrice: Schema.Number,
  chartPreviousClose: Schema.optional(Schema.Number),
  previousClose: Schema.optional(Schema.Number),
  regularMarketVolume: Schema.optional(Schema.Number),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(Schema.Struct({ meta: YahooMeta }))),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooChartResponseType = typeof YahooChartResponse.Type;

/** Yahoo prices crypto as a pair against the dollar. */
export function yahooSymbol({ symbol, kind }: TickerSymbol): string {
  return kind === "crypto" ? `${symbol}-USD` : symbol;
}

// --- Decode Yahoo response into Quote ---

export function decodeYahooResponse(
  json: unknown,
  symbol: string,
  fetchedAt: number,
): Effect.Effect<Quote, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap((response) => interpretYahooResponse(response, symbol, fetchedAt)),
  );
}

function interpretYahooResponse(
  response: YahooChartResponseType,
  symbol: string,
  fetchedAt: number,
): Effect.Effect<Quote, ParseError | SymbolNotFound> {
  const { chart } = response;

  if (chart.error !== null || chart.result === null || chart.result.length === 0) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }

  const meta = chart.result[0].meta;
  const previousClose = meta.chartPreviousClose ?? meta.previousClose;

  if (previousClose === undefined || previousClose === 0) {
    return Effect.fail(
      new ParseError({
        message: "Missing or invalid 'previousClose'",
      }),
    );
  }

  const change = meta.regularMarketPrice - previousClose;
  const changePercent = (change / previousClose) * 100;

  return Effect.succeed({
    symbol,
    price: meta.regularMarketPrice,
    change,
    changePercent,
    volume: meta.regularMarketVolume,
    fetchedAt,
  });
}

// --- Yahoo Finance layer ---

export const YahooFinanceLive = Layer.effect(
  QuoteSource,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(
        HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
      ),
    );
    const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
      Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
    );
    const concurrency = yield* Config.integer("YAHOO_CONCURRENCY").pipe(
      Config.withDefault(4),
    );

    const fetchOne = (
      ticker: TickerSymbol,
    ): Effect.Effect<Quote, SymbolFailure> =>
      Effect.gen(function* () {
        const response = yield* client.get(
          `${baseUrl}/${encodeURIComponent(yahooSymbol(ticker))}`,
          { urlParams: { interval: "5m", range: "1d" } },
        );
        const json = yield* response.json;
        const fetchedAt = yield* Clock.currentTimeMillis;
        return yield* decodeYahooResponse(json, ticker.symbol, fetchedAt);
      }).pipe(
        Effect.scoped,
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new FetchTransportError({ message: e.message })),
          ResponseError: (e) => {
            if (e.reason !== "StatusCode") {
              return Effect.fail(
                new ParseError({ message: `JSON parse failed: ${e.message}` }),
              );
            }
            return e.response.status === 404
              ? Effect.fail(new SymbolNotFound({ symbol: ticker.symbol }))
              : Effect.fail(
                new FetchTransportError({
                  message: `HTTP ${e.response.status}`,
                  status: e.response.status,
                }),
              );
          },
        }),
      );

    return QuoteSource.of({
      fetch: (symbols) =>
        Effect.forEach(
          symbols,
          (ticker) =>
            fetchOne(ticker).pipe(
              Effect.either,
              Effect.map((result) => [ticker.symbol, result] as const),
            ),
          { concurrency },
        ).pipe(Effect.flatMap(settleBatch)),
      backoff: Schedule.exponential("1 second"),
    });
  }),
);
