import { expect, test } from "vitest";
import { HttpClient, HttpClientResponse } from "@effect/platform";
import { Effect, Either, Layer } from "effect";
import { decodeYahooResponse, YahooFinanceLive, yahooSymbol } from "./yahoo-finance.ts";
import {
  type ParseError,
  QuoteSource,
  type QuoteSourceError,
  type SymbolNotFound,
} from "../quote-source.ts";
import { type Quote, TickerSymbol } from "../domain.ts";

// --- Test data ---

const FETCHED_AT = Date.parse("2024-02-09T18:00:00Z");

const validYahooResponse = {
  chart: {
    result: [
      {
        meta: {
          symbol: "GOOGL",
          regularMarketPrice: 190.5,
          chartPreviousClose: 188.0,
          regularMarketVolume: 21_800_000,
          currency: "USD",
          regularMarketTime: 1707505200,
        },
      },
    ],
    error: null,
  },
};

// --- Helpers ---

function decode(json: unknown): Promise<Either.Either<Quote, ParseError | SymbolNotFound>> {
  return Effect.runPromise(Effect.either(decodeYahooResponse(json, "GOOGL", FETCHED_AT)));
}

async function decodeSuccess(json: unknown): Promise<Quote> {
  const result = await decode(json);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left._tag}`);
  return result.right;
}

async function decodeFailure(json: unknown): Promise<ParseError | SymbolNotFound> {
  const result = await decode(json);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

// --- decodeYahooResponse ---

test("decodeYahooResponse: valid response produces Quote", async () => {
  const quote = await decodeSuccess(validYahooResponse);

  expect(quote.symbol).toBe("GOOGL");
  expect(quote.price).toBe(190.5);
  expect(quote.change).toBe(190.5 - 188.0);
  expect(quote.volume).toBe(21_800_000);
  expect(quote.fetchedAt).toBe(FETCHED_AT);
});

test("decodeYahooResponse: changePercent is calculated from previous close", async () => {
  const quote = await decodeSuccess(validYahooResponse);

  expect(quote.changePercent).toBe(((190.5 - 188.0) / 188.0) * 100);
});

test("decodeYahooResponse: quote is keyed by the requested symbol", async () => {
  const quote = await Effect.runPromise(
    decodeYahooResponse(validYahooResponse, "BTC", FETCHED_AT),
  );
  expect(quote.symbol).toBe("BTC");
});

test("decodeYahooResponse: null input returns ParseError", async () => {
  const error = await decodeFailure(null);
  expect(error._tag).toBe("ParseError");
});

test("decodeYahooResponse: non-object chart field returns ParseError", async () => {
  const error = await decodeFailure({ chart: "not-an-object" });
  expect(error._tag).toBe("ParseError");
});

test("decodeYahooResponse: empty results array returns SymbolNotFound", async () => {
  const error = await decodeFailure({ chart: { result: [], error: null } });
  expect(error._tag).toBe("SymbolNotFound");
});

test("decodeYahooResponse: API error is surfaced as SymbolNotFound", async () => {
  const error = await decodeFailure({
    chart: { result: null, error: { description: "No data found" } },
  });
  expect(error._tag).toBe("SymbolNotFound");
});

test("decodeYahooResponse: missing price returns ParseError", async () => {
  const error = await decodeFailure({
    chart: {
      result: [{ meta: { chartPreviousClose: 188.0 } }],
      error: null,
    },
  });
  expect(error._tag).toBe("ParseError");
});

test("decodeYahooResponse: falls back to previousClose", async () => {
  const quote = await decodeSuccess({
    chart: {
      result: [{ meta: { regularMarketPrice: 200.0, previousClose: 195.0 } }],
      error: null,
    },
  });
  expect(quote.change).toBe(5);
  expect(quote.volume).toBeUndefined();
});

test("decodeYahooResponse: missing previous close returns ParseError", async () => {
  const error = await decodeFailure({
    chart: {
      result: [{ meta: { regularMarketPrice: 190.5 } }],
      error: null,
    },
  });
  expect(error._tag).toBe("ParseError");
});

test("decodeYahooResponse: zero previous close returns ParseError", async () => {
  const error = await decodeFailure({
    chart: {
      result: [{ meta: { regularMarketPrice: 190.5, chartPreviousClose: 0 } }],
      error: null,
    },
  });
  expect(error._tag).toBe("ParseError");
});

// --- yahooSymbol ---

test("yahooSymbol: crypto is quoted against USD", () => {
  expect(yahooSymbol(TickerSymbol("BTC", "crypto"))).toBe("BTC-USD");
  expect(yahooSymbol(TickerSymbol("AAPL"))).toBe("AAPL");
});

// --- YahooFinanceLive over a stub HttpClient ---

/** Answers each request from `respond`, keyed by the last path segment. */
const stubHttp = (respond: (symbol: string, url: URL) => Response) =>
  Layer.succeed(
    HttpClient.HttpClient,
    HttpClient.make((request, url) =>
      Effect.succeed(
        HttpClientResponse.fromWeb(
          request,
          respond(decodeURIComponent(url.pathname.split("/").pop() ?? ""), url),
        ),
      )
    ),
  );

const chartFor = (price: number, previousClose: number) =>
  JSON.stringify({
    chart: {
      result: [{ meta: { regularMarketPrice: price, chartPreviousClose: previousClose } }],
      error: null,
    },
  });

function fetchVia(
  respond: (symbol: string, url: URL) => Response,
  symbols: ReadonlyArray<TickerSymbol>,
): Promise<Either.Either<ReadonlyMap<string, Quote>, QuoteSourceError>> {
  return Effect.gen(function* () {
    const source = yield* QuoteSource;
    return yield* Effect.either(source.fetch(symbols));
  }).pipe(
    Effect.provide(YahooFinanceLive.pipe(Layer.provide(stubHttp(respond)))),
    Effect.runPromise,
  );
}

test("YahooFinanceLive: 200 responses become quotes", async () => {
  const result = await fetchVia(
    () => new Response(chartFor(190.5, 188.0), { status: 200 }),
    [TickerSymbol("GOOGL")],
  );
  if (Either.isLeft(result)) throw new Error(`Expected quotes, got: ${result.left._tag}`);
  expect(result.right.get("GOOGL")).toMatchObject({ symbol: "GOOGL", price: 190.5, change: 2.5 });
});

test("YahooFinanceLive: crypto is requested as a USD pair with chart params", async () => {
  const requested: string[] = [];
  const result = await fetchVia(
    (symbol, url) => {
      requested.push(`${symbol}?${url.searchParams.toString()}`);
      return new Response(chartFor(67250, 68100), { status: 200 });
    },
    [TickerSymbol("BTC", "crypto")],
  );
  expect(requested).toEqual(["BTC-USD?interval=5m&range=1d"]);
  if (Either.isLeft(result)) throw new Error(`Expected quotes, got: ${result.left._tag}`);
  expect(result.right.get("BTC")).toMatchObject({ symbol: "BTC", price: 67250 });
});

test("YahooFinanceLive: 404 is SymbolNotFound for that symbol only", async () => {
  const result = await fetchVia(
    (symbol) =>
      symbol === "XYZ"
        ? new Response("Not Found", { status: 404 })
        : new Response(chartFor(150.25, 147.75), { status: 200 }),
    [TickerSymbol("AAPL"), TickerSymbol("XYZ")],
  );
  if (Either.isRight(result)) throw new Error("Expected PartialFailure but got quotes");
  const error = result.left;
  if (error._tag !== "PartialFailure") throw new Error(`Expected PartialFailure, got: ${error._tag}`);
  expect([...error.succeeded.keys()]).toEqual(["AAPL"]);
  expect(error.failed.get("XYZ")).toMatchObject({ _tag: "SymbolNotFound", symbol: "XYZ" });
});

test("YahooFinanceLive: other statuses are transport errors with the status", async () => {
  const result = await fetchVia(
    () => new Response("Service Unavailable", { status: 503 }),
    [TickerSymbol("AAPL"), TickerSymbol("MSFT")],
  );
  if (Either.isRight(result)) throw new Error("Expected FetchTransportError but got quotes");
  expect(result.left).toMatchObject({
    _tag: "FetchTransportError",
    message: "HTTP 503",
    status: 503,
  });
});

test("YahooFinanceLive: body that is not JSON is a ParseError", async () => {
  const result = await fetchVia(
    () => new Response("<html>rate limited</html>", { status: 200 }),
    [TickerSymbol("AAPL")],
  );
  if (Either.isRight(result)) throw new Error("Expected PartialFailure but got quotes");
  const error = result.left;
  if (error._tag !== "PartialFailure") throw new Error(`Expected PartialFailure, got: ${error._tag}`);
  expect(error.failed.get("AAPL")?._tag).toBe("ParseError");
});
