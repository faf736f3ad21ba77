import { Command, Options } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Config,
  Console,
  Effect,
  Layer,
  Logger,
  LogLevel,
  Option,
  Schedule,
} from "effect";
import { decodeTickerConfig, readConfigFile } from "./src/config.ts";
import { makeQuoteCache, type RefreshingQuoteCache } from "./src/quote-cache.ts";
import { QuoteSourceTestLive } from "./src/providers/quote-source-mock.ts";
import { YahooFinanceLive } from "./src/providers/yahoo-finance.ts";
import {
  formatConfigError,
  formatFailure,
  formatTickerTape,
  type TickerFormatOptions,
} from "./src/format.ts";
import type { ConfigurationInvalid } from "./src/refresh-plan.ts";

// --- CLI ---

const config = Options.file("config").pipe(
  Options.withDescription("JSON ticker config (stock_symbols, crypto_symbols, update_interval, ...)"),
  Options.optional,
);

const stocks = Options.text("stocks").pipe(
  Options.withDescription("Comma-separated stock symbols, e.g. AAPL,GOOGL"),
  Options.optional,
);

const crypto = Options.text("crypto").pipe(
  Options.withDescription("Comma-separated crypto symbols, e.g. BTC,ETH"),
  Options.optional,
);

const interval = Options.integer("interval").pipe(
  Options.withDescription("Seconds between refreshes"),
  Options.optional,
);

const once = Options.boolean("once").pipe(
  Options.withDescription("Fetch once, print the tape and exit"),
);

const verbose = Options.boolean("verbose").pipe(
  Options.withDescription("Log refresh scheduling at debug level"),
);

const splitSymbols = (list: string) =>
  list.split(",").map((s) => s.trim()).filter((s) => s.length > 0);

const printTape = (cache: RefreshingQuoteCache, display: TickerFormatOptions) =>
  Effect.gen(function* () {
    const { symbols } = yield* cache.plan;
    const kinds = new Map(symbols.map(({ symbol, kind }) => [symbol, kind] as const));
    yield* Console.log(formatTickerTape(yield* cache.getAll, display, kinds));
  });

const printFailures = (cache: RefreshingQuoteCache) =>
  Effect.gen(function* () {
    const failures = yield* cache.failures;
    for (const record of failures.values()) {
      yield* Console.error(formatFailure(record));
    }
  });

const command = Command.make(
  "ticker",
  { config, stocks, crypto, interval, once, verbose },
).pipe(
  Command.withHandler(({ config, stocks, crypto, interval, once, verbose }) =>
    Effect.gen(function* () {
      const fromFile = Option.isSome(config) ? yield* readConfigFile(config.value) : {};
      const settings = yield* decodeTickerConfig({
        ...fromFile,
        ...Option.match(stocks, {
          onNone: () => ({}),
          onSome: (list) => ({ stock_symbols: splitSymbols(list) }),
        }),
        ...Option.match(crypto, {
          onNone: () => ({}),
          onSome: (list) => ({ crypto_symbols: splitSymbols(list) }),
        }),
        ...Option.match(interval, {
          onNone: () => ({}),
          onSome: (seconds) => ({ update_interval: seconds }),
        }),
      });

      const cache = yield* makeQuoteCache({
        stalenessThreshold: settings.stalenessThreshold,
      });
      yield* cache.configure(settings.plan);
      yield* cache.refresh;

      if (once) {
        yield* printTape(cache, settings.display);
        yield* printFailures(cache);
        return;
      }

      yield* printTape(cache, settings.display).pipe(
        Effect.repeat(Schedule.spaced("5 seconds")),
      );
    }).pipe(
      Effect.scoped,
      Logger.withMinimumLogLevel(verbose ? LogLevel.Debug : LogLevel.Info),
    )
  ),
);

// --- Layers ---
// Set TICKER_PROVIDER to "yahoo" (default) or "test".

const QuoteSourceLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("TICKER_PROVIDER").pipe(
      Config.withDefault("yahoo"),
    );
    switch (provider) {
      case "test":
        return QuoteSourceTestLive;
      default:
        return YahooFinanceLive;
    }
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

// --- Run ---

const cli = Command.run(command, {
  name: "ticker",
  version: "0.1.0",
});

const logConfigError = (e: ConfigurationInvalid) => Console.error(formatConfigError(e));

cli(process.argv).pipe(
  Effect.catchTags({
    ConfigurationInvalid: logConfigError,
  }),
  Effect.provide(QuoteSourceLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
