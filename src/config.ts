// Ticker configuration: decoding and bounds.
//
// Keys follow the plugin's JSON config (snake_case, durations in seconds).
// Unknown keys are ignored so a host config can carry its own settings.

import { FileSystem } from "@effect/platform";
import { Duration, Effect, Schema } from "effect";
import { TickerSymbol } from "./domain.ts";
import {
  defaultFormatOptions,
  defaultQuoteStyle,
  type TickerFormatOptions,
} from "./format.ts";
import {
  ConfigurationInvalid,
  makeRefreshPlan,
  type RefreshPlan,
} from "./refresh-plan.ts";

// --- Raw schema ---

// Stock settings are unprefixed; crypto has its own change flags and
// template, and never shows volume or market cap.
const DisplaySettings = Schema.Struct({
  show_change: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  show_percentage: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  show_volume: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  show_market_cap: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  display_format: Schema.optional(Schema.String),
  crypto_show_change: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  crypto_show_percentage: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  crypto_display_format: Schema.optional(Schema.String),
});

export const RawTickerConfig = Schema.Struct({
  stocks_enabled: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  stock_symbols: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
  crypto_enabled: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  crypto_symbols: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
  update_interval: Schema.optionalWith(Schema.Number, { default: () => 600 }),
  crypto_update_interval: Schema.optional(Schema.Number),
  timeout: Schema.optionalWith(Schema.Number, { default: () => 10 }),
  max_retries: Schema.optionalWith(Schema.Number, { default: () => 3 }),
  priority: Schema.optionalWith(Schema.Number, { default: () => 0 }),
  staleness_threshold: Schema.optional(Schema.Number),
  display: Schema.optionalWith(DisplaySettings, {
    default: () => ({
      show_change: true,
      show_percentage: true,
      show_volume: false,
      show_market_cap: false,
      crypto_show_change: true,
      crypto_show_percentage: true,
    }),
  }),
});

export type RawTickerConfig = typeof RawTickerConfig.Type;

// --- Decoded config ---

export interface TickerConfig {
  readonly plan: RefreshPlan;
  readonly stalenessThreshold: Duration.Duration;
  readonly display: TickerFormatOptions;
}

/** Without an explicit threshold, a quote stays fresh across one missed
 *  refresh. */
const DEFAULT_STALENESS_FACTOR = 2;

function fromRaw(
  raw: RawTickerConfig,
): Effect.Effect<TickerConfig, ConfigurationInvalid> {
  return Effect.gen(function* () {
    const symbols = [
      ...(raw.stocks_enabled ? raw.stock_symbols.map((s) => TickerSymbol(s, "stock")) : []),
      ...(raw.crypto_enabled ? raw.crypto_symbols.map((s) => TickerSymbol(s, "crypto")) : []),
    ];

    const plan = yield* makeRefreshPlan({
      symbols,
      interval: Duration.millis(raw.update_interval * 1000),
      cryptoInterval: raw.crypto_update_interval === undefined
        ? undefined
        : Duration.millis(raw.crypto_update_interval * 1000),
      timeout: Duration.millis(raw.timeout * 1000),
      maxRetries: raw.max_retries,
      priority: raw.priority,
    });

    if (raw.staleness_threshold !== undefined && !(raw.staleness_threshold > 0)) {
      return yield* new ConfigurationInvalid({
        message: "staleness_threshold must be positive",
      });
    }

    const stalenessThreshold = raw.staleness_threshold === undefined
      ? Duration.times(plan.interval, DEFAULT_STALENESS_FACTOR)
      : Duration.millis(raw.staleness_threshold * 1000);

    return {
      plan,
      stalenessThreshold,
      display: displayOptions(raw.display),
    };
  });
}

function displayOptions(display: RawTickerConfig["display"]): TickerFormatOptions {
  return {
    ...defaultFormatOptions,
    stock: {
      showChange: display.show_change,
      showPercentage: display.show_percentage,
      showVolume: display.show_volume,
      showMarketCap: display.show_market_cap,
      template: display.display_format,
    },
    crypto: {
      ...defaultQuoteStyle,
      showChange: display.crypto_show_change,
      showPercentage: display.crypto_show_percentage,
      template: display.crypto_display_format,
    },
  };
}

export function decodeTickerConfig(
  input: unknown,
): Effect.Effect<TickerConfig, ConfigurationInvalid> {
  return Schema.decodeUnknown(RawTickerConfig)(input).pipe(
    Effect.mapError(
      (e) => new ConfigurationInvalid({ message: `Invalid config: ${e.message}` }),
    ),
    Effect.flatMap(fromRaw),
  );
}

// --- Config file ---

/** Read a JSON config file as a plain object, ready to be merged with
 *  command-line overrides before decoding. */
export function readConfigFile(
  path: string,
): Effect.Effect<Record<string, unknown>, ConfigurationInvalid, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const text = yield* fs.readFileString(path).pipe(
      Effect.mapError(
        (e) => new ConfigurationInvalid({ message: `Cannot read ${path}: ${e.message}` }),
      ),
    );
    const json: unknown = yield* Effect.try({
      try: () => JSON.parse(text),
      catch: () => new ConfigurationInvalid({ message: `${path} is not valid JSON` }),
    });
    if (!isRecord(json)) {
      return yield* new ConfigurationInvalid({ message: `${path} must contain a JSON object` });
    }
    return json;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
