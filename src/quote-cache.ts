// Refreshing quote cache: Effect shell.
//
// Wires the pure entry store (cache-state.ts) to Ref, Clock and one
// scheduler fiber per symbol kind. Readers only touch Refs, so `get` never waits on the
// quote source; batches run on daemon fibers that `shutdown` drains.

import {
  Clock,
  Context,
  Deferred,
  Duration,
  Effect,
  Exit,
  Fiber,
  Layer,
  Option,
  Queue,
  Ref,
  Schedule,
  type Scope,
} from "effect";
import {
  normalizeSymbol,
  type Quote,
  stripQuoteSuffix,
  type SymbolKind,
  type TickerSymbol,
} from "./domain.ts";
import {
  chunk,
  claim,
  classify,
  clearFailures,
  commit,
  emptyEntries,
  type Entries,
  type FailureRecord,
  type Failures,
  failureRecords,
  type Lookup,
  recordFailures,
  release,
  settle,
} from "./cache-state.ts";
import { FetchTimeout, PartialFailure, QuoteSource } from "./quote-source.ts";
import {
  type ConfigurationInvalid,
  idlePlan,
  makeRefreshPlan,
  type RefreshPlan,
  type RefreshPlanInput,
} from "./refresh-plan.ts";

// Re-export the lookup types so consumers only need one import.
export type { FailureRecord, Fresh, Lookup, Stale, Unknown } from "./cache-state.ts";

// --- Config ---

export interface QuoteCacheOptions {
  /** Maximum age at which a cached quote is still reported as Fresh. */
  readonly stalenessThreshold: Duration.DurationInput;
  /** Initial plan; the first tick runs as soon as the cache starts. */
  readonly plan?: RefreshPlan;
  /** Symbols per call to the quote source. */
  readonly batchSize?: number;
  /** Batches allowed to run at the same time. */
  readonly concurrency?: number;
}

const DEFAULT_BATCH_SIZE = 10;
const DEFAULT_CONCURRENCY = 4;

const KINDS: ReadonlyArray<SymbolKind> = ["stock", "crypto"];

const intervalOf = (plan: RefreshPlan, kind: SymbolKind) =>
  kind === "crypto" ? plan.cryptoInterval : plan.interval;

// --- Results ---

export interface RefreshReport {
  readonly refreshed: ReadonlyArray<string>;
  readonly failed: ReadonlyArray<string>;
  /** Already in flight when the tick ran. */
  readonly skipped: ReadonlyArray<string>;
}

export type ShutdownResult = "drained" | "timed-out";

interface BatchOutcome {
  readonly refreshed: ReadonlyArray<string>;
  readonly failed: ReadonlyArray<string>;
}

type BatchFiber = Fiber.RuntimeFiber<BatchOutcome>;

// --- Cache ---

export interface RefreshingQuoteCache {
  /** Latest cached quote and how old it is. Never fails, never fetches. */
  readonly get: (symbol: string) => Effect.Effect<Lookup>;

  /** Lookups for every symbol of the active plan, in plan order. */
  readonly getAll: Effect.Effect<ReadonlyArray<Lookup>>;

  /** Replace the active plan. Nothing is fetched here: the next tick,
   *  still counted from the previous one, uses the new plan. */
  readonly configure: (
    input: RefreshPlanInput,
  ) => Effect.Effect<RefreshPlan, ConfigurationInvalid>;

  readonly plan: Effect.Effect<RefreshPlan>;

  /** Run one tick now and wait for the batches it started. */
  readonly refresh: Effect.Effect<RefreshReport>;

  /** Last exhausted-retry failure per symbol, cleared on the next success. */
  readonly failures: Effect.Effect<ReadonlyMap<string, FailureRecord>>;

  readonly inFlight: Effect.Effect<ReadonlySet<string>>;

  /** Wait for every batch currently in flight. */
  readonly awaitIdle: Effect.Effect<void>;

  /** Stop scheduling, then let in-flight batches commit, bounded by the
   *  plan's timeout. Safe to call more than once. */
  readonly shutdown: Effect.Effect<ShutdownResult>;
}

export function makeQuoteCache(
  options: QuoteCacheOptions,
): Effect.Effect<RefreshingQuoteCache, never, QuoteSource | Scope.Scope> {
  return Effect.gen(function* () {
    const source = yield* QuoteSource;
    const thresholdMs = Duration.toMillis(Duration.decode(options.stalenessThreshold));
    const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    const permits = yield* Effect.makeSemaphore(
      Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY),
    );

    const entries = yield* Ref.make<Entries>(emptyEntries);
    const failures = yield* Ref.make<Failures>(new Map());
    const planRef = yield* Ref.make<RefreshPlan>(options.plan ?? idlePlan);
    const inFlight = yield* Ref.make<ReadonlySet<string>>(new Set());
    const batches = yield* Ref.make<ReadonlyArray<BatchFiber>>([]);
    const stopped = yield* Ref.make(false);
    const stoppedWith = yield* Deferred.make<ShutdownResult>();
    // Serializes launches with the shutdown snapshot of `batches`.
    const launching = yield* Effect.makeSemaphore(1);

    // --- Reads ---

    const get = (symbol: string): Effect.Effect<Lookup> =>
      Effect.gen(function* () {
        const raw = normalizeSymbol(symbol);
        const current = yield* Ref.get(entries);
        const key = current.has(raw) ? raw : stripQuoteSuffix(raw);
        const now = yield* Clock.currentTimeMillis;
        return classify(key, current.get(key), now, thresholdMs);
      });

    const getAll = Effect.gen(function* () {
      const { symbols } = yield* Ref.get(planRef);
      const current = yield* Ref.get(entries);
      const now = yield* Clock.currentTimeMillis;
      return symbols.map(({ symbol }) =>
        classify(symbol, current.get(symbol), now, thresholdMs)
      );
    });

    // --- Writes ---

    const commitQuotes = (quotes: ReadonlyMap<string, Quote>) =>
      quotes.size === 0 ? Effect.void : Ref.update(entries, (e) => commit(e, quotes.values())).pipe(
        Effect.zipRight(Ref.update(failures, (f) => clearFailures(f, quotes.keys()))),
      );

    /** One call to the source for the symbols still pending. Succeeded
     *  symbols are committed straight away; the rest stay pending and the
     *  attempt fails so the retry schedule can take over. */
    const attempt = (
      pending: Ref.Ref<ReadonlyArray<TickerSymbol>>,
      attempts: Ref.Ref<number>,
      plan: RefreshPlan,
    ) =>
      Effect.gen(function* () {
        // A retry woken after shutdown began never reaches the source.
        if ((yield* Ref.get(attempts)) > 0 && (yield* Ref.get(stopped))) {
          yield* Effect.logDebug("cache stopping, retry dropped");
          return yield* Effect.interrupt;
        }
        const symbols = yield* Ref.get(pending);
        yield* Ref.update(attempts, (n) => n + 1);

        const settled = yield* source.fetch(symbols).pipe(
          Effect.timeoutFail({
            duration: plan.timeout,
            onTimeout: () =>
              new FetchTimeout({
                message: `no response within ${Duration.toMillis(plan.timeout)}ms`,
              }),
          }),
          Effect.map((quotes) => settle(symbols, quotes)),
          Effect.catchTag("PartialFailure", (e) =>
            Effect.succeed(settle(symbols, e.succeeded, e.failed))),
        );

        yield* commitQuotes(settled.succeeded);

        if (settled.failed.size > 0) {
          yield* Ref.set(pending, symbols.filter(({ symbol }) => settled.failed.has(symbol)));
          return yield* Effect.fail(new PartialFailure(settled));
        }
      });

    const runBatch = (
      batch: ReadonlyArray<TickerSymbol>,
      plan: RefreshPlan,
    ): Effect.Effect<BatchOutcome> => {
      const names = batch.map(({ symbol }) => symbol);
      const policy = source.backoff.pipe(
        Schedule.compose(Schedule.recurs(plan.maxRetries)),
        Schedule.whileInputEffect(() => Effect.map(Ref.get(stopped), (s) => !s)),
      );
      return Effect.gen(function* () {
        const pending = yield* Ref.make(batch);
        const attempts = yield* Ref.make(0);

        return yield* attempt(pending, attempts, plan).pipe(
          Effect.retry(policy),
          Effect.as<BatchOutcome>({ refreshed: names, failed: [] }),
          Effect.catchAll((error) =>
            Effect.gen(function* () {
              const left = (yield* Ref.get(pending)).map(({ symbol }) => symbol);
              const tries = yield* Ref.get(attempts);
              const now = yield* Clock.currentTimeMillis;
              yield* Ref.update(failures, (f) =>
                recordFailures(f, failureRecords(left, error, tries, now)));
              yield* Effect.logWarning("refresh failed, keeping cached quotes").pipe(
                Effect.annotateLogs({ symbols: left.join(","), reason: error._tag, attempts: tries }),
              );
              return {
                refreshed: names.filter((name) => !left.includes(name)),
                failed: left,
              };
            })
          ),
        );
      }).pipe(
        permits.withPermits(1),
        Effect.ensuring(Ref.update(inFlight, (s) => release(s, names))),
      );
    };

    // --- Scheduling ---

    /** Claim every plan symbol (of `kind`, if given) not in flight and
     *  fork its batches. Runs uninterruptibly so a claim is never left
     *  without a batch to release it, and does nothing once stopped. */
    const launch = (
      plan: RefreshPlan,
      kind?: SymbolKind,
    ): Effect.Effect<{
      readonly forked: ReadonlyArray<BatchFiber>;
      readonly skipped: ReadonlyArray<string>;
    }> =>
      Effect.gen(function* () {
        if (yield* Ref.get(stopped)) return { forked: [], skipped: [] };

        const wanted = kind === undefined
          ? plan.symbols
          : plan.symbols.filter((s) => s.kind === kind);
        const { claimed, skipped } = yield* Ref.modify(inFlight, (s) =>
          claim(s, wanted.map(({ symbol }) => symbol)));
        const todo = wanted.filter(({ symbol }) => claimed.includes(symbol));

        const forked = yield* Effect.forEach(
          chunk(todo, batchSize),
          (batch) => Effect.forkDaemon(Effect.interruptible(runBatch(batch, plan))),
        );

        const running = yield* Ref.get(batches).pipe(
          Effect.flatMap((live) =>
            Effect.filter(live, (f) => Effect.map(Fiber.poll(f), Option.isNone))
          ),
        );
        yield* Ref.set(batches, [...running, ...forked]);

        if (skipped.length > 0) {
          yield* Effect.logDebug("symbols still in flight, skipped").pipe(
            Effect.annotateLogs({ symbols: skipped.join(",") }),
          );
        }
        return { forked, skipped };
      }).pipe(launching.withPermits(1), Effect.uninterruptible);

    // One timer per kind, each counted from its own last tick. A plan change
    // wakes the timer to re-read the interval; it never restarts the count.
    const startedAt = yield* Clock.currentTimeMillis;
    const timers = yield* Effect.forEach(KINDS, (kind) =>
      Effect.gen(function* () {
        const lastTick = yield* Ref.make(startedAt);
        const replans = yield* Queue.sliding<void>(1);

        const nextTick = Effect.gen(function* () {
          const interval = intervalOf(yield* Ref.get(planRef), kind);
          const now = yield* Clock.currentTimeMillis;
          const at = Math.max(now, (yield* Ref.get(lastTick)) + Duration.toMillis(interval));
          const due = yield* Effect.raceFirst(
            Effect.sleep(Duration.millis(at - now)).pipe(Effect.as(true)),
            Queue.take(replans).pipe(Effect.as(false)),
          );
          if (!due) return;
          yield* Ref.set(lastTick, at);
          yield* launch(yield* Ref.get(planRef), kind);
        });

        return { replans, nextTick };
      }));

    // First tick runs now; the scheduler fibers only wait for the next ones.
    yield* launch(yield* Ref.get(planRef));
    const schedulers = yield* Effect.forEach(timers, ({ nextTick }) =>
      Effect.forkDaemon(Effect.forever(nextTick).pipe(Effect.interruptible)));

    // --- Operations ---

    const configure = (input: RefreshPlanInput) =>
      Effect.gen(function* () {
        const plan = yield* makeRefreshPlan(input);
        yield* Ref.set(planRef, plan);
        yield* Effect.forEach(timers, ({ replans }) => Queue.offer(replans, undefined), {
          discard: true,
        });
        yield* Effect.logInfo("refresh plan updated").pipe(
          Effect.annotateLogs({
            symbols: plan.symbols.map(({ symbol }) => symbol).join(","),
            intervalMs: Duration.toMillis(plan.interval),
            cryptoIntervalMs: Duration.toMillis(plan.cryptoInterval),
            priority: plan.priority,
          }),
        );
        return plan;
      });

    const refresh = Effect.gen(function* () {
      const { forked, skipped } = yield* launch(yield* Ref.get(planRef));
      const exits = yield* Effect.forEach(forked, (f) => Fiber.await(f));

      const refreshed: string[] = [];
      const failed: string[] = [];
      for (const exit of exits) {
        if (Exit.isSuccess(exit)) {
          refreshed.push(...exit.value.refreshed);
          failed.push(...exit.value.failed);
        }
      }
      return { refreshed, failed, skipped } satisfies RefreshReport;
    });

    const awaitIdle = Ref.get(batches).pipe(
      Effect.flatMap((live) => Effect.forEach(live, (f) => Fiber.await(f), { discard: true })),
    );

    const shutdown = Effect.gen(function* () {
      if (yield* Ref.getAndSet(stopped, true)) {
        return yield* Deferred.await(stoppedWith);
      }

      yield* Fiber.interruptAll(schedulers);

      const { timeout } = yield* Ref.get(planRef);
      // No launch can add a batch after this snapshot: it sees `stopped`.
      const live = yield* launching.withPermits(1)(Ref.get(batches));
      const drained = yield* Effect.forEach(live, (f) => Fiber.await(f), { discard: true }).pipe(
        Effect.timeoutOption(timeout),
        Effect.interruptible,
      );

      let result: ShutdownResult = "drained";
      if (Option.isNone(drained)) {
        // Commits are single Ref updates, so interrupting here cannot
        // leave a half-written quote behind.
        yield* Fiber.interruptAll(live);
        result = "timed-out";
      }

      yield* Effect.logInfo("quote cache stopped").pipe(Effect.annotateLogs({ result }));
      yield* Deferred.succeed(stoppedWith, result);
      return result;
    }).pipe(
      Effect.onInterrupt(() => Deferred.succeed(stoppedWith, "timed-out")),
      Effect.uninterruptible,
    );

    yield* Effect.addFinalizer(() => shutdown);

    return {
      get,
      getAll,
      configure,
      plan: Ref.get(planRef),
      refresh,
      failures: Ref.get(failures),
      inFlight: Ref.get(inFlight),
      awaitIdle,
      shutdown,
    } satisfies RefreshingQuoteCache;
  });
}

// --- Layer ---

export class QuoteCache extends Context.Tag("QuoteCache")<
  QuoteCache,
  RefreshingQuoteCache
>() {}

export const QuoteCacheLive = (options: QuoteCacheOptions) =>
  Layer.scoped(QuoteCache, makeQuoteCache(options));
