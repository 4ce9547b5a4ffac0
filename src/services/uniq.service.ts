import { FeedRecord, PipeContext, RawConf, UniqConf } from "../domain/types";
import { ConfigurationError } from "../domain/errors";
import { UniqFilter, uniqueBy, uniqueByAsync } from "../ingest/uniq";
import { loadConfig } from "../config/config";
import { logger as defaultLogger, Logger } from "../config/logger";
import { describeType, getField, isFeedItem } from "../ingest/fields";

export interface UniqPipeOptions {
  conf?: UniqConf | RawConf;
  context?: PipeContext;
  logger?: Logger;
  /** Field used when conf has no uniq_key; defaults to UNIQ_DEFAULT_KEY or "title" */
  defaultKey?: string;
}

export const UNIQ_DEFAULTS: Readonly<{ uniq_key: string }> = Object.freeze({
  uniq_key: loadConfig().pipes.uniqDefaultKey,
});

function unwrapConfValue(raw: unknown): unknown {
  if (isFeedItem(raw) && "value" in raw) return raw.value;
  return raw;
}

/**
 * Resolves the field name to dedup on.
 * @throws ConfigurationError when uniq_key is present but not a non-empty string
 */
export function resolveUniqKey(conf: unknown, defaultKey: string = UNIQ_DEFAULTS.uniq_key): string {
  if (conf !== undefined && !isFeedItem(conf)) {
    throw new ConfigurationError(`uniq conf must be an object, got ${describeType(conf)}`);
  }

  const raw = conf ? unwrapConfValue(getField(conf, "uniq_key")) : undefined;
  const key = raw === undefined ? defaultKey : raw;
  if (typeof key !== "string") {
    throw new ConfigurationError(`uniq_key must be a string, got ${describeType(key)}`, {
      details: { uniq_key: raw },
    });
  }
  if (key.trim().length === 0) {
    throw new ConfigurationError("uniq_key must not be empty", { details: { uniq_key: key } });
  }
  return key;
}

interface PreparedRun {
  filter: UniqFilter;
  log: Logger;
  runId?: string;
}

/** How a run ended: input drained, consumer stopped early, or an item failed. */
export type RunOutcome = "exhausted" | "abandoned" | "failed";

function prepare(options: UniqPipeOptions): PreparedRun {
  const field = resolveUniqKey(options.conf, options.defaultKey);
  const log = (options.logger ?? defaultLogger).child("uniq");
  const onDrop =
    options.context?.verbose === true
      ? (_item: FeedRecord, index: number) => log.debug("drop", { index })
      : undefined;
  return { filter: new UniqFilter(field, onDrop), log, runId: options.context?.runId };
}

// start and done are logged from inside the generator body, so a run that is
// never pulled logs neither
function start(run: PreparedRun): void {
  run.log.debug("start", { field: run.filter.field, runId: run.runId });
}

function fail(run: PreparedRun, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  run.log.warn("failed", { field: run.filter.field, message });
}

function finish(run: PreparedRun, outcome: RunOutcome): void {
  run.log.debug("done", { field: run.filter.field, outcome, ...run.filter.stats() });
}

/**
 * Filters out items whose uniq_key field repeats an earlier item's value.
 * Configuration errors surface here, before any item is pulled; the result
 * is lazy and supports infinite feeds.
 */
export function pipe<T>(items: Iterable<T>, options: UniqPipeOptions = {}): Generator<T & FeedRecord, void, undefined> {
  const run = prepare(options);
  return (function* (): Generator<T & FeedRecord, void, undefined> {
    start(run);
    let outcome: RunOutcome = "abandoned";
    try {
      yield* uniqueBy(items, run.filter);
      outcome = "exhausted";
    } catch (err) {
      outcome = "failed";
      fail(run, err);
      throw err;
    } finally {
      finish(run, outcome);
    }
  })();
}

/** Async-iterator form of `pipe`, for feeds produced asynchronously. */
export function streamPipe(
  items: Iterable<unknown> | AsyncIterable<unknown>,
  options: UniqPipeOptions = {}
): AsyncGenerator<FeedRecord, void, undefined> {
  const run = prepare(options);
  return (async function* (): AsyncGenerator<FeedRecord, void, undefined> {
    start(run);
    let outcome: RunOutcome = "abandoned";
    try {
      yield* uniqueByAsync(items, run.filter);
      outcome = "exhausted";
    } catch (err) {
      outcome = "failed";
      fail(run, err);
      throw err;
    } finally {
      finish(run, outcome);
    }
  })();
}

/** Resolves with every unique item of a finite feed. */
export async function asyncPipe(
  items: Iterable<unknown> | AsyncIterable<unknown>,
  options: UniqPipeOptions = {}
): Promise<FeedRecord[]> {
  const out: FeedRecord[] = [];
  for await (const item of streamPipe(items, options)) {
    out.push(item);
  }
  return out;
}

export default pipe;
