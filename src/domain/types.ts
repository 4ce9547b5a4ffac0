/** A plain-object feed item, as items arrive over the wire. */
export type FeedItem = Record<string, unknown>;

/**
 * Anything the uniq stage reads fields from: a `Map`, or any non-array object
 * (plain, null-prototype or a class instance). Checked at run time.
 */
export type FeedRecord = object;

/**
 * A pipe configuration value. Pipe definitions store field values either
 * bare or wrapped, e.g. `{ type: "text", value: "title" }`.
 */
export type ConfValue<T> = T | { type?: string; value?: T };

export interface UniqConf {
  uniq_key?: ConfValue<string>;
}

/** Conf as received over the wire, validated when the pipe resolves it. */
export type RawConf = Record<string, unknown>;

/** Invocation context handed down by the pipeline engine. */
export interface PipeContext {
  runId?: string;
  /** Log every dropped item at debug level */
  verbose?: boolean;
  [extra: string]: unknown;
}

export interface UniqStats {
  received: number;
  emitted: number;
  dropped: number;
  distinctKeys: number;
}

export interface FeedEnvelope {
  source: "HTTP" | "LAMBDA" | "HARNESS";
  body: unknown;
  context?: PipeContext;
  receivedAt: string; // ISO 8601
}

export interface FeedRequestBody {
  items: unknown[];
  conf?: RawConf;
}

export interface FeedResult {
  received: number;
  emitted: number;
  items: FeedRecord[];
}
