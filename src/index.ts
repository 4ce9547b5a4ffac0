import { FeedEnvelope, FeedRequestBody, FeedResult } from "./domain/types";
import { ConfigurationError, InputTypeError } from "./domain/errors";
import { logger as defaultLogger, Logger } from "./config/logger";
import { asyncPipe } from "./services/uniq.service";
import { describeType, isFeedItem } from "./ingest/fields";

export function parseFeedBody(body: unknown): FeedRequestBody {
  if (!isFeedItem(body)) {
    throw new InputTypeError(`feed body must be an object, got ${describeType(body)}`);
  }
  if (!Array.isArray(body.items)) {
    throw new InputTypeError(`feed body "items" must be an array, got ${describeType(body.items)}`);
  }
  const { conf } = body;
  if (conf !== undefined && !isFeedItem(conf)) {
    throw new ConfigurationError(`feed body "conf" must be an object, got ${describeType(conf)}`);
  }
  return { items: body.items, conf };
}

export async function handleFeed(envelope: FeedEnvelope, log: Logger = defaultLogger): Promise<FeedResult> {
  log.debug("feed:start", { source: envelope.source, receivedAt: envelope.receivedAt });
  const { items, conf } = parseFeedBody(envelope.body);

  const unique = await asyncPipe(items, { conf, context: envelope.context, logger: log });

  const result: FeedResult = { received: items.length, emitted: unique.length, items: unique };
  log.info("feed:done", { source: envelope.source, received: result.received, emitted: result.emitted });
  return result;
}

export { pipe, asyncPipe, streamPipe, resolveUniqKey, UNIQ_DEFAULTS } from "./services/uniq.service";
export type { UniqPipeOptions } from "./services/uniq.service";
export { UniqFilter, uniqueBy, uniqueByAsync } from "./ingest/uniq";
export { getField, isFeedItem, isFeedRecord } from "./ingest/fields";
export * from "./domain/errors";
export * from "./domain/types";

export default handleFeed;
