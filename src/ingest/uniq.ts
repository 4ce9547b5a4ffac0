import { FeedRecord, UniqStats } from "../domain/types";
import { InputTypeError, KeyExtractionError } from "../domain/errors";
import { SeenSet, describeType, getField, isFeedRecord, toSeenKey } from "./fields";

export type DropHook = (item: FeedRecord, index: number) => void;

/**
 * First-occurrence filter for one run. Owns the seen-set; `accept` decides a
 * single item and is shared by the sync and async drivers below.
 */
export class UniqFilter {
  private readonly seen = new SeenSet();
  private received = 0;
  private emitted = 0;

  constructor(
    public readonly field: string,
    private readonly onDrop?: DropHook
  ) {}

  /**
   * @returns true when the item's key has not been seen in this run
   * @throws InputTypeError if the item is a primitive, null or an array
   * @throws KeyExtractionError if the key cannot be compared
   */
  accept(item: unknown): boolean {
    const index = this.received++;
    if (!isFeedRecord(item)) {
      throw new InputTypeError(`feed item ${index} must be a field mapping, got ${describeType(item)}`, index);
    }

    const value = getField(item, this.field);
    const result = toSeenKey(value);
    if (!result.ok) {
      throw new KeyExtractionError(index, this.field, result.reason, {
        details: { valueType: describeType(value) },
      });
    }

    if (!this.seen.remember(result.key)) {
      this.onDrop?.(item, index);
      return false;
    }
    this.emitted++;
    return true;
  }

  stats(): UniqStats {
    return {
      received: this.received,
      emitted: this.emitted,
      dropped: this.received - this.emitted,
      distinctKeys: this.seen.size,
    };
  }
}

function toFilter(keyOrFilter: string | UniqFilter): UniqFilter {
  return typeof keyOrFilter === "string" ? new UniqFilter(keyOrFilter) : keyOrFilter;
}

/** Lazily yields the first item for each distinct value of the field. */
export function* uniqueBy<T>(
  items: Iterable<T>,
  keyOrFilter: string | UniqFilter
): Generator<T & FeedRecord, void, undefined> {
  const filter = toFilter(keyOrFilter);
  for (const item of items) {
    // accept throws for anything that is not a record
    if (filter.accept(item) && isFeedRecord(item)) yield item;
  }
}

export async function* uniqueByAsync(
  items: Iterable<unknown> | AsyncIterable<unknown>,
  keyOrFilter: string | UniqFilter
): AsyncGenerator<FeedRecord, void, undefined> {
  const filter = toFilter(keyOrFilter);
  for await (const item of items) {
    if (filter.accept(item) && isFeedRecord(item)) yield item;
  }
}
