/**
 * Lazy pagination over cursor/link based endpoints.
 *
 * A stream pulls one page at a time: every item of the current page is
 * yielded before the next page is requested, and nothing is prefetched.
 * Fetch failures surface from the iterator immediately. Streams are one-pass;
 * restarting means issuing the initial request again.
 */

export interface Page<T> {
  items: T[];
  /** Opaque continuation pointer. Absent on the last page. */
  next?: string;
}

export type FetchPage<T> = (next: string) => Promise<Page<T>>;

/**
 * Walk pagination starting from an already fetched page.
 */
export async function* pagerStream<T>(start: Page<T>, fetchNext: FetchPage<T>): AsyncGenerator<T, void, undefined> {
  let current: Page<T> | undefined = start;

  while (current) {
    yield* current.items;
    current = current.next !== undefined ? await fetchNext(current.next) : undefined;
  }
}

/**
 * Like pagerStream, but the initial request is only issued on first pull.
 */
export async function* streamPages<T>(
  fetchFirst: () => Promise<Page<T>>,
  fetchNext: FetchPage<T>,
): AsyncGenerator<T, void, undefined> {
  const first = await fetchFirst();
  yield* pagerStream(first, fetchNext);
}

/** Drain an async sequence into an array. */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
