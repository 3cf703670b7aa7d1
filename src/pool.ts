/**
 * Map `items` through `fn` with at most `limit` calls in flight.
 *
 * Workers pull the next entry from a shared cursor and write into a
 * pre-sized slot, so results keep input order whatever order they finish in.
 * `fn` is expected to contain its own faults; a rejection rejects the whole map.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const queue = items.map((item, index) => ({ item, index }));
  const slots = new Array<R>(items.length);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (true) {
      const next = queue[cursor];
      cursor += 1;
      if (!next) {
        return;
      }
      slots[next.index] = await fn(next.item, next.index);
    }
  };

  const workerCount = Math.min(Math.max(1, limit), items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return slots;
}
