/**
 * Ascending integer id counter.
 * Ids are unique for the lifetime of the counter, not only of a flow.
 */
export class IdCounter {
  private ctr = -1;

  /**
   * Increases the counter and returns the new count. Starting value is 0
   */
  next(): number {
    this.ctr += 1;
    return this.ctr;
  }

  /**
   * Last id handed out, -1 if none
   */
  get current(): number {
    return this.ctr;
  }

  /**
   * Moves the counter forward, e.g. past the ids of loaded content
   * @throws Error when the count would decrease
   */
  setCount(count: number): void {
    if (count < this.ctr) {
      throw new Error(`Decreasing id counters is illegal (${this.ctr} -> ${count})`);
    }
    this.ctr = count;
  }
}

/**
 * Counter shared by flows that were not given one explicitly
 */
export const defaultIdCounter = new IdCounter();

/**
 * Table from ids recorded in exported data to the objects recreated from it.
 * Rebuilt for every load.
 */
export class IdRemap<T> {
  private readonly table = new Map<number, T>();

  register(prevId: number, obj: T): void {
    this.table.set(prevId, obj);
  }

  resolve(prevId: number): T | undefined {
    return this.table.get(prevId);
  }

  get size(): number {
    return this.table.size;
  }

  entries(): IterableIterator<[number, T]> {
    return this.table.entries();
  }
}
