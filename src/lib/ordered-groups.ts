/**
 * Buckets values under a key, remembering the order in which keys first appeared.
 * Iteration yields [key, members] in first-insertion order.
 */
export class OrderedGroups<K, V> implements Iterable<[K, ReadonlyArray<V>]> {
  private readonly keyOrder = new Array<K>();
  private readonly members = new Map<K, Array<V>>();

  add(key: K, value: V) {
    let list = this.members.get(key);
    if (!list) {
      list = [];
      this.keyOrder.push(key);
      this.members.set(key, list);
    }
    list.push(value);
  }

  get(key: K): ReadonlyArray<V> {
    return this.members.get(key) ?? [];
  }

  *[Symbol.iterator](): Iterator<[K, ReadonlyArray<V>]> {
    for (const key of this.keyOrder) {
      yield [key, this.get(key)];
    }
  }
}
