/**
 * LRU Cache
 *
 * Fixed-capacity map with least-recently-used eviction. A Map holds the nodes
 * and a doubly linked list keeps recency order, so get/set are O(1).
 */

export interface LRUCacheConfig<K, V> {
  /** Maximum number of entries, at least 1 */
  capacity: number;
  /** Called after an entry has been pushed out by a newer one */
  onEvict?: (key: K, value: V) => void;
}

export interface LRUCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

class LRUNode<K, V> {
  prev: LRUNode<K, V> | null = null;
  next: LRUNode<K, V> | null = null;

  constructor(
    readonly key: K,
    public value: V
  ) {}
}

export class LRUCache<K, V> {
  private readonly capacity: number;
  private readonly onEvict?: (key: K, value: V) => void;
  private readonly cache = new Map<K, LRUNode<K, V>>();
  private head: LRUNode<K, V> | null = null;
  private tail: LRUNode<K, V> | null = null;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(config: LRUCacheConfig<K, V>) {
    if (!Number.isInteger(config.capacity) || config.capacity < 1) {
      throw new RangeError(`LRU cache capacity must be a positive integer, got ${config.capacity}`);
    }
    this.capacity = config.capacity;
    this.onEvict = config.onEvict;
  }

  /**
   * Value for `key`, marking it most recently used
   */
  get(key: K): V | undefined {
    const node = this.cache.get(key);
    if (!node) {
      this.misses++;
      return undefined;
    }

    this.moveToFront(node);
    this.hits++;
    return node.value;
  }

  set(key: K, value: V): void {
    const existing = this.cache.get(key);
    if (existing) {
      existing.value = value;
      this.moveToFront(existing);
      return;
    }

    while (this.cache.size >= this.capacity && this.tail) {
      this.evictOldest();
    }

    const node = new LRUNode(key, value);
    this.cache.set(key, node);
    this.addToFront(node);
  }

  getStats(): LRUCacheStats {
    return {
      size: this.cache.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private addToFront(node: LRUNode<K, V>): void {
    node.prev = null;
    node.next = this.head;

    if (this.head) {
      this.head.prev = node;
    }
    this.head = node;

    if (!this.tail) {
      this.tail = node;
    }
  }

  private removeNode(node: LRUNode<K, V>): void {
    if (node.prev) {
      node.prev.next = node.next;
    } else {
      this.head = node.next;
    }

    if (node.next) {
      node.next.prev = node.prev;
    } else {
      this.tail = node.prev;
    }

    node.prev = null;
    node.next = null;
  }

  private moveToFront(node: LRUNode<K, V>): void {
    if (node === this.head) return;
    this.removeNode(node);
    this.addToFront(node);
  }

  private evictOldest(): void {
    const node = this.tail;
    if (!node) return;

    this.removeNode(node);
    this.cache.delete(node.key);
    this.evictions++;
    this.onEvict?.(node.key, node.value);
  }
}
