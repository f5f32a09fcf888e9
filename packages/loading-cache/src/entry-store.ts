import { CacheEntry } from './cache-entry.js';

export interface WriteOutcome<K, V> {
  entry: CacheEntry<K, V>;
  /** Entry removed from the back of the order to honour `maxEntries`. */
  evicted?: CacheEntry<K, V>;
}

/**
 * Armazena as entries e a ordem LRU.
 *
 * - map: lookup O(1) por chave
 * - head/tail: lista duplamente encadeada pelas próprias entries,
 *   MRU no head, candidata à eviction no tail
 *
 * Map e lista ficam sempre em correspondência 1:1. Todas as mutações são
 * síncronas, então nenhuma fica intercalada com outra no event loop.
 */
export class EntryStore<K, V> {
  private readonly map = new Map<K, CacheEntry<K, V>>();
  private head: CacheEntry<K, V> | null = null;
  private tail: CacheEntry<K, V> | null = null;

  /** Teto de entries. 0 (ou negativo) desativa a eviction. */
  maxEntries: number;

  constructor(maxEntries = 0) {
    this.maxEntries = maxEntries;
  }

  get size(): number {
    return this.map.size;
  }

  /** Lookup puro, não altera a ordem LRU. */
  read(key: K): CacheEntry<K, V> | undefined {
    return this.map.get(key);
  }

  /**
   * Escreve o valor com heartbeat = `now` e promove a entry para o head.
   * Se a chave já existe, atualiza no lugar (quem guardou o valor antigo
   * continua com o snapshot antigo) e encerra qualquer janela de refresh.
   * Depois remove no máximo uma entry do tail se o teto foi ultrapassado.
   */
  write(key: K, value: V, now: number): WriteOutcome<K, V> {
    let entry = this.map.get(key);
    if (entry) {
      entry.value = value;
      entry.heartbeat = now;
      entry.refreshUntil = 0;
      this.touch(entry);
    } else {
      entry = new CacheEntry(key, value, now);
      this.map.set(key, entry);
      this.linkFront(entry);
    }

    const evicted = this.evictOne();
    return evicted ? { entry, evicted } : { entry };
  }

  /** Promove a entry para o head (MRU). */
  touch(entry: CacheEntry<K, V>): void {
    if (entry === this.head) return;
    this.unlinkNode(entry);
    this.linkFront(entry);
  }

  /** Marca que um refresh cobre a entry até `until`, sem mexer no heartbeat. */
  beginRefresh(entry: CacheEntry<K, V>, until: number): void {
    entry.refreshUntil = until;
  }

  delete(key: K): CacheEntry<K, V> | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;
    this.remove(entry);
    return entry;
  }

  /** Esvazia map e lista, retornando o que estava armazenado. */
  clear(): CacheEntry<K, V>[] {
    const removed = [...this.map.values()];
    for (const entry of removed) {
      entry.prev = null;
      entry.next = null;
    }
    this.map.clear();
    this.head = null;
    this.tail = null;
    return removed;
  }

  /** Remove todas as entries com heartbeat + ttl antes de `now`. */
  removeExpired(now: number, ttlMs: number): CacheEntry<K, V>[] {
    if (ttlMs <= 0) return [];
    const removed: CacheEntry<K, V>[] = [];
    for (const entry of this.map.values()) {
      if (entry.isExpired(now, ttlMs)) {
        this.remove(entry);
        removed.push(entry);
      }
    }
    return removed;
  }

  /** Chaves do mais recente para o menos recente. */
  *keys(): IterableIterator<K> {
    for (let node = this.head; node; node = node.next) {
      yield node.key;
    }
  }

  private evictOne(): CacheEntry<K, V> | undefined {
    if (this.maxEntries <= 0 || this.map.size <= this.maxEntries) return undefined;
    const victim = this.tail;
    if (!victim) return undefined;
    this.remove(victim);
    return victim;
  }

  private remove(entry: CacheEntry<K, V>): void {
    this.unlinkNode(entry);
    this.map.delete(entry.key);
  }

  private linkFront(entry: CacheEntry<K, V>): void {
    entry.prev = null;
    entry.next = this.head;
    if (this.head) this.head.prev = entry;
    this.head = entry;
    if (!this.tail) this.tail = entry;
  }

  private unlinkNode(entry: CacheEntry<K, V>): void {
    if (entry.prev) entry.prev.next = entry.next;
    else this.head = entry.next;
    if (entry.next) entry.next.prev = entry.prev;
    else this.tail = entry.prev;
    entry.prev = null;
    entry.next = null;
  }
}
