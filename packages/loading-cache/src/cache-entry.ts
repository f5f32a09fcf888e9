/**
 * Entry do cache. Também é o nó da lista LRU (prev/next), então
 * map e lista apontam sempre para o mesmo objeto.
 */
export class CacheEntry<K, V> {
  prev: CacheEntry<K, V> | null = null;
  next: CacheEntry<K, V> | null = null;
  /**
   * Até quando um refresh em background já disparado cobre esta entry (ms).
   * 0 = nenhum refresh pendente. Não altera o heartbeat.
   */
  refreshUntil = 0;

  constructor(
    readonly key: K,
    public value: V,
    // Timestamp (ms) da última escrita confirmada
    public heartbeat: number,
  ) {}

  /** Expirada quando heartbeat + ttl já passou. ttl <= 0 desativa a expiração. */
  isExpired(now: number, ttlMs: number): boolean {
    return ttlMs > 0 && this.heartbeat + ttlMs < now;
  }

  /** Um refresh foi disparado há pouco e ainda está dentro da janela de graça. */
  isRefreshing(now: number): boolean {
    return this.refreshUntil >= now;
  }
}
