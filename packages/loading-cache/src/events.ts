import type { CacheEvent, CacheEventHandler, CacheEventMap } from './types.js';

type Listeners<K, V> = { [E in CacheEvent]: Set<CacheEventHandler<K, V, E>> };

/**
 * Emitter com payload tipado por evento (ver `CacheEventMap`).
 * Um conjunto de handlers fixo por evento, criado junto com o emitter.
 */
export class CacheEventEmitter<K, V> {
  private readonly listeners: Listeners<K, V> = {
    hit: new Set(),
    miss: new Set(),
    stale: new Set(),
    set: new Set(),
    evict: new Set(),
    load: new Set(),
    'refresh-failed': new Set(),
  };

  /** Retorna uma função que remove o handler. */
  on<E extends CacheEvent>(event: E, handler: CacheEventHandler<K, V, E>): () => void {
    this.listeners[event].add(handler);
    return () => this.off(event, handler);
  }

  off<E extends CacheEvent>(event: E, handler: CacheEventHandler<K, V, E>): void {
    this.listeners[event].delete(handler);
  }

  emit<E extends CacheEvent>(event: E, ...args: CacheEventMap<K, V>[E]): void {
    for (const handler of this.listeners[event]) {
      handler(...args);
    }
  }

  clear(): void {
    for (const set of Object.values(this.listeners)) {
      set.clear();
    }
  }
}
