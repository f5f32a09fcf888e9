import type { CacheEntry } from './cache-entry.js';
import { EntryStore } from './entry-store.js';
import { CacheEventEmitter } from './events.js';
import { LoadGroup } from './load-group.js';
import { Sweeper } from './sweeper.js';
import { Status } from './types.js';
import type {
  CacheEvent,
  CacheEventHandler,
  CacheOptions,
  CacheResult,
  CacheStats,
  EvictReason,
  LoadResult,
  Loader,
} from './types.js';

const DEFAULT_REFRESH_GRACE_MS = 3_000;

/**
 * Cache em memória com TTL, LRU, loader opcional e coalescing de loads concorrentes.
 *
 * Estrutura interna:
 * - store: map + lista LRU (ver EntryStore)
 * - group: loads em voo por chave (single-flight)
 * - sweeper: limpeza periódica de entries expiradas
 * - emitter: event emitter tipado para observabilidade
 *
 * Estados de um `get()`:
 * 1. MISS: sem loader retorna `not-found`; com loader aguarda o load (compartilhado)
 * 2. FRESH: retorna o valor
 * 3. STALE: sem loader retorna o valor antigo com `stale`; com loader retorna o
 *    valor antigo com sucesso e dispara um refresh em background
 */
export class LoadingCache<K, V> {
  private readonly store: EntryStore<K, V>;
  private readonly emitter = new CacheEventEmitter<K, V>();
  private readonly group = new LoadGroup<K, V>((key, value) => {
    this.write(key, value);
    this.emitter.emit('load', key, value);
  });
  private readonly sweeper = new Sweeper(() => this.sweep());

  private ttlMs: number;
  private refreshGraceMs: number;
  private loader: Loader<K, V> | undefined;
  private readonly onEvict: ((key: K, value: V, reason: EvictReason) => void) | undefined;
  private readonly onRefreshError: ((key: K, error: unknown) => void) | undefined;

  private stats = {
    hits: 0,
    misses: 0,
    stale: 0,
    loads: 0,      // Execuções reais do loader (chamadas coalescidas não contam)
    evictions: 0,  // Remoções por LRU ou expiração
  };

  constructor(options?: CacheOptions<K, V>) {
    this.store = new EntryStore<K, V>(options?.maxEntries ?? 0);
    this.ttlMs = options?.ttlMs ?? 0;
    this.refreshGraceMs = options?.refreshGraceMs ?? DEFAULT_REFRESH_GRACE_MS;
    this.loader = options?.loader;
    this.onEvict = options?.onEvict;
    this.onRefreshError = options?.onRefreshError;

    if (options?.sweepIntervalMs !== undefined) {
      this.setSweepInterval(options.sweepIntervalMs);
    }
  }

  // ─── Configuração ──────────────────────────────────────────

  /** 0 desativa a expiração. */
  setTimeToLive(ms: number): void {
    this.ttlMs = ms;
  }

  /** 0 desativa a eviction LRU. */
  setMaxEntries(count: number): void {
    this.store.maxEntries = count;
  }

  /**
   * Inicia (ou reinicia) a limpeza periódica de entries expiradas.
   * Intervalos abaixo de 1s são ignorados e retornam `undefined`.
   * Caso contrário retorna uma função que para o sweeper iniciado por esta chamada.
   */
  setSweepInterval(ms: number): (() => void) | undefined {
    return this.sweeper.start(ms);
  }

  setLoader(loader: Loader<K, V> | undefined): void {
    this.loader = loader;
  }

  setRefreshGrace(ms: number): void {
    this.refreshGraceMs = ms;
  }

  // ─── Leitura ───────────────────────────────────────────────

  async get(key: K): Promise<CacheResult<V>> {
    const entry = this.store.read(key);

    // 1. MISS
    if (!entry) {
      this.stats.misses++;
      this.emitter.emit('miss', key);
      const loader = this.loader;
      if (!loader) {
        return { value: undefined, status: Status.Failure, error: 'not-found' };
      }
      const result = await this.group.resolve(key, this.counted(loader));
      return toCacheResult(result);
    }

    const now = Date.now();

    // 2. FRESH: só mexe na ordem LRU quando existe teto configurado
    if (!entry.isExpired(now, this.ttlMs)) {
      if (this.store.maxEntries > 0) {
        this.store.touch(entry);
      }
      this.stats.hits++;
      this.emitter.emit('hit', key, entry.value);
      return { value: entry.value, status: Status.Success };
    }

    // 3. STALE
    this.stats.stale++;
    this.emitter.emit('stale', key, entry.value);
    const loader = this.loader;
    if (!loader) {
      return { value: entry.value, status: Status.Failure, error: 'stale' };
    }

    // Dentro da janela de graça o refresh já foi disparado por outro caller.
    // O heartbeat não muda: só uma escrita bem-sucedida o renova.
    if (!entry.isRefreshing(now)) {
      this.store.beginRefresh(entry, now + this.refreshGraceMs);
      this.refreshInBackground(key, loader);
    }
    return { value: entry.value, status: Status.Success };
  }

  /** Lê sem promover na LRU, sem loader e sem contar estatísticas. */
  peek(key: K): CacheResult<V> {
    const entry = this.store.read(key);
    if (!entry) {
      return { value: undefined, status: Status.Failure, error: 'not-found' };
    }
    if (entry.isExpired(Date.now(), this.ttlMs)) {
      return { value: entry.value, status: Status.Failure, error: 'stale' };
    }
    return { value: entry.value, status: Status.Success };
  }

  // ─── Escrita ───────────────────────────────────────────────

  put(key: K, value: V): void {
    this.write(key, value);
  }

  /** Retorna false se a chave não existia. */
  delete(key: K): boolean {
    const entry = this.store.delete(key);
    if (!entry) return false;
    this.reportRemoval(entry, 'manual');
    return true;
  }

  clear(): void {
    for (const entry of this.store.clear()) {
      this.reportRemoval(entry, 'clear');
    }
  }

  /** Número de entries, incluindo as expiradas que ainda não foram limpas. */
  len(): number {
    return this.store.size;
  }

  get size(): number {
    return this.store.size;
  }

  /** Chaves da mais recente para a menos recente (inclui entries expiradas). */
  keys(): IterableIterator<K> {
    return this.store.keys();
  }

  /** Remove manualmente todas as entries expiradas. */
  prune(): void {
    this.sweep();
  }

  // ─── Observabilidade ───────────────────────────────────────

  getStats(): CacheStats {
    return { ...this.stats, size: this.store.size };
  }

  /** Quantos loads estão em voo agora. */
  get inflight(): number {
    return this.group.inflight;
  }

  /** Retorna uma função que remove o handler. */
  on<E extends CacheEvent>(event: E, handler: CacheEventHandler<K, V, E>): () => void {
    return this.emitter.on(event, handler);
  }

  off<E extends CacheEvent>(event: E, handler: CacheEventHandler<K, V, E>): void {
    this.emitter.off(event, handler);
  }

  /** Para o sweeper e remove todos os listeners. */
  dispose(): void {
    this.sweeper.stop();
    this.emitter.clear();
  }

  // ─── Internal ──────────────────────────────────────────────

  private write(key: K, value: V): void {
    const { evicted } = this.store.write(key, value, Date.now());
    if (evicted) {
      this.reportRemoval(evicted, 'evicted');
    }
    this.emitter.emit('set', key, value);
  }

  /**
   * Refresh fire-and-forget. Passa pelo mesmo group dos misses, então nunca há
   * dois loads simultâneos para a chave. Se falhar, o valor stale continua no store.
   */
  private refreshInBackground(key: K, loader: Loader<K, V>): void {
    void this.group.resolve(key, this.counted(loader)).then(
      (result) => {
        if (result.status !== Status.Success) {
          this.emitter.emit('refresh-failed', key, result.status);
        }
      },
      (error: unknown) => {
        this.emitter.emit('refresh-failed', key, Status.Failure, error);
        this.onRefreshError?.(key, error);
      },
    );
  }

  private counted(loader: Loader<K, V>): Loader<K, V> {
    return (key) => {
      this.stats.loads++;
      return loader(key);
    };
  }

  private sweep(): void {
    for (const entry of this.store.removeExpired(Date.now(), this.ttlMs)) {
      this.reportRemoval(entry, 'expired');
    }
  }

  private reportRemoval(entry: CacheEntry<K, V>, reason: EvictReason): void {
    if (reason === 'expired' || reason === 'evicted') {
      this.stats.evictions++;
    }
    this.onEvict?.(entry.key, entry.value, reason);
    this.emitter.emit('evict', entry.key, entry.value, reason);
  }
}

function toCacheResult<V>(result: LoadResult<V>): CacheResult<V> {
  if (result.status === Status.Success) {
    return { value: result.value, status: result.status };
  }
  return { value: result.value, status: result.status, error: 'loader-failure' };
}
