import { Status } from './types.js';
import type { LoadResult, Loader } from './types.js';

/**
 * Coalescing de loads por chave (single-flight).
 *
 * Enquanto um load está em voo, todas as chamadas para a mesma chave recebem a
 * mesma promise, então o loader roda uma única vez e todos observam o mesmo
 * `(value, status)`. A promise sai do map assim que o loader termina, com
 * sucesso ou falha: o resultado nunca fica guardado aqui, só no store (via `commit`).
 */
export class LoadGroup<K, V> {
  private readonly calls = new Map<K, Promise<LoadResult<V>>>();

  /** `commit` é chamado com o valor somente quando o loader retorna `Status.Success`. */
  constructor(private readonly commit: (key: K, value: V) => void) {}

  get inflight(): number {
    return this.calls.size;
  }

  has(key: K): boolean {
    return this.calls.has(key);
  }

  resolve(key: K, loader: Loader<K, V>): Promise<LoadResult<V>> {
    const existing = this.calls.get(key);
    if (existing) return existing;

    // O loader roda numa microtask: mesmo um throw síncrono vira rejeição
    // depois que a chamada já foi registrada no map.
    const call = Promise.resolve()
      .then(() => loader(key))
      .then((result) => {
        if (result.status === Status.Success && result.value !== undefined) {
          this.commit(key, result.value);
        }
        return result;
      })
      .finally(() => {
        this.calls.delete(key);
      });

    this.calls.set(key, call);
    return call;
  }
}
