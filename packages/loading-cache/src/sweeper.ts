/** Intervalos menores que isso são ignorados por `start()`. */
export const MIN_SWEEP_INTERVAL_MS = 1_000;

/**
 * Timer periódico que executa a limpeza de entries expiradas.
 * Reiniciar com outro intervalo substitui o timer anterior.
 */
export class Sweeper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private currentIntervalMs = 0;

  constructor(private readonly sweep: () => void) {}

  get intervalMs(): number {
    return this.currentIntervalMs;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Retorna `undefined` (e não mexe no timer atual) se o intervalo for menor que o mínimo.
   * Caso contrário retorna um handle que para somente o timer criado por esta chamada:
   * depois de um novo `start()`, handles antigos não fazem nada.
   */
  start(intervalMs: number): (() => void) | undefined {
    if (!(intervalMs >= MIN_SWEEP_INTERVAL_MS)) return undefined;

    this.stop();
    const timer = setInterval(this.sweep, intervalMs);
    // unref() para o timer não manter o processo Node.js vivo
    timer.unref();
    this.timer = timer;
    this.currentIntervalMs = intervalMs;

    return () => {
      if (this.timer === timer) this.stop();
    };
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.currentIntervalMs = 0;
  }
}
