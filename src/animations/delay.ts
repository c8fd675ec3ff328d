interface Sleeper {
  timer: ReturnType<typeof setTimeout>;
  resolve: (interrupted: boolean) => void;
}

/**
 * Attente interruptible: `wait()` dort au plus `ms` millisecondes mais rend
 * la main dès que le signal est levé par `set()`, y compris s'il l'était
 * déjà avant l'appel.
 */
export class CancellableDelay {
  private flag = false;
  private readonly sleepers = new Set<Sleeper>();

  get isSet(): boolean {
    return this.flag;
  }

  /** Lève le signal et réveille toutes les attentes en cours. */
  set(): void {
    this.flag = true;
    for (const s of this.sleepers) {
      clearTimeout(s.timer);
      s.resolve(true);
    }
    this.sleepers.clear();
  }

  /** Réarme le signal (les attentes suivantes dorment à nouveau). */
  clear(): void {
    this.flag = false;
  }

  /**
   * @returns `true` si l'attente a été interrompue par le signal, `false` si la durée s'est écoulée
   */
  wait(ms: number): Promise<boolean> {
    if (this.flag) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const sleeper: Sleeper = {
        timer: setTimeout(() => {
          this.sleepers.delete(sleeper);
          resolve(false);
        }, Math.max(0, ms)),
        resolve,
      };
      this.sleepers.add(sleeper);
    });
  }
}
