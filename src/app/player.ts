import { logger } from "../logger";
import type { LedAnimation } from "../animations";
import type { AnimationName } from "../animations/types";

interface PlayingEntry {
  animation: LedAnimation;
  done: Promise<void>;
}

/**
 * Joue au plus une animation à la fois sur un ruban.
 * Lancer une nouvelle animation arrête (et attend) la précédente.
 */
export class AnimationPlayer {
  private current: PlayingEntry | null = null;

  /** Nom de l'animation en cours, ou null. */
  get active(): AnimationName | null {
    return this.current?.animation.name ?? null;
  }

  /**
   * Démarre `animation` après l'arrêt de la précédente.
   * La promesse se résout à la fin de l'animation et rejette avec l'erreur du ruban le cas échéant.
   */
  async play(animation: LedAnimation, timeoutMs?: number | null, oneShot?: boolean): Promise<void> {
    while (this.current) await this.stop();
    logger.info(`▶ ${animation.name}${timeoutMs ? ` (timeout ${timeoutMs}ms)` : ""}${oneShot ? " [one-shot]" : ""}`);
    const entry: PlayingEntry = { animation, done: animation.start(timeoutMs, oneShot) };
    this.current = entry;
    try {
      await entry.done;
    } finally {
      if (this.current === entry) this.current = null;
    }
  }

  /** Arrête l'animation en cours et attend sa fin. Sans effet si rien ne joue. */
  async stop(): Promise<void> {
    const entry = this.current;
    if (!entry) return;
    logger.info(`■ ${entry.animation.name}`);
    entry.animation.stop();
    // Une erreur éventuelle est remontée par play()
    await Promise.allSettled([entry.done]);
    if (this.current === entry) this.current = null;
  }
}
