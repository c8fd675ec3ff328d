import { logger, type Logger } from "../logger";
import { AnimationError } from "../errors";
import { BLACK } from "../led/color";
import type { LedDevice } from "../led/device";
import { CancellableDelay } from "./delay";
import type { AnimationName } from "./types";

/** Paramètres d'un passage de `start()`, figés à l'entrée. */
export interface AnimationRun {
  oneShot: boolean;
  /** Budget demandé (ms), tel que reçu */
  timeoutMs: number | null;
  /** Échéance absolue (`Date.now()`), null = pas d'échéance */
  deadline: number | null;
}

/**
 * Contrat commun des animations.
 *
 * - `start(timeoutMs?, oneShot?)` tourne jusqu'à `stop()`, l'échéance (vérifiée
 *   une fois par tour de boucle) ou la fin d'un cycle en mode one-shot.
 *   L'instance est réutilisable: le signal d'arrêt est réarmé à chaque `start`.
 * - `stop()` est non bloquant et peut venir de n'importe quelle autre tâche;
 *   l'attente en cours est interrompue immédiatement.
 * - Un seul `start` à la fois par instance: un second appel concurrent est rejeté
 *   avec {@link AnimationError}.
 * - Les erreurs du ruban ne sont ni capturées ni réessayées.
 */
export abstract class LedAnimation {
  abstract readonly name: AnimationName;

  protected readonly leds: LedDevice;
  protected readonly stopping = new CancellableDelay();
  private running = false;

  constructor(leds: LedDevice) {
    this.leds = leds;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(timeoutMs?: number | null, oneShot = false): Promise<void> {
    if (this.running) {
      throw new AnimationError(`Animation '${this.name}' déjà en cours sur cette instance`);
    }
    this.stopping.clear();
    if (this.leds.numLeds <= 0) {
      this.log.warn("ruban sans LED, rien à animer.");
      return;
    }
    this.running = true;
    const run: AnimationRun = {
      oneShot,
      timeoutMs: timeoutMs || null,
      deadline: timeoutMs ? Date.now() + timeoutMs : null,
    };
    this.log.debug(`start (timeout=${run.timeoutMs ?? "∞"}ms, one_shot=${oneShot})`);
    try {
      await this.run(run);
    } finally {
      this.running = false;
    }
    this.log.debug("terminée.");
  }

  /** Logger préfixé par le nom de l'animation. */
  protected get log(): Logger {
    return logger.child(this.name);
  }

  stop(): void {
    this.stopping.set();
  }

  protected abstract run(run: AnimationRun): Promise<void>;

  protected get stopped(): boolean {
    return this.stopping.isSet;
  }

  protected wait(ms: number): Promise<boolean> {
    return this.stopping.wait(ms);
  }

  protected expired(run: AnimationRun): boolean {
    return run.deadline !== null && Date.now() > run.deadline;
  }

  protected turnOff(): void {
    this.leds.fill(BLACK.asRgbTuple());
  }
}
