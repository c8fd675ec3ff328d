import { Color, scaleRgb } from "../led/color";
import type { LedDevice } from "../led/device";
import { LedAnimation, type AnimationRun } from "./base";

export interface BreatheOptions {
  /** Couleur de base */
  color: Color;
  /** Pas de luminosité par trame (0..1). Défaut: 0.05 */
  step?: number;
  /** Délai entre deux trames (ms). Défaut: 50 */
  stepDelayMs?: number;
}

/**
 * Respiration: toutes les LEDs montent puis descendent en luminosité, en boucle.
 * En one-shot, un aller-retour complet (0 → 1 → 0). Ruban éteint à la fin.
 */
export class BreatheLedAnimation extends LedAnimation {
  readonly name = "breathe";
  color: Color;
  step: number;
  stepDelayMs: number;

  constructor(leds: LedDevice, options: BreatheOptions) {
    super(leds);
    this.color = options.color;
    this.step = options.step ?? 0.05;
    this.stepDelayMs = options.stepDelayMs ?? 50;
  }

  protected async run(run: AnimationRun): Promise<void> {
    // Luminosité discrétisée en niveaux entiers: les bornes 0 et 1 sont atteintes exactement
    const levels = Math.max(1, Math.round(1 / this.step));
    let level = 0;
    let direction = 1;
    let peaked = false;
    while (!this.stopped) {
      if (level >= levels) direction = -1;
      else if (level <= 0) direction = 1;
      level += direction;

      this.leds.fill(scaleRgb(this.color.asRgbTuple(), level / levels));
      await this.wait(this.stepDelayMs);

      if (run.oneShot && level >= levels) {
        peaked = true;
      } else if (peaked && level <= 0) {
        break;
      } else if (this.expired(run)) {
        break;
      }
    }
    this.turnOff();
  }
}
