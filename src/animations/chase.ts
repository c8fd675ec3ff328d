import { BLACK, Color } from "../led/color";
import type { LedDevice } from "../led/device";
import { LedAnimation, type AnimationRun } from "./base";

export interface ChaseOptions {
  /** Couleur de la LED active */
  foregroundColor: Color;
  /** Couleur des LEDs inactives. Défaut: noir */
  backgroundColor?: Color;
  /** Durée d'allumage de chaque LED (ms). Défaut: 100 */
  stepDelayMs?: number;
}

/**
 * Chenillard: une LED allumée à la fois, dans l'ordre des index.
 * Un balayage complet = un cycle. Ruban éteint à la fin.
 */
export class ChaseLedAnimation extends LedAnimation {
  readonly name = "chase";
  foregroundColor: Color;
  backgroundColor: Color;
  stepDelayMs: number;

  constructor(leds: LedDevice, options: ChaseOptions) {
    super(leds);
    this.foregroundColor = options.foregroundColor;
    this.backgroundColor = options.backgroundColor ?? BLACK;
    this.stepDelayMs = options.stepDelayMs ?? 100;
  }

  protected async run(run: AnimationRun): Promise<void> {
    const fg = this.foregroundColor.asRgbTuple();
    const bg = this.backgroundColor.asRgbTuple();
    this.leds.fill(bg);
    while (!this.stopped) {
      for (let led = 0; led < this.leds.numLeds; led++) {
        this.leds.setLed(led, fg);
        await this.wait(this.stepDelayMs);
        this.leds.setLed(led, bg);
        if (this.stopped) break;
      }
      if (run.oneShot || this.expired(run)) break;
    }
    this.turnOff();
  }
}
