import { BLACK, Color } from "../led/color";
import type { LedDevice } from "../led/device";
import { LedAnimation, type AnimationRun } from "./base";

export interface AlternatingOptions {
  /** Couleur des LEDs allumées */
  color: Color;
  /** Durée de chaque phase (ms). Défaut: 500 */
  delayMs?: number;
}

/**
 * Alterne LEDs paires / impaires. Une phase paire + une phase impaire = un cycle.
 * Chaque phase est publiée en une seule trame (`show()`). Ruban éteint à la fin.
 */
export class AlternatingLedAnimation extends LedAnimation {
  readonly name = "alternating";
  color: Color;
  delayMs: number;

  constructor(leds: LedDevice, options: AlternatingOptions) {
    super(leds);
    this.color = options.color;
    this.delayMs = options.delayMs ?? 500;
  }

  protected async run(run: AnimationRun): Promise<void> {
    const lit = this.color.asRgbTuple();
    const off = BLACK.asRgbTuple();
    let evens = true;
    this.leds.fill(off);
    while (!this.stopped) {
      for (let led = 0; led < this.leds.numLeds; led++) {
        const isEven = led % 2 === 0;
        this.leds.setLed(led, isEven === evens ? lit : off, false);
      }
      this.leds.show();
      await this.wait(this.delayMs);
      evens = !evens;
      if ((run.oneShot && evens) || this.expired(run)) break;
    }
    this.turnOff();
  }
}
