import { BLACK, Color } from "../led/color";
import type { LedDevice } from "../led/device";
import { LedAnimation, type AnimationRun } from "./base";

export interface BlinkOptions {
  /** Couleur des clignotements */
  color: Color;
  /** Nombre de clignotements par salve. Défaut: 2 */
  numBlinks?: number;
  /** Répéter les salves jusqu'à stop/timeout. Défaut: false */
  repeat?: boolean;
  /** Durée allumée (ms). Défaut: 250 */
  onMs?: number;
  /** Durée éteinte entre deux clignotements (ms). Défaut: 500 */
  offMs?: number;
  /** Pause initiale, ruban éteint (ms). Défaut: 500 */
  leadInMs?: number;
  /** Pause entre deux salves répétées (ms). Défaut: 2000 */
  pauseMs?: number;
}

/**
 * Salves de `numBlinks` clignotements (une salve = un cycle).
 * Sans `repeat`, une seule salve, même sans one-shot. Ruban éteint à la fin.
 */
export class BlinkLedAnimation extends LedAnimation {
  readonly name = "blink";
  color: Color;
  numBlinks: number;
  repeat: boolean;
  onMs: number;
  offMs: number;
  leadInMs: number;
  pauseMs: number;

  constructor(leds: LedDevice, options: BlinkOptions) {
    super(leds);
    this.color = options.color;
    this.numBlinks = options.numBlinks ?? 2;
    this.repeat = options.repeat ?? false;
    this.onMs = options.onMs ?? 250;
    this.offMs = options.offMs ?? 500;
    this.leadInMs = options.leadInMs ?? 500;
    this.pauseMs = options.pauseMs ?? 2000;
  }

  protected async run(run: AnimationRun): Promise<void> {
    const on = this.color.asRgbTuple();
    const off = BLACK.asRgbTuple();
    this.leds.fill(off);
    await this.wait(this.leadInMs);
    while (!this.stopped) {
      for (let i = 0; i < this.numBlinks && !this.stopped; i++) {
        this.leds.fill(on);
        await this.wait(this.onMs);
        this.leds.fill(off);
        await this.wait(this.offMs);
      }
      if (run.oneShot || !this.repeat || this.stopped) break;
      await this.wait(this.pauseMs);
      if (this.expired(run)) break;
    }
    this.turnOff();
  }
}
