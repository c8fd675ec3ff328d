import { Color } from "../led/color";
import type { LedDevice } from "../led/device";
import { LedAnimation, type AnimationRun } from "./base";

export interface FillOptions {
  /** Couleur de remplissage */
  fillColor: Color;
  /** Remplir depuis la dernière LED. Défaut: false */
  reverse?: boolean;
  /** Délai entre deux LEDs (ms). Défaut: 50 */
  stepDelayMs?: number;
}

/**
 * Remplissage LED par LED. Passage unique; le ruban reste allumé ensuite.
 *
 * `timeoutMs` et `oneShot=false` ne sont pas supportés: un avertissement est
 * journalisé et le passage unique s'exécute quand même.
 */
export class FillLedAnimation extends LedAnimation {
  readonly name = "fill";
  fillColor: Color;
  reverse: boolean;
  stepDelayMs: number;

  constructor(leds: LedDevice, options: FillOptions) {
    super(leds);
    this.fillColor = options.fillColor;
    this.reverse = options.reverse ?? false;
    this.stepDelayMs = options.stepDelayMs ?? 50;
  }

  override start(timeoutMs?: number | null, oneShot = true): Promise<void> {
    return super.start(timeoutMs, oneShot);
  }

  protected async run(run: AnimationRun): Promise<void> {
    if (!run.oneShot || run.timeoutMs !== null) {
      this.log.warn("animation persistante non supportée (timeout/one_shot ignorés), passage unique.");
    }
    const order = Array.from({ length: this.leds.numLeds }, (_, i) => i);
    if (this.reverse) order.reverse();
    const rgb = this.fillColor.asRgbTuple();
    for (const led of order) {
      if (this.stopped) break;
      this.leds.setLed(led, rgb);
      await this.wait(this.stepDelayMs);
    }
  }
}
