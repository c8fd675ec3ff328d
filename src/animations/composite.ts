import { BLACK, Color } from "../led/color";
import type { LedDevice } from "../led/device";
import { LedAnimation, type AnimationRun } from "./base";
import { FillLedAnimation, type FillOptions } from "./fill";

/**
 * Enchaîne deux remplissages (couleur puis noir) avec une instance de
 * {@link FillLedAnimation} reconfigurée avant chaque passage.
 * Une paire couleur + noir = un cycle. Ruban éteint à la fin.
 *
 * `stop()` est relayé au remplissage en cours.
 */
export abstract class CompositeFillAnimation extends LedAnimation {
  fillColor: Color;
  reverse: boolean;
  protected readonly fillAnimation: FillLedAnimation;

  constructor(leds: LedDevice, options: FillOptions) {
    super(leds);
    this.fillColor = options.fillColor;
    this.reverse = options.reverse ?? false;
    this.fillAnimation = new FillLedAnimation(leds, options);
  }

  get stepDelayMs(): number {
    return this.fillAnimation.stepDelayMs;
  }

  set stepDelayMs(ms: number) {
    this.fillAnimation.stepDelayMs = ms;
  }

  /** Sens du passage d'extinction. */
  protected abstract offPassReverse(): boolean;

  protected async run(run: AnimationRun): Promise<void> {
    while (!this.stopped) {
      this.fillAnimation.fillColor = this.fillColor;
      this.fillAnimation.reverse = this.reverse;
      await this.fillAnimation.start();
      if (this.stopped) break;

      this.fillAnimation.fillColor = BLACK;
      this.fillAnimation.reverse = this.offPassReverse();
      await this.fillAnimation.start();

      if (run.oneShot || this.expired(run)) break;
    }
    this.turnOff();
  }

  override stop(): void {
    super.stop();
    this.fillAnimation.stop();
  }
}
