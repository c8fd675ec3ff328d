import type { RgbTuple } from "./color";
import type { LedDevice } from "./device";

const OFF: RgbTuple = [0, 0, 0];

/**
 * Ruban en mémoire: un tampon d'écriture (`pending`) et la trame visible.
 * Sert de base aux sorties concrètes (console) et aux tests.
 */
export class MemoryLedStrip implements LedDevice {
  readonly numLeds: number;
  private readonly pending: RgbTuple[];
  private visible: RgbTuple[];

  constructor(numLeds: number) {
    if (!Number.isInteger(numLeds) || numLeds < 0) {
      throw new RangeError(`numLeds invalide: ${numLeds}`);
    }
    this.numLeds = numLeds;
    this.pending = Array.from({ length: numLeds }, () => OFF);
    this.visible = [...this.pending];
  }

  setLed(index: number, rgb: RgbTuple, immediateShow = true): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.numLeds) {
      throw new RangeError(`LED ${index} hors limites (0..${this.numLeds - 1})`);
    }
    this.pending[index] = [rgb[0], rgb[1], rgb[2]];
    if (immediateShow) this.commit();
  }

  fill(rgb: RgbTuple): void {
    for (let i = 0; i < this.numLeds; i++) this.pending[i] = [rgb[0], rgb[1], rgb[2]];
    this.commit();
  }

  show(): void {
    this.commit();
  }

  /** Copie de la trame actuellement affichée. */
  getFrame(): RgbTuple[] {
    return [...this.visible];
  }

  /** Appelé à chaque publication d'une trame. */
  protected render(_frame: readonly RgbTuple[]): void {
    // rien en mémoire
  }

  private commit(): void {
    this.visible = [...this.pending];
    this.render(this.visible);
  }
}
