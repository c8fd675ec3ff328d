import type { RgbTuple } from "../led/color";
import { MemoryLedStrip } from "../led/memoryStrip";

export type StripCall =
  | { op: "set"; index: number; rgb: RgbTuple; immediate: boolean }
  | { op: "fill"; rgb: RgbTuple }
  | { op: "show" };

/**
 * Ruban en mémoire qui journalise chaque appel reçu, dans l'ordre.
 */
export class RecordingStrip extends MemoryLedStrip {
  readonly calls: StripCall[] = [];

  override setLed(index: number, rgb: RgbTuple, immediateShow = true): void {
    this.calls.push({ op: "set", index, rgb: [rgb[0], rgb[1], rgb[2]], immediate: immediateShow });
    super.setLed(index, rgb, immediateShow);
  }

  override fill(rgb: RgbTuple): void {
    this.calls.push({ op: "fill", rgb: [rgb[0], rgb[1], rgb[2]] });
    super.fill(rgb);
  }

  override show(): void {
    this.calls.push({ op: "show" });
    super.show();
  }

  fills(): RgbTuple[] {
    const out: RgbTuple[] = [];
    for (const c of this.calls) if (c.op === "fill") out.push(c.rgb);
    return out;
  }

  /** Vrai si toutes les LEDs visibles sont éteintes. */
  isDark(): boolean {
    return this.getFrame().every(([r, g, b]) => r === 0 && g === 0 && b === 0);
  }
}
