import chalk from "chalk";
import type { RgbTuple } from "./color";
import { MemoryLedStrip } from "./memoryStrip";

export interface ConsoleStripOptions {
  /** Flux de sortie (défaut: process.stdout) */
  out?: { write(chunk: string): unknown };
  /** Caractère dessiné par LED (défaut: "●") */
  glyph?: string;
}

/**
 * Aperçu terminal: chaque trame publiée est redessinée sur une seule ligne
 * (couleurs 24 bits via chalk).
 */
export class ConsoleLedStrip extends MemoryLedStrip {
  private readonly out: { write(chunk: string): unknown };
  private readonly glyph: string;

  constructor(numLeds: number, options: ConsoleStripOptions = {}) {
    super(numLeds);
    this.out = options.out ?? process.stdout;
    this.glyph = options.glyph ?? "●";
  }

  protected override render(frame: readonly RgbTuple[]): void {
    const line = frame.map(([r, g, b]) => chalk.rgb(r, g, b)(this.glyph)).join(" ");
    this.out.write(`\r${line}\x1B[K`);
  }
}
