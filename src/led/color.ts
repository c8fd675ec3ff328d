import { ConfigError } from "../errors";

/** Couleur brute envoyée au ruban: canaux 0..255. */
export type RgbTuple = readonly [number, number, number];

function channel(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.max(0, Math.min(255, Math.round(n)));
}

/**
 * Couleur immuable (RVB 8 bits).
 */
export class Color {
  static readonly BLACK = new Color(0, 0, 0);

  readonly red: number;
  readonly green: number;
  readonly blue: number;

  private constructor(red: number, green: number, blue: number) {
    this.red = red;
    this.green = green;
    this.blue = blue;
  }

  static fromRgb(red: number, green: number, blue: number): Color {
    return new Color(channel(red), channel(green), channel(blue));
  }

  /** Accepte "#rrggbb", "rrggbb", "#rgb" ou "rgb". */
  static fromHex(hex: string): Color {
    const m = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(hex.trim());
    if (!m) throw new ConfigError(`couleur hexadécimale invalide '${hex}'`);
    const digits = m[1].length === 3 ? m[1].split("").map((d) => d + d).join("") : m[1];
    return new Color(
      parseInt(digits.slice(0, 2), 16),
      parseInt(digits.slice(2, 4), 16),
      parseInt(digits.slice(4, 6), 16),
    );
  }

  asRgbTuple(): RgbTuple {
    return [this.red, this.green, this.blue];
  }

  toHex(): string {
    return "#" + [this.red, this.green, this.blue].map((c) => c.toString(16).padStart(2, "0")).join("");
  }

  equals(other: Color): boolean {
    return this.red === other.red && this.green === other.green && this.blue === other.blue;
  }

  toString(): string {
    return this.toHex();
  }
}

export const BLACK = Color.BLACK;

export const NAMED_COLORS: Readonly<Record<string, Color>> = Object.freeze({
  black: Color.BLACK,
  white: Color.fromRgb(255, 255, 255),
  red: Color.fromRgb(255, 0, 0),
  green: Color.fromRgb(0, 255, 0),
  blue: Color.fromRgb(0, 0, 255),
  yellow: Color.fromRgb(255, 255, 0),
  cyan: Color.fromRgb(0, 255, 255),
  magenta: Color.fromRgb(255, 0, 255),
  orange: Color.fromRgb(255, 128, 0),
  purple: Color.fromRgb(128, 0, 255),
});

/** Multiplie chaque canal par `factor` (luminosité), arrondi à l'entier. */
export function scaleRgb(rgb: RgbTuple, factor: number): RgbTuple {
  return [channel(rgb[0] * factor), channel(rgb[1] * factor), channel(rgb[2] * factor)];
}

/**
 * Convertit une valeur de configuration en {@link Color}.
 * Formes acceptées: nom de la palette, hexadécimal, tableau `[r, g, b]`.
 */
export function parseColor(value: unknown, path?: string): Color {
  if (value instanceof Color) return value;
  if (typeof value === "string") {
    const key = value.trim().toLowerCase();
    if (Object.prototype.hasOwnProperty.call(NAMED_COLORS, key)) return NAMED_COLORS[key];
    try {
      return Color.fromHex(key);
    } catch {
      throw new ConfigError(`couleur inconnue '${value}'`, path);
    }
  }
  if (Array.isArray(value) && value.length === 3 && value.every((c) => typeof c === "number" && Number.isFinite(c))) {
    const [r, g, b] = value;
    return Color.fromRgb(r, g, b);
  }
  throw new ConfigError(`couleur attendue (nom, "#rrggbb" ou [r, g, b]), reçu ${JSON.stringify(value)}`, path);
}
