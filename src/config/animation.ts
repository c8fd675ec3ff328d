import { ConfigError } from "../errors";
import { parseColor, type Color } from "../led/color";
import type { LedDevice } from "../led/device";
import { createAnimation, type LedAnimation } from "../animations";
import type { AnimationName, AnimationOptionsMap } from "../animations/types";

/**
 * Lecture typée des paramètres d'animation (clés snake_case).
 * Chaque clé lue est marquée; les clés restantes sont signalées comme inconnues.
 */
class ParamReader {
  private readonly seen = new Set<string>();

  constructor(private readonly params: Record<string, unknown>, private readonly path: string) {}

  private take(key: string): unknown {
    this.seen.add(key);
    return this.params[key];
  }

  private where(key: string): string {
    return `${this.path}.${key}`;
  }

  color(key: string): Color {
    const v = this.take(key);
    if (v === undefined || v === null) throw new ConfigError("couleur obligatoire", this.where(key));
    return parseColor(v, this.where(key));
  }

  optionalColor(key: string): Color | undefined {
    const v = this.take(key);
    return v === undefined || v === null ? undefined : parseColor(v, this.where(key));
  }

  optionalNumber(key: string, opts: { min?: number; max?: number; integer?: boolean } = {}): number | undefined {
    const v = this.take(key);
    if (v === undefined || v === null) return undefined;
    if (typeof v !== "number" || !Number.isFinite(v)) throw new ConfigError("nombre attendu", this.where(key));
    if (opts.integer && !Number.isInteger(v)) throw new ConfigError("entier attendu", this.where(key));
    if (opts.min !== undefined && v < opts.min) throw new ConfigError(`valeur >= ${opts.min} attendue`, this.where(key));
    if (opts.max !== undefined && v > opts.max) throw new ConfigError(`valeur <= ${opts.max} attendue`, this.where(key));
    return v;
  }

  optionalBoolean(key: string): boolean | undefined {
    const v = this.take(key);
    if (v === undefined || v === null) return undefined;
    if (typeof v !== "boolean") throw new ConfigError("booléen attendu", this.where(key));
    return v;
  }

  assertNoUnknownKeys(): void {
    const unknown = Object.keys(this.params).filter((k) => !this.seen.has(k));
    if (unknown.length > 0) {
      throw new ConfigError(`paramètre(s) inconnu(s): ${unknown.join(", ")}`, this.path);
    }
  }
}

const delay = { min: 0 };

function fillOptions(r: ParamReader): AnimationOptionsMap["fill"] {
  return {
    fillColor: r.color("fill_color"),
    reverse: r.optionalBoolean("reverse"),
    stepDelayMs: r.optionalNumber("step_delay_ms", delay),
  };
}

const optionParsers: { readonly [K in AnimationName]: (r: ParamReader) => AnimationOptionsMap[K] } = {
  breathe: (r) => ({
    color: r.color("color"),
    step: r.optionalNumber("step", { min: 0.001, max: 1 }),
    stepDelayMs: r.optionalNumber("step_delay_ms", delay),
  }),
  chase: (r) => ({
    foregroundColor: r.color("foreground_color"),
    backgroundColor: r.optionalColor("background_color"),
    stepDelayMs: r.optionalNumber("step_delay_ms", delay),
  }),
  fill: fillOptions,
  refill: fillOptions,
  bounce: fillOptions,
  blink: (r) => ({
    color: r.color("color"),
    numBlinks: r.optionalNumber("num_blinks", { min: 0, integer: true }),
    repeat: r.optionalBoolean("repeat"),
    onMs: r.optionalNumber("on_ms", delay),
    offMs: r.optionalNumber("off_ms", delay),
    leadInMs: r.optionalNumber("lead_in_ms", delay),
    pauseMs: r.optionalNumber("pause_ms", delay),
  }),
  alternating: (r) => ({
    color: r.color("color"),
    delayMs: r.optionalNumber("delay_ms", delay),
  }),
};

/**
 * Convertit les paramètres de configuration d'une animation en options typées.
 * @throws ConfigError si un paramètre manque, est mal typé ou inconnu
 */
export function resolveAnimationOptions<K extends AnimationName>(
  name: K,
  params: Record<string, unknown> = {},
  path = "animation.params",
): AnimationOptionsMap[K] {
  const reader = new ParamReader(params, path);
  const options = optionParsers[name](reader);
  reader.assertNoUnknownKeys();
  return options;
}

/** Construit l'animation `name` sur `leds` à partir de paramètres de configuration. */
export function instantiateAnimation<K extends AnimationName>(
  name: K,
  leds: LedDevice,
  params?: Record<string, unknown>,
): LedAnimation {
  return createAnimation(name, leds, resolveAnimationOptions(name, params));
}
