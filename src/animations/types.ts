import type { BreatheOptions } from "./breathe";
import type { ChaseOptions } from "./chase";
import type { FillOptions } from "./fill";
import type { BlinkOptions } from "./blink";
import type { AlternatingOptions } from "./alternating";

/** Clés du registre, dans l'ordre de présentation. */
export const ANIMATION_NAMES = ["breathe", "chase", "fill", "refill", "bounce", "blink", "alternating"] as const;

export type AnimationName = (typeof ANIMATION_NAMES)[number];

const NAME_SET: ReadonlySet<string> = new Set(ANIMATION_NAMES);

export function isAnimationName(value: unknown): value is AnimationName {
  return typeof value === "string" && NAME_SET.has(value);
}

/** Options de construction propres à chaque animation. */
export interface AnimationOptionsMap {
  breathe: BreatheOptions;
  chase: ChaseOptions;
  fill: FillOptions;
  refill: FillOptions;
  bounce: FillOptions;
  blink: BlinkOptions;
  alternating: AlternatingOptions;
}
