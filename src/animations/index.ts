import type { LedDevice } from "../led/device";
import type { LedAnimation } from "./base";
import { AlternatingLedAnimation } from "./alternating";
import { BlinkLedAnimation } from "./blink";
import { BounceLedAnimation } from "./bounce";
import { BreatheLedAnimation } from "./breathe";
import { ChaseLedAnimation } from "./chase";
import { FillLedAnimation } from "./fill";
import { RefillLedAnimation } from "./refill";
import type { AnimationName, AnimationOptionsMap } from "./types";

export type AnimationConstructor<K extends AnimationName> = new (leds: LedDevice, options: AnimationOptionsMap[K]) => LedAnimation;

/**
 * Registre nom → classe d'animation.
 */
export const animations: { readonly [K in AnimationName]: AnimationConstructor<K> } = Object.freeze({
  breathe: BreatheLedAnimation,
  chase: ChaseLedAnimation,
  fill: FillLedAnimation,
  refill: RefillLedAnimation,
  bounce: BounceLedAnimation,
  blink: BlinkLedAnimation,
  alternating: AlternatingLedAnimation,
});

export function createAnimation<K extends AnimationName>(name: K, leds: LedDevice, options: AnimationOptionsMap[K]): LedAnimation {
  const Ctor: AnimationConstructor<K> = animations[name];
  return new Ctor(leds, options);
}

export { LedAnimation, type AnimationRun } from "./base";
export { CancellableDelay } from "./delay";
export { ANIMATION_NAMES, isAnimationName, type AnimationName, type AnimationOptionsMap } from "./types";
export { AlternatingLedAnimation, type AlternatingOptions } from "./alternating";
export { BlinkLedAnimation, type BlinkOptions } from "./blink";
export { BounceLedAnimation } from "./bounce";
export { BreatheLedAnimation, type BreatheOptions } from "./breathe";
export { ChaseLedAnimation, type ChaseOptions } from "./chase";
export { FillLedAnimation, type FillOptions } from "./fill";
export { RefillLedAnimation } from "./refill";
export { CompositeFillAnimation } from "./composite";
