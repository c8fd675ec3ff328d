import type { CompleterResult } from "readline";
import { ANIMATION_NAMES, isAnimationName, type AnimationName } from "../animations/types";
import { HELP } from "./commands";

function norm(s: string): string { return s.trim().toLowerCase(); }

/** Clés `play` acceptées par animation (en plus de timeout_ms/one_shot). */
const PLAY_KEYS: Record<AnimationName, string[]> = {
  breathe: ["color", "step", "step_delay_ms"],
  chase: ["foreground_color", "background_color", "step_delay_ms"],
  fill: ["fill_color", "reverse", "step_delay_ms"],
  refill: ["fill_color", "reverse", "step_delay_ms"],
  bounce: ["fill_color", "reverse", "step_delay_ms"],
  blink: ["color", "num_blinks", "repeat", "on_ms", "off_ms", "lead_in_ms", "pause_ms"],
  alternating: ["color", "delay_ms"],
};

export function makeCompleter(): (line: string) => CompleterResult {
  const commands = [...HELP.map((h) => h.name), "quit"];
  return (line: string): CompleterResult => {
    const words = line.split(/\s+/);
    const trailingSpace = /\s$/.test(line);
    const lastToken = trailingSpace ? "" : words[words.length - 1];
    const suggestLast = (candidates: string[]): CompleterResult => {
      const uniq = Array.from(new Set(candidates.filter(Boolean)));
      const hits = lastToken ? uniq.filter((x) => norm(x).startsWith(norm(lastToken))) : uniq;
      return [hits.length ? hits : uniq, lastToken];
    };

    const argIndex = trailingSpace ? words.length - 1 : words.length - 2;
    if (argIndex < 0 || (words.length === 1 && !trailingSpace)) return suggestLast(commands);
    if (norm(words[0]) !== "play") return [[], lastToken];
    if (argIndex === 0) return suggestLast([...ANIMATION_NAMES]);
    const anim = words[1];
    if (!isAnimationName(anim)) return [[], lastToken];
    const used = new Set(words.slice(2).map((w) => w.split("=")[0]));
    const keys = [...PLAY_KEYS[anim], "timeout_ms", "one_shot"].filter((k) => !used.has(k) || k === lastToken.split("=")[0]);
    return suggestLast(keys.map((k) => `${k}=`));
  };
}
