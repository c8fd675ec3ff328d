import { logger } from "../logger";
import { ConfigError } from "../errors";
import { BLACK } from "../led/color";
import { ANIMATION_NAMES, isAnimationName } from "../animations/types";
import { instantiateAnimation } from "../config/animation";
import type { LedAnimation } from "../animations";
import { suggest } from "./levenshtein";
import type { CliContext } from "./types";

export interface CommandHandlers {
  [name: string]: (args: string[], ctx: CliContext) => Promise<void> | void;
}

export interface CommandHelp {
  name: string;
  usage: string;
  description: string;
}

export const HELP: readonly CommandHelp[] = [
  { name: "list", usage: "list", description: "Liste les animations disponibles" },
  { name: "play", usage: "play <animation> [clé=valeur ...]", description: "Lance une animation (timeout_ms, one_shot + paramètres)" },
  { name: "stop", usage: "stop", description: "Arrête l'animation en cours" },
  { name: "status", usage: "status", description: "Affiche l'animation en cours" },
  { name: "clear", usage: "clear", description: "Arrête et éteint le ruban" },
  { name: "help", usage: "help", description: "Affiche cette aide" },
  { name: "exit", usage: "exit | quit", description: "Quitte l'application" },
];

export interface PlayArgs {
  timeoutMs?: number;
  /** Absent: défaut propre à l'animation */
  oneShot?: boolean;
  params: Record<string, unknown>;
}

/**
 * Convertit une valeur saisie: booléen, nombre, liste de nombres ("255,0,0") ou chaîne.
 * Pour une clé de couleur (`*color`), seule la liste est convertie: "112233" reste un hexadécimal.
 */
export function coerceValue(raw: string, key = ""): unknown {
  const s = raw.trim();
  if (key.endsWith("color") && !s.includes(",")) return s;
  if (s === "true") return true;
  if (s === "false") return false;
  if (/^-?\d+(\.\d+)?$/.test(s)) return Number(s);
  if (/^-?\d+(\.\d+)?(,-?\d+(\.\d+)?)+$/.test(s)) return s.split(",").map(Number);
  return s;
}

/**
 * Analyse les arguments `clé=valeur` de la commande `play`.
 * `timeout_ms` et `one_shot` sont extraits; le reste part dans `params`.
 * @throws ConfigError sur un argument sans `=` ou un type inattendu
 */
export function parsePlayArgs(tokens: string[]): PlayArgs {
  const out: PlayArgs = { params: {} };
  for (const token of tokens) {
    const eq = token.indexOf("=");
    if (eq <= 0) throw new ConfigError(`argument attendu sous la forme clé=valeur, reçu '${token}'`);
    const key = token.slice(0, eq);
    const value = coerceValue(token.slice(eq + 1), key);
    if (key === "timeout_ms") {
      if (typeof value !== "number" || value < 0) throw new ConfigError("nombre de millisecondes >= 0 attendu", key);
      out.timeoutMs = value;
    } else if (key === "one_shot") {
      if (typeof value !== "boolean") throw new ConfigError("booléen attendu", key);
      out.oneShot = value;
    } else {
      out.params[key] = value;
    }
  }
  return out;
}

const COMMAND_NAMES = [...HELP.map((h) => h.name), "quit"];

export function printHelp(out: { write(chunk: string): unknown } = process.stdout): void {
  const width = Math.max(...HELP.map((h) => h.usage.length));
  out.write("Commandes:\n");
  for (const h of HELP) out.write(`  ${h.usage.padEnd(width)}  ${h.description}\n`);
}

export const handlers: CommandHandlers = {
  list() {
    logger.info("Animations:", ANIMATION_NAMES.join(", "));
  },
  play(args, ctx) {
    const [name, ...rest] = args;
    if (!name) {
      logger.warn("Usage: play <animation> [clé=valeur ...]");
      return;
    }
    if (!isAnimationName(name)) {
      const s = suggest(ANIMATION_NAMES, name);
      logger.warn(`Animation inconnue '${name}'.${s.length > 0 ? ` Suggestions: ${s.join(", ")}` : ""}`);
      return;
    }
    let animation: LedAnimation;
    let parsed: PlayArgs;
    try {
      parsed = parsePlayArgs(rest);
      animation = instantiateAnimation(name, ctx.strip, parsed.params);
    } catch (err) {
      if (err instanceof ConfigError) {
        logger.warn(`play ${name}: ${err.message}`);
        return;
      }
      throw err;
    }
    ctx.player.play(animation, parsed.timeoutMs, parsed.oneShot).catch((err) => {
      logger.error(`Animation '${name}' interrompue par une erreur:`, err);
    });
  },
  async stop(_args, ctx) {
    if (!ctx.player.active) {
      logger.info("Aucune animation en cours.");
      return;
    }
    await ctx.player.stop();
  },
  status(_args, ctx) {
    logger.info(`Animation en cours: ${ctx.player.active ?? "aucune"}`);
  },
  async clear(_args, ctx) {
    await ctx.player.stop();
    ctx.strip.fill(BLACK.asRgbTuple());
  },
  help() {
    printHelp();
  },
  default(args) {
    const cmd = args[0] ?? "";
    if (cmd.length === 0) return;
    const s = suggest(COMMAND_NAMES, cmd);
    logger.warn(`Commande inconnue '${cmd}'. Tapez 'help'.${s.length > 0 ? ` Suggestions: ${s.join(", ")}` : ""}`);
  },
};

/**
 * Exécute une ligne saisie (hors `exit`/`quit`, gérés par la boucle readline).
 */
export async function runCommand(line: string, ctx: CliContext): Promise<void> {
  const [rawCmd, ...rest] = line.trim().split(/\s+/);
  const cmd = rawCmd === "-h" || rawCmd === "--help" ? "help" : rawCmd;
  if (!cmd) return;
  const handler = Object.prototype.hasOwnProperty.call(handlers, cmd) && cmd !== "default" ? handlers[cmd] : undefined;
  if (handler) await handler(rest, ctx);
  else await handlers.default([cmd, ...rest], ctx);
}
