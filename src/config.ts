import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import chokidar from "chokidar";
import { ConfigError } from "./errors";
import { isLogLevel, type LogLevel } from "./logger";
import { isAnimationName, type AnimationName } from "./animations/types";

/** Sortie du ruban: aperçu terminal ou tampon mémoire seul. */
export type StripOutput = "console" | "memory";

/** Description du ruban piloté. */
export interface StripConfig {
  /** Nombre de LEDs (entier >= 0) */
  num_leds: number;
  /** Sortie. Défaut: "console" */
  output?: StripOutput;
}

/**
 * Animation à jouer: nom du registre, paramètres propres (snake_case)
 * et paramètres de cycle de vie.
 */
export interface AnimationConfig {
  /** Clé du registre (ex: "breathe", "chase") */
  name: AnimationName;
  /** Budget de durée (ms). Absent = pas d'échéance */
  timeout_ms?: number;
  /** Un seul cycle puis retour */
  one_shot?: boolean;
  /** Paramètres de construction (couleurs, délais, ...) */
  params?: Record<string, unknown>;
}

/**
 * Configuration racine de l'application.
 */
export interface AppConfig {
  /** Niveau de log (écrase LOG_LEVEL si défini) */
  log_level?: LogLevel;
  strip: StripConfig;
  /** Animation jouée au démarrage et à chaque rechargement */
  animation?: AnimationConfig;
}

const DEFAULT_PATHS = ["led-animator.yaml", path.join("config", "led-animator.yaml")];

function isStripOutput(value: unknown): value is StripOutput {
  return value === "console" || value === "memory";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseAnimationConfig(raw: unknown): AnimationConfig {
  if (!isRecord(raw)) throw new ConfigError("objet attendu", "animation");
  const { name, timeout_ms, one_shot, params } = raw;
  if (!isAnimationName(name)) {
    throw new ConfigError(`animation inconnue '${String(name)}'`, "animation.name");
  }
  const out: AnimationConfig = { name };
  if (timeout_ms !== undefined && timeout_ms !== null) {
    if (typeof timeout_ms !== "number" || !Number.isFinite(timeout_ms) || timeout_ms < 0) {
      throw new ConfigError("nombre de millisecondes >= 0 attendu", "animation.timeout_ms");
    }
    out.timeout_ms = timeout_ms;
  }
  if (one_shot !== undefined) {
    if (typeof one_shot !== "boolean") throw new ConfigError("booléen attendu", "animation.one_shot");
    out.one_shot = one_shot;
  }
  if (params !== undefined && params !== null) {
    if (!isRecord(params)) throw new ConfigError("objet attendu", "animation.params");
    out.params = params;
  }
  return out;
}

/**
 * Valide un document YAML déjà parsé.
 * @throws ConfigError si une clé est absente ou mal typée
 */
export function parseAppConfig(raw: unknown): AppConfig {
  if (!isRecord(raw)) throw new ConfigError("document de configuration vide ou invalide");
  const { log_level, strip, animation } = raw;
  if (!isRecord(strip)) throw new ConfigError("section obligatoire", "strip");
  const numLeds = strip.num_leds;
  if (typeof numLeds !== "number" || !Number.isInteger(numLeds) || numLeds < 0) {
    throw new ConfigError("entier >= 0 attendu", "strip.num_leds");
  }
  const output = strip.output ?? "console";
  if (!isStripOutput(output)) {
    throw new ConfigError(`sortie inconnue '${String(output)}' (console | memory)`, "strip.output");
  }
  const cfg: AppConfig = { strip: { num_leds: numLeds, output } };
  if (log_level !== undefined) {
    if (!isLogLevel(log_level)) throw new ConfigError(`niveau inconnu '${String(log_level)}'`, "log_level");
    cfg.log_level = log_level;
  }
  if (animation !== undefined && animation !== null) {
    cfg.animation = parseAnimationConfig(animation);
  }
  return cfg;
}

/**
 * Recherche un fichier de configuration existant parmi les chemins par défaut ou un chemin fourni.
 * @param customPath Chemin explicite à tester en priorité
 * @returns Le chemin trouvé ou null
 */
export async function findConfigPath(customPath?: string): Promise<string | null> {
  const candidates = customPath ? [customPath, ...DEFAULT_PATHS] : DEFAULT_PATHS;
  for (const p of candidates) {
    try {
      await fs.access(p);
      return p;
    } catch {
      // continue
    }
  }
  return null;
}

async function readConfigFile(filePath: string): Promise<AppConfig> {
  const raw = await fs.readFile(filePath, "utf8");
  return parseAppConfig(YAML.parse(raw));
}

/**
 * Charge, parse et valide le fichier YAML de configuration.
 * @param filePath Chemin explicite; sinon, recherche via {@link findConfigPath}
 * @throws ConfigError si aucun fichier n'est trouvé ou si le contenu est invalide
 */
export async function loadConfig(filePath?: string): Promise<AppConfig> {
  const p = await findConfigPath(filePath);
  if (!p) {
    throw new ConfigError("Aucun fichier de configuration trouvé (led-animator.yaml)");
  }
  return readConfigFile(p);
}

/**
 * Observe un fichier de configuration YAML et notifie en cas de modification.
 * @param filePath Chemin du fichier à surveiller
 * @param onChange Callback appelée avec la nouvelle configuration
 * @param onError Callback d'erreur facultative (fichier illisible ou invalide)
 * @returns Fonction pour arrêter l'observation
 */
export function watchConfig(
  filePath: string,
  onChange: (cfg: AppConfig) => void | Promise<void>,
  onError?: (err: unknown) => void
): () => void {
  const watcher = chokidar.watch(filePath, { ignoreInitial: true });
  const handler = async () => {
    try {
      const cfg = await readConfigFile(filePath);
      await onChange(cfg);
    } catch (err) {
      onError?.(err);
    }
  };
  watcher.on("change", () => void handler());
  return () => void watcher.close();
}
