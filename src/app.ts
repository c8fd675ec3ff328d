import { logger, setLogLevel } from "./logger";
import { loadConfig, findConfigPath, watchConfig, type AppConfig, type AnimationConfig, type StripConfig } from "./config";
import { ConfigError } from "./errors";
import { BLACK } from "./led/color";
import { ConsoleLedStrip } from "./led/consoleStrip";
import { MemoryLedStrip } from "./led/memoryStrip";
import type { LedDevice } from "./led/device";
import { instantiateAnimation } from "./config/animation";
import { AnimationPlayer } from "./app/player";
import { attachCli } from "./cli";
import { shouldAttachCli } from "./utils/runtime";

export interface StartOptions {
  /** Chemin explicite du fichier YAML (sinon recherche dans les emplacements par défaut) */
  configPath?: string;
  /** Appelé par la commande CLI `exit` */
  onExit?: () => Promise<void> | void;
}

export function createStrip(cfg: StripConfig): LedDevice {
  return cfg.output === "memory" ? new MemoryLedStrip(cfg.num_leds) : new ConsoleLedStrip(cfg.num_leds);
}

/**
 * Lance l'animation décrite par la configuration (si présente).
 * Les erreurs d'animation sont journalisées, pas propagées.
 */
export function playConfigured(player: AnimationPlayer, strip: LedDevice, anim: AnimationConfig | undefined): void {
  if (!anim) return;
  const animation = instantiateAnimation(anim.name, strip, anim.params);
  player.play(animation, anim.timeout_ms, anim.one_shot).catch((err) => {
    logger.error(`Animation '${anim.name}' interrompue par une erreur:`, err);
  });
}

/**
 * Point d'entrée de l'application.
 * - Charge la configuration et construit le ruban
 * - Joue l'animation configurée
 * - Active le hot-reload et la CLI interactive
 *
 * @returns Fonction de nettoyage (arrêt de l'animation, extinction du ruban)
 */
export async function startApp(options: StartOptions = {}): Promise<() => Promise<void>> {
  logger.info("Démarrage LED Animator…");
  const configPath = await findConfigPath(options.configPath);
  if (!configPath) {
    throw new ConfigError("led-animator.yaml introuvable. Copiez config/led-animator.example.yaml → led-animator.yaml");
  }

  logger.info(`Chargement configuration: ${configPath}`);
  let cfg: AppConfig = await loadConfig(configPath);
  if (cfg.log_level) setLogLevel(cfg.log_level);

  const strip = createStrip(cfg.strip);
  const player = new AnimationPlayer();
  playConfigured(player, strip, cfg.animation);

  const stopWatch = watchConfig(
    configPath,
    async (next) => {
      if (next.log_level) setLogLevel(next.log_level);
      if (next.strip.num_leds !== cfg.strip.num_leds || next.strip.output !== cfg.strip.output) {
        logger.warn("Configuration du ruban modifiée: redémarrage nécessaire pour l'appliquer.");
      }
      cfg = { ...next, strip: cfg.strip };
      await player.stop();
      playConfigured(player, strip, cfg.animation);
      logger.info("Configuration rechargée.");
    },
    (err) => logger.warn("Erreur hot reload config:", err),
  );

  const detachCli = shouldAttachCli() ? attachCli({ player, strip, onExit: options.onExit }) : null;

  return async () => {
    stopWatch();
    detachCli?.();
    await player.stop();
    strip.fill(BLACK.asRgbTuple());
    logger.info("Arrêt LED Animator");
  };
}
