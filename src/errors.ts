/**
 * Configuration ou paramètres d'animation invalides.
 * `path` désigne la clé fautive (ex: "animation.params.color").
 */
export class ConfigError extends Error {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
    this.path = path;
  }
}

/** Mauvaise utilisation du moteur (ex: deux `start` concurrents sur la même instance). */
export class AnimationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AnimationError";
  }
}
