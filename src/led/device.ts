import type { RgbTuple } from "./color";

/**
 * Ruban de LEDs adressables tel que vu par les animations.
 *
 * Les appels sont synchrones; toute erreur levée ici remonte telle quelle
 * jusqu'à l'appelant de `start()`.
 */
export interface LedDevice {
  /** Nombre de LEDs du ruban */
  readonly numLeds: number;
  /**
   * Écrit une LED. Avec `immediateShow=false`, l'écriture reste en attente
   * jusqu'au prochain {@link LedDevice.show}.
   */
  setLed(index: number, rgb: RgbTuple, immediateShow?: boolean): void;
  /** Toutes les LEDs dans la même couleur, affichées immédiatement. */
  fill(rgb: RgbTuple): void;
  /** Publie les écritures en attente. */
  show(): void;
}
