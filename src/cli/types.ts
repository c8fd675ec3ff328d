import type { AnimationPlayer } from "../app/player";
import type { LedDevice } from "../led/device";

/**
 * Contexte fourni par l'application pour attacher la CLI.
 */
export interface CliContext {
  player: AnimationPlayer;
  strip: LedDevice;
  onExit?: () => Promise<void> | void;
}
