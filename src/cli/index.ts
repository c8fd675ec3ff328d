import readline from "readline";
import { logger } from "../logger";
import { printHelp, runCommand } from "./commands";
import { makeCompleter } from "./completer";
import type { CliContext } from "./types";

export type { CliContext } from "./types";

/**
 * Attache une CLI interactive (readline) au player.
 * @returns Fonction pour détacher la CLI
 */
export function attachCli(ctx: CliContext): () => void {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, completer: makeCompleter() });
  printHelp();
  rl.setPrompt("leds> ");
  rl.prompt();

  let closing = false;
  const exit = async (): Promise<void> => {
    if (closing) return;
    closing = true;
    rl.close();
    await ctx.onExit?.();
  };

  rl.on("line", (line) => {
    const cmd = line.trim().split(/\s+/)[0];
    if (cmd === "exit" || cmd === "quit") {
      exit().catch((err) => logger.error("Erreur à la fermeture:", err));
      return;
    }
    runCommand(line, ctx)
      .catch((err) => logger.error("Erreur commande:", err))
      .finally(() => { if (!closing) rl.prompt(); });
  });

  rl.on("SIGINT", () => {
    exit().catch((err) => logger.error("Erreur à la fermeture:", err));
  });

  return () => {
    closing = true;
    rl.close();
  };
}
