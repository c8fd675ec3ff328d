#!/usr/bin/env node
import { logger } from "./logger";
import { startApp } from "./app";

async function main(): Promise<void> {
  let cleanup: (() => Promise<void>) | null = null;
  let exiting = false;

  const shutdown = async (code: number): Promise<void> => {
    if (exiting) return;
    exiting = true;
    try {
      await cleanup?.();
    } catch (err) {
      logger.error("Erreur à l'arrêt:", err);
      code = 1;
    }
    process.exit(code);
  };

  cleanup = await startApp({
    configPath: process.argv[2],
    onExit: () => shutdown(0),
  });

  // Sur interruption, éteindre le ruban proprement
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => void shutdown(0));
  }
}

main().catch((err) => {
  logger.error("Erreur fatale:", err);
  process.exit(1);
});
