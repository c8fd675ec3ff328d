/**
 * Détection de l'environnement d'exécution
 */

/** Vrai sous PM2 (pm_id, NODE_APP_INSTANCE ou PM2_HOME présents). */
export function isRunningUnderPm2(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.pm_id || env.NODE_APP_INSTANCE || env.PM2_HOME);
}

/**
 * Indique si la CLI interactive doit être attachée:
 * jamais avec DISABLE_CLI=true ou sous PM2, sinon seulement sur un terminal.
 */
export function shouldAttachCli(env: NodeJS.ProcessEnv = process.env, isTTY = Boolean(process.stdin.isTTY)): boolean {
  if (env.DISABLE_CLI === "true") return false;
  if (isRunningUnderPm2(env)) return false;
  return isTTY;
}
