/**
 * Launcher directory layout.
 *
 *   launcherDir   LAUNCHER_FOLDER, else $XDG_DATA_HOME/<name>, else $HOME/.local/share/<name>
 *   cacheDir      CACHE_FOLDER,    else $XDG_CACHE_HOME/<name>, else $HOME/.cache/<name>
 *
 * Pure functions of the environment map they are given.
 */
import { join } from "path";
import type { RuntimeEnvironment } from "../steam/environment.js";

export const FOLDER_NAME = "wincompat-launcher";

function fromEnv(
  env: NodeJS.ProcessEnv,
  override: string,
  xdgVar: string,
  homeSuffix: string,
  name: string
): string {
  const explicit = env[override];
  if (explicit) return explicit;

  const xdg = env[xdgVar];
  if (xdg) return join(xdg, name);

  const home = env.HOME;
  if (!home) {
    throw new Error(`Cannot locate the launcher folder: none of ${override}, ${xdgVar} or HOME is set`);
  }
  return join(home, homeSuffix, name);
}

export function launcherDir(env: NodeJS.ProcessEnv = process.env, name = FOLDER_NAME): string {
  return fromEnv(env, "LAUNCHER_FOLDER", "XDG_DATA_HOME", join(".local", "share"), name);
}

export function cacheDir(env: NodeJS.ProcessEnv = process.env, name = FOLDER_NAME): string {
  return fromEnv(env, "CACHE_FOLDER", "XDG_CACHE_HOME", ".cache", name);
}

/** `<launcherDir>/settings.json` */
export function settingsFile(dir: string): string {
  return join(dir, "settings.json");
}

/**
 * Folder new games are installed under. Under Steam with a compat data path
 * games go inside Steam's own prefix (its C: drive), otherwise into the
 * launcher folder.
 */
export function baseInstallDir(environment: RuntimeEnvironment, dir: string): string {
  if (environment.launchedFromSteam && environment.compatDataPath) {
    return join(environment.compatDataPath, "pfx", "drive_c");
  }
  return dir;
}
