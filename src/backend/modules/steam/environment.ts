/**
 * Runtime environment detection.
 *
 * Steam exports a few flags into the environment of everything it launches.
 * They are read once at startup into a RuntimeEnvironment value that is passed
 * explicitly to discovery, the registry, and context assembly.
 */

export type EnvironmentKind = "desktop" | "deck" | "os" | "independent";

export interface RuntimeEnvironment {
  kind: EnvironmentKind;
  /** SteamEnv=1 — the launcher was started by Steam */
  launchedFromSteam: boolean;
  /** SteamDeck=1 */
  steamDeck: boolean;
  /** SteamOS=1 */
  steamOS: boolean;
  /** STEAM_COMPAT_DATA_PATH, when Steam provided one */
  compatDataPath: string | null;
}

export interface WindowSize {
  width: number;
  height: number;
}

function flag(value: string | undefined): boolean {
  return value === "1";
}

/**
 * Derives the environment kind from the three Steam flags.
 * The Deck and SteamOS flags only count when the launcher runs under Steam;
 * Deck wins over SteamOS.
 */
export function classifyEnvironment(
  launchedFromSteam: boolean,
  steamDeck: boolean,
  steamOS: boolean
): EnvironmentKind {
  if (!launchedFromSteam) return "independent";
  if (steamDeck) return "deck";
  if (steamOS) return "os";
  return "desktop";
}

export function detectEnvironment(
  env: NodeJS.ProcessEnv = process.env
): RuntimeEnvironment {
  const launchedFromSteam = flag(env.SteamEnv);
  const steamDeck = flag(env.SteamDeck);
  const steamOS = flag(env.SteamOS);

  return {
    kind: classifyEnvironment(launchedFromSteam, steamDeck, steamOS),
    launchedFromSteam,
    steamDeck,
    steamOS,
    compatDataPath: env.STEAM_COMPAT_DATA_PATH || null,
  };
}

/** Default game window size: the Deck's native panel, 1080p elsewhere. */
export function defaultWindowSize(environment: RuntimeEnvironment): WindowSize {
  return environment.kind === "deck"
    ? { width: 1280, height: 800 }
    : { width: 1920, height: 1080 };
}
