/**
 * Check context assembly — turns a stored game entry into the read-only
 * snapshot the readiness resolver works on.
 */
import { join } from "path";
import { logger } from "../../logger.js";
import {
  effectivePrefix,
  featuresFor,
  isDownloaded,
  runnerDir,
  type ComponentRegistry,
  type Features,
  type VersionMatch,
} from "../components/index.js";
import type { RuntimeEnvironment } from "../steam/environment.js";
import type { Settings } from "../settings/index.js";
import type { CheckContext, StatusListener } from "../readiness/types.js";
import type { GameEntry } from "./types.js";

const log = logger.child({ module: "games" });

export interface AssemblyDeps {
  registry: ComponentRegistry;
  environment: RuntimeEnvironment;
  settings: Pick<Settings, "componentsPath" | "runnerBuildsPath" | "patchPath" | "patchServers">;
}

export interface RunnerSelection {
  match: VersionMatch;
  features: Features;
  /** Folder holding the runner build */
  dir: string;
}

/**
 * Resolves the entry's selected runner through the registry.
 *
 * Returns null when nothing is selected, when the name matches no version,
 * or when an unmanaged build is not unpacked in the runner builds folder.
 */
export async function selectRunner(
  entry: GameEntry,
  deps: AssemblyDeps
): Promise<RunnerSelection | null> {
  if (entry.runner === null) return null;

  const match = await deps.registry.findVersion(deps.settings.componentsPath, entry.runner);
  if (!match) {
    log.warn({ gameId: entry.id, runner: entry.runner }, "Selected runner is not in the components catalog");
    return null;
  }

  const { group, version } = match;
  if (!version.managed && !isDownloaded(version, deps.settings.runnerBuildsPath)) {
    return null;
  }

  return {
    match,
    features: featuresFor(version, group),
    dir: runnerDir(version, deps.settings.runnerBuildsPath),
  };
}

/**
 * Prefix folder as configured for the runner, before `prefixSubdir`.
 * A managed runner under Steam uses Steam's compat data folder when Steam
 * provides one.
 */
export function basePrefix(
  entry: GameEntry,
  selection: RunnerSelection | null,
  environment: RuntimeEnvironment
): string {
  if (selection?.match.version.managed && environment.compatDataPath) {
    return environment.compatDataPath;
  }
  return entry.winePrefix;
}

/** Wine prefix the runner actually uses (base prefix + prefixSubdir). */
export function winePrefixFor(
  entry: GameEntry,
  selection: RunnerSelection | null,
  environment: RuntimeEnvironment
): string {
  const base = basePrefix(entry, selection, environment);
  return selection ? effectivePrefix(base, selection.features) : base;
}

export async function assembleCheckContext(
  entry: GameEntry,
  deps: AssemblyDeps,
  onStatus?: StatusListener
): Promise<CheckContext> {
  const selection = await selectRunner(entry, deps);

  return Object.freeze({
    winePrefix: winePrefixFor(entry, selection, deps.environment),
    runner: selection
      ? { name: selection.match.version.name, managed: selection.match.version.managed }
      : null,
    game: { path: entry.gamePath, edition: entry.edition },
    voices: [...entry.voices],
    patch: {
      servers: [...deps.settings.patchServers],
      folder: join(deps.settings.patchPath, entry.profileId),
    },
    toggles: { ...entry.toggles },
    ignoreTelemetry: entry.telemetryIgnored,
    onStatus,
  });
}
