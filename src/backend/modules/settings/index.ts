import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { dirname, join } from "path";
import { z } from "zod";
import { logger } from "../../logger.js";
import { cacheDir, launcherDir, settingsFile } from "../paths/index.js";

const log = logger.child({ module: "settings" });

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * Validates a single folder path: must be a non-empty absolute Unix path.
 * Rejects empty strings and Windows-style or relative paths.
 */
export const AbsolutePath = z
  .string()
  .min(1, "Path must not be empty")
  .refine((p) => p.startsWith("/"), {
    message: "Path must be an absolute path starting with /",
  });

export interface SettingsRoots {
  launcher: string;
  cache: string;
}

/**
 * Builds the settings schema; folder defaults live under the given roots.
 */
export function buildSettingsSchema(roots: SettingsRoots) {
  return z.object({
    /** Components catalog folder (components.json, wine/, dxvk/) */
    componentsPath: AbsolutePath.default(join(roots.launcher, "components")),
    /** Unpacked runner builds, one sub-folder per version name */
    runnerBuildsPath: AbsolutePath.default(join(roots.launcher, "runners")),
    dxvkBuildsPath: AbsolutePath.default(join(roots.launcher, "dxvks")),
    /** New games get `<prefixesPath>/<gameId>` as their Wine prefix */
    prefixesPath: AbsolutePath.default(join(roots.launcher, "prefixes")),
    /** Local patch cache; each game profile uses a sub-folder */
    patchPath: AbsolutePath.default(join(roots.launcher, "patch")),
    /** Patch mirrors, tried in order */
    patchServers: z.array(z.string().url()).default([]),
    /** Substituted for %temp% in launch templates */
    tempPath: AbsolutePath.default(roots.cache),
    defaultVoices: z.array(z.string().min(1)).default(["en-us"]),
    telemetryTimeoutMs: z.number().int().positive().default(3_000),
    patchSyncTimeoutMs: z.number().int().positive().default(5_000),
  });
}

export const SettingsSchema = buildSettingsSchema({
  launcher: launcherDir(),
  cache: cacheDir(),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------
const CONFIG_PATH = settingsFile(launcherDir());

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------
let _settings: Settings | null = null;

function writeSettings(settings: Settings): void {
  mkdirSync(dirname(CONFIG_PATH), { recursive: true });
  writeFileSync(CONFIG_PATH, JSON.stringify(settings, null, 2) + "\n", "utf-8");
}

function ensureConfigExists(): void {
  if (!existsSync(CONFIG_PATH)) {
    writeSettings(SettingsSchema.parse({}));
    log.info({ path: CONFIG_PATH }, "Created settings with defaults");
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Loads settings from disk, creating settings.json with the defaults if it
 * does not exist yet. Cached in memory after first load.
 */
export async function loadSettings(): Promise<Settings> {
  if (_settings) return _settings;

  ensureConfigExists();

  const raw: unknown = JSON.parse(readFileSync(CONFIG_PATH, "utf-8"));
  _settings = SettingsSchema.parse(raw);
  return _settings;
}

/**
 * Returns the cached settings. loadSettings() must have been called first.
 */
export function getSettings(): Settings {
  if (!_settings) throw new Error("Settings not loaded — call loadSettings() first");
  return _settings;
}

/**
 * Merges a partial patch into the current settings and persists to disk.
 */
export function updateSettings(patch: Partial<Settings>): Settings {
  const current = getSettings();
  const next = SettingsSchema.parse({ ...current, ...patch });
  writeSettings(next);
  _settings = next;
  return next;
}
