import { existsSync, lstatSync, readdirSync, readFileSync } from "fs";
import { basename, join } from "path";
import { homedir } from "os";
import { logger } from "../../logger.js";
import { DiscoveryError } from "../../errors.js";
import { isDirectory } from "../components/registry.js";
import type { ComponentGroup, ComponentVersion, Features, WineFiles } from "../components/types.js";
import type { RuntimeEnvironment } from "./environment.js";
import { listLibraryFolders } from "./library-folders.js";

const log = logger.child({ module: "steam" });

// ---------------------------------------------------------------------------
// Known Steam root paths (checked in order)
// ---------------------------------------------------------------------------

export const DEFAULT_STEAM_ROOTS: ReadonlyArray<string> = [
  join(homedir(), ".steam", "steam"),
  join(homedir(), ".local", "share", "Steam"),
  join(homedir(), ".var", "app", "com.valvesoftware.Steam", ".local", "share", "Steam"),
];

export const STEAM_PROTON_GROUP = "steam-proton";

/** Layout of the Wine binaries inside a Proton build. */
const PROTON_FILES: WineFiles = {
  wine: "files/bin/wine",
  wine64: "files/bin/wine64",
  wineserver: "files/bin/wineserver",
  wineboot: null,
  winecfg: "files/lib64/wine/x86_64-windows/winecfg.exe",
};

/**
 * Fixed features of Steam-managed Proton. Proton drives Wine itself, so the
 * launcher runs the `proton` script and keeps the prefix in `pfx/`.
 */
export function steamProtonFeatures(steamRoot: string | null): Features {
  return {
    bundle: "Proton",
    needDxvk: false,
    compactLaunch: true,
    prefixSubdir: "pfx",
    command: "python3 '%build%/proton' waitforexitandrun",
    env: {
      STEAM_COMPAT_DATA_PATH: "%prefix%",
      STEAM_COMPAT_CLIENT_INSTALL_PATH: steamRoot ?? "",
      SteamAppId: "0",
    },
  };
}

// ---------------------------------------------------------------------------
// Pure helpers (exported for unit testing)
// ---------------------------------------------------------------------------

export interface ProtonVersionInfo {
  buildId: string;
  name: string;
}

/**
 * Parses a Proton `version` file: "<build-id> <name> ...". The name is the
 * second space-separated token; anything after it is ignored.
 * Returns null when either token is missing; such builds are too old to be used.
 *
 * @example
 *   parseVersionFile("1695908143 proton-8.0-4\n") → { buildId: "1695908143", name: "proton-8.0-4" }
 *   parseVersionFile("1695908143\n")              → null
 */
export function parseVersionFile(content: string): ProtonVersionInfo | null {
  const [buildId, second] = content.split(" ");
  const name = second?.trim();
  if (!buildId || !name) return null;

  return { buildId, name };
}

/**
 * Extracts a numeric sort key from a Proton name so newer versions sort first.
 * Falls back to 0 for names with no recognisable version numbers.
 *
 * Examples:
 *   "proton-9.0-1"  → 9000
 *   "proton-8.0-5"  → 8000
 *   "GE-Proton9-20" → 9020
 */
export function protonSortKey(name: string): number {
  const match = name.match(/(\d+)[.\-](\d+)/);
  if (!match) {
    const single = name.match(/(\d+)/);
    return single ? parseInt(single[1], 10) * 1000 : 0;
  }
  return parseInt(match[1], 10) * 1000 + parseInt(match[2], 10);
}

/**
 * True for a real (non-symlink) directory holding the `proton` launch script.
 * Symlinked builds are skipped so the same install is not listed twice.
 */
export function isProtonDirectory(dirPath: string): boolean {
  const stat = lstatSync(dirPath, { throwIfNoEntry: false });
  if (!stat || stat.isSymbolicLink() || !stat.isDirectory()) return false;
  return existsSync(join(dirPath, "proton"));
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

export interface SteamRuntimeDiscoveryOptions {
  environment: RuntimeEnvironment;
  /** Candidate Steam install roots, checked in order */
  steamRoots?: ReadonlyArray<string>;
}

export class SteamRuntimeDiscovery {
  private readonly environment: RuntimeEnvironment;
  private readonly steamRoots: ReadonlyArray<string>;

  constructor(options: SteamRuntimeDiscoveryOptions) {
    this.environment = options.environment;
    this.steamRoots = options.steamRoots ?? DEFAULT_STEAM_ROOTS;
  }

  /** First known Steam root that exists, or null. */
  locateSteamRoot(): string | null {
    return this.steamRoots.find((root) => isDirectory(root)) ?? null;
  }

  /** `compatibilitytools.d` plus the `steamapps/common` folder of every library. */
  searchRoots(steamRoot: string): string[] {
    return [
      join(steamRoot, "compatibilitytools.d"),
      ...listLibraryFolders(steamRoot).map((library) => join(library, "steamapps", "common")),
    ];
  }

  /** Every Proton build directory under the search roots, in discovery order. */
  protonCandidates(steamRoot: string): string[] {
    const candidates: string[] = [];

    for (const root of this.searchRoots(steamRoot)) {
      if (!isDirectory(root)) continue;

      let entries: string[];
      try {
        entries = this.readEntries(root);
      } catch (err) {
        log.debug({ err, path: root }, "Cannot list Proton search root, skipping");
        continue;
      }

      for (const entry of entries) {
        const dirPath = join(root, entry);
        if (isProtonDirectory(dirPath) && !candidates.includes(dirPath)) {
          candidates.push(dirPath);
        }
      }
    }

    return candidates;
  }

  /** Sorted entry names of one search root. */
  protected readEntries(root: string): string[] {
    return readdirSync(root).sort();
  }

  /**
   * Proton build directories, or null when the launcher does not run under
   * Steam or Steam cannot be located.
   */
  installedProtonPaths(): string[] | null {
    if (!this.environment.launchedFromSteam) return null;
    const steamRoot = this.locateSteamRoot();
    return steamRoot ? this.protonCandidates(steamRoot) : null;
  }

  private readVersion(dirPath: string): ComponentVersion | null {
    let content: string;
    try {
      content = readFileSync(join(dirPath, "version"), "utf-8");
    } catch (err) {
      log.debug({ err, path: dirPath }, "Proton build has no readable version file, skipping");
      return null;
    }

    const info = parseVersionFile(content);
    if (!info) {
      log.debug({ path: dirPath }, "Proton version file does not follow the expected format, skipping");
      return null;
    }

    return {
      name: info.name,
      title: basename(dirPath).trim(),
      uri: dirPath,
      files: { ...PROTON_FILES },
      features: null,
      managed: true,
    };
  }

  /**
   * Synthesises the single externally managed "steam-proton" runner group
   * from every Proton build Steam knows about.
   *
   * Throws DiscoveryError when the environment asserts Steam mode but no
   * Steam install exists.
   */
  async discoverProtonInstalls(): Promise<ComponentGroup[]> {
    const steamRoot = this.locateSteamRoot();

    if (!steamRoot && this.environment.launchedFromSteam) {
      throw new DiscoveryError(
        `Launched from Steam but no Steam install was found in: ${this.steamRoots.join(", ")}`
      );
    }

    const versions: ComponentVersion[] = [];
    if (steamRoot) {
      for (const dirPath of this.protonCandidates(steamRoot)) {
        const version = this.readVersion(dirPath);
        if (version) versions.push(version);
      }
    }

    versions.sort((a, b) => protonSortKey(b.name) - protonSortKey(a.name));

    log.debug({ steamRoot, builds: versions.length }, "Discovered Steam Proton builds");

    return [
      {
        name: STEAM_PROTON_GROUP,
        title: "Proton Runners via Steam",
        features: steamProtonFeatures(steamRoot),
        versions,
        managed: true,
      },
    ];
  }
}
