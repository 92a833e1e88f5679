/**
 * ============================================================
 *  Patch checks — building blocks for Game Profiles
 * ============================================================
 *
 * Two kinds of patch conditions are common across supported games:
 *
 *   appliedPatchCheck   a patch that is either applied to the game files
 *                       or not (binary-compatibility, scripting engine,
 *                       media foundation in the prefix…). Optionally gated
 *                       by a per-game toggle.
 *
 *   verifiedPatchCheck  an installed patch tool with remote metadata:
 *                       installed? → up to date? → verified for this
 *                       game version?
 *
 * Each returns a PatchCheck that yields its own readiness state when unmet
 * and null when satisfied.
 * ============================================================
 */
import semver from "semver";
import type {
  CheckContext,
  DiffOf,
  LaunchReadinessState,
  PatchCheck,
  PatchDescriptor,
} from "./types.js";

// ---------------------------------------------------------------------------
// Applied / not applied
// ---------------------------------------------------------------------------

export interface AppliedPatchSource {
  isApplied(context: CheckContext): Promise<boolean>;
  /** Descriptor handed to the frontend so it can offer to apply the patch */
  describe(context: CheckContext): Promise<PatchDescriptor>;
}

export interface AppliedPatchCheckOptions {
  id: string;
  /** When set, the check only runs while `context.toggles[toggle]` is true */
  toggle?: string;
  source: AppliedPatchSource;
}

export function appliedPatchCheck(options: AppliedPatchCheckOptions): PatchCheck {
  const { id, toggle, source } = options;

  return {
    id,
    async run({ context }) {
      if (toggle !== undefined && context.toggles[toggle] !== true) return null;
      if (await source.isApplied(context)) return null;
      return { kind: "PatchAvailable", patch: await source.describe(context) };
    },
  };
}

// ---------------------------------------------------------------------------
// Installed / updated / verified
// ---------------------------------------------------------------------------

export type PatchStatus = "verified" | "unverified" | "broken" | "unsafe" | "concerning";

export interface PatchMetadata {
  latestVersion: string;
  /** Verification status of the patch for a given game version */
  statusFor(gameVersion: string): PatchStatus;
}

export interface VerifiedPatchSource {
  isInstalled(folder: string): Promise<boolean>;
  installedVersion(folder: string): Promise<string>;
  fetchMetadata(edition: string): Promise<PatchMetadata>;
}

/**
 * True when `latest` is a newer version than `current`.
 * Versions are coerced ("v5.0.1", "5.0") before comparing; when either side
 * cannot be coerced any difference counts as newer.
 */
export function isVersionNewer(current: string, latest: string): boolean {
  const a = semver.coerce(current);
  const b = semver.coerce(latest);
  if (!a || !b) return current !== latest;
  return semver.lt(a, b);
}

/** Installed game version a patch status lookup is keyed by. */
export function installedGameVersion(diff: DiffOf<"latest" | "predownload">): string {
  return diff.status === "latest" ? diff.version : diff.current;
}

const STATUS_KINDS = {
  unverified: "PatchNotVerified",
  broken: "PatchBroken",
  unsafe: "PatchUnsafe",
  concerning: "PatchConcerning",
} as const satisfies Record<Exclude<PatchStatus, "verified">, LaunchReadinessState["kind"]>;

export function verifiedPatchCheck(id: string, source: VerifiedPatchSource): PatchCheck {
  return {
    id,
    async run({ context, gameDiff }) {
      const folder = context.patch.folder;

      if (!(await source.isInstalled(folder))) return { kind: "PatchNotInstalled" };

      const metadata = await source.fetchMetadata(context.game.edition);
      const current = await source.installedVersion(folder);

      if (isVersionNewer(current, metadata.latestVersion)) {
        return { kind: "PatchUpdateAvailable", current, latest: metadata.latestVersion };
      }

      const status = metadata.statusFor(installedGameVersion(gameDiff));
      return status === "verified" ? null : { kind: STATUS_KINDS[status] };
    },
  };
}
